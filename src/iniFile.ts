export type IniSections = Record<string, Record<string, string>>;

export class IniParseError extends Error {
  constructor(message: string, readonly line: number) {
    super(`${message} (line ${line})`);
    this.name = 'IniParseError';
  }
}

function createTable<T>(): Record<string, T> {
  return Object.create(null);
}

/**
 * Read setup.cfg style INI text: `[section]` headers, `key = value` or
 * `key: value` options with lower-cased keys, indented continuation lines and
 * full-line `#` / `;` comments.
 */
export function parseIni(text: string): IniSections {
  const sections: IniSections = createTable();
  let current: Record<string, string> | undefined;
  let currentKey: string | undefined;

  text.split(/\r\n|\r|\n/).forEach((line, index) => {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#') || trimmed.startsWith(';')) {
      if (!trimmed && current && currentKey) current[currentKey] += '\n';
      return;
    }

    if (/^\s/.test(line) && current && currentKey) {
      current[currentKey] += `\n${trimmed}`;
      return;
    }

    const header = line.match(/^\[([^\]]+)\]\s*$/);
    if (header) {
      const name = header[1].trim();
      current = sections[name] || (sections[name] = createTable());
      currentKey = undefined;
      return;
    }

    const option = line.match(/^([^=:]+?)\s*[=:]\s*(.*)$/);
    if (!option) throw new IniParseError('Expected "key = value"', index + 1);
    if (!current) throw new IniParseError('Option outside of any section', index + 1);
    currentKey = option[1].trim().toLowerCase();
    current[currentKey] = option[2].trim();
  });

  for (const options of Object.values(sections)) {
    for (const key of Object.keys(options)) {
      options[key] = options[key].replace(/\n+$/, '').replace(/\n{2,}/g, '\n');
    }
  }
  return sections;
}

/** Non-empty lines of a multi-line option value. */
export function splitLines(value?: string): string[] {
  return (value || '')
    .split('\n')
    .map((line) => line.trim())
    .filter(Boolean);
}
