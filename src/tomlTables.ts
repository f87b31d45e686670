/**
 * Enough TOML to read a Pipfile: `[table]` and `[[array-of-tables]]` headers,
 * bare or quoted keys, strings, booleans, numbers, arrays and inline tables.
 * Dotted keys are kept as plain key text.
 */
export type TomlValue = string | number | boolean | TomlValue[] | TomlTable;
export interface TomlTable {
  [key: string]: TomlValue;
}

export class TomlParseError extends Error {
  constructor(message: string, readonly offset: number) {
    super(`${message} at offset ${offset}`);
    this.name = 'TomlParseError';
  }
}

const BARE_KEY = /[A-Za-z0-9_.-]+/y;
const SCALAR = /[^\s,\]}#]+/y;
const ESCAPES: Record<string, string> = { b: '\b', t: '\t', n: '\n', f: '\f', r: '\r', '"': '"', '\\': '\\' };

// Tables have no prototype so `__proto__` and `constructor` stay ordinary keys.
function createTable(): TomlTable {
  return Object.create(null);
}

class TomlReader {
  private pos = 0;

  constructor(private readonly text: string) {}

  private fail(message: string): never {
    throw new TomlParseError(message, this.pos);
  }

  private skipSpace(newlines: boolean): void {
    while (this.pos < this.text.length) {
      const ch = this.text[this.pos];
      if (ch === '#') {
        while (this.pos < this.text.length && this.text[this.pos] !== '\n') this.pos++;
      } else if (ch === ' ' || ch === '\t' || ch === '\r' || (newlines && ch === '\n')) {
        this.pos++;
      } else {
        return;
      }
    }
  }

  private expect(token: string): void {
    if (!this.text.startsWith(token, this.pos)) this.fail(`Expected "${token}"`);
    this.pos += token.length;
  }

  private readKey(): string {
    const ch = this.text[this.pos];
    if (ch === '"' || ch === "'") return this.readString();
    BARE_KEY.lastIndex = this.pos;
    const match = BARE_KEY.exec(this.text);
    if (!match) return this.fail('Expected a key');
    this.pos = BARE_KEY.lastIndex;
    return match[0];
  }

  private readString(): string {
    const quote = this.text[this.pos];
    const multiline = this.text.startsWith(quote.repeat(3), this.pos);
    const delimiter = multiline ? quote.repeat(3) : quote;
    this.pos += delimiter.length;
    if (multiline && this.text[this.pos] === '\n') this.pos++;
    let value = '';
    while (!this.text.startsWith(delimiter, this.pos)) {
      if (this.pos >= this.text.length) this.fail('Unterminated string');
      const ch = this.text[this.pos];
      if (!multiline && ch === '\n') this.fail('Unterminated string');
      if (quote === '"' && ch === '\\') {
        const next = this.text[this.pos + 1];
        if (next === 'u' || next === 'U') {
          const width = next === 'u' ? 4 : 8;
          value += String.fromCodePoint(Number.parseInt(this.text.slice(this.pos + 2, this.pos + 2 + width), 16));
          this.pos += 2 + width;
          continue;
        }
        if (!(next in ESCAPES)) this.fail(`Invalid escape \\${next}`);
        value += ESCAPES[next];
        this.pos += 2;
        continue;
      }
      value += ch;
      this.pos++;
    }
    this.pos += delimiter.length;
    return value;
  }

  private readValue(): TomlValue {
    const ch = this.text[this.pos];
    if (ch === '"' || ch === "'") return this.readString();
    if (ch === '[') return this.readArray();
    if (ch === '{') return this.readInlineTable();
    SCALAR.lastIndex = this.pos;
    const match = SCALAR.exec(this.text);
    if (!match) return this.fail('Expected a value');
    this.pos = SCALAR.lastIndex;
    const raw = match[0];
    if (raw === 'true') return true;
    if (raw === 'false') return false;
    const number = Number(raw.replace(/_/g, ''));
    return Number.isNaN(number) ? raw : number;
  }

  private readArray(): TomlValue[] {
    this.expect('[');
    const items: TomlValue[] = [];
    for (;;) {
      this.skipSpace(true);
      if (this.text[this.pos] === ']') break;
      items.push(this.readValue());
      this.skipSpace(true);
      if (this.text[this.pos] === ',') this.pos++;
      else if (this.text[this.pos] !== ']') this.fail('Expected "," or "]"');
    }
    this.pos++;
    return items;
  }

  private readInlineTable(): TomlTable {
    this.expect('{');
    const table = createTable();
    for (;;) {
      this.skipSpace(false);
      if (this.text[this.pos] === '}') break;
      const key = this.readKey();
      this.skipSpace(false);
      this.expect('=');
      this.skipSpace(false);
      table[key] = this.readValue();
      this.skipSpace(false);
      if (this.text[this.pos] === ',') this.pos++;
      else if (this.text[this.pos] !== '}') this.fail('Expected "," or "}"');
    }
    this.pos++;
    return table;
  }

  read(): TomlTable {
    const root = createTable();
    let current = root;
    for (;;) {
      this.skipSpace(true);
      if (this.pos >= this.text.length) return root;
      if (this.text[this.pos] === '[') {
        const isArray = this.text.startsWith('[[', this.pos);
        this.pos += isArray ? 2 : 1;
        this.skipSpace(false);
        const name = this.readKey();
        this.skipSpace(false);
        this.expect(isArray ? ']]' : ']');
        current = createTable();
        if (isArray) {
          const existing = root[name];
          if (Array.isArray(existing)) existing.push(current);
          else root[name] = [current];
        } else {
          root[name] = current;
        }
      } else {
        const key = this.readKey();
        this.skipSpace(false);
        this.expect('=');
        this.skipSpace(false);
        current[key] = this.readValue();
      }
      this.skipSpace(false);
      if (this.pos < this.text.length && this.text[this.pos] !== '\n') this.fail('Expected end of line');
    }
  }
}

export function parseToml(text: string): TomlTable {
  return new TomlReader(text).read();
}
