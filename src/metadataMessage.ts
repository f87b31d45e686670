import type { MetadataSource } from './attributes';

const HEADER_LINE = /^([^:\s][^:]*):[ \t]*(.*)$/;

/**
 * A core-metadata header block (PKG-INFO, METADATA): `Key: value` headers,
 * indented continuation lines, then an optional payload after a blank line.
 * Header names compare case-insensitively.
 */
export class MetadataMessage implements MetadataSource {
  constructor(
    private readonly headers: Array<[string, string]>,
    private readonly payload: string
  ) {}

  static parse(text: string): MetadataMessage {
    const lines = text.split(/\r\n|\r|\n/);
    const headers: Array<[string, string]> = [];
    let index = 0;
    for (; index < lines.length; index++) {
      const line = lines[index];
      if (line.trim() === '') {
        index++;
        break;
      }
      const last = headers[headers.length - 1];
      if (/^[ \t]/.test(line) && last) {
        last[1] = `${last[1]}\n${line}`;
        continue;
      }
      const match = line.match(HEADER_LINE);
      if (!match) break;
      headers.push([match[1], match[2]]);
    }
    const payload = lines.slice(index).join('\n');
    return new MetadataMessage(
      headers.map(([key, value]) => [key, value.replace(/\s+$/, '')]),
      payload
    );
  }

  get size(): number {
    return this.headers.length;
  }

  get(name: string): string | undefined {
    const wanted = name.toLowerCase();
    const found = this.headers.find(([key]) => key.toLowerCase() === wanted);
    return found ? found[1] : undefined;
  }

  getAll(name: string): string[] | undefined {
    const wanted = name.toLowerCase();
    const values = this.headers.filter(([key]) => key.toLowerCase() === wanted).map(([, value]) => value);
    return values.length ? values : undefined;
  }

  getPayload(): string {
    return this.payload;
  }
}
