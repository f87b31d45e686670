/**
 * Reads the literal keyword arguments of top-level `setup(...)` calls out of
 * Python source without running it. Only string, list/tuple/set and dict
 * literals are understood; any other expression is skipped.
 */

export type SetupValue = string | string[] | Record<string, string | string[]>;

export interface SetupCallArguments {
  args: Record<string, SetupValue>;
  warnings: string[];
}

type Token =
  | { type: 'name'; value: string; column: number }
  | { type: 'string'; value: string; literal: boolean; column: number }
  | { type: 'number'; column: number }
  | { type: 'op'; value: string; column: number }
  | { type: 'newline'; column: number };

type Parsed =
  | { kind: 'string'; value: string }
  | { kind: 'list'; values: string[]; dropped: number }
  | { kind: 'dict'; entries: Record<string, string | string[]>; dropped: number }
  | { kind: 'other' };

const OPERATORS = [
  '**=', '//=', '>>=', '<<=', '...', '->', ':=', '**', '//', '==', '!=', '<=', '>=', '<<', '>>',
  '+=', '-=', '*=', '/=', '%=', '&=', '|=', '^=', '@='
];
const OPENERS = new Set(['(', '[', '{']);
const CLOSERS = new Set([')', ']', '}']);
const SIMPLE_ESCAPES: Record<string, string> = {
  '\\': '\\', "'": "'", '"': '"', n: '\n', t: '\t', r: '\r', a: '\x07', b: '\b', f: '\f', v: '\v', '\n': ''
};

export class PythonSyntaxError extends Error {
  constructor(message: string, readonly offset: number) {
    super(`${message} at offset ${offset}`);
    this.name = 'PythonSyntaxError';
  }
}

function decodeEscapes(body: string): string {
  return body.replace(
    /\\(x[0-9A-Fa-f]{2}|u[0-9A-Fa-f]{4}|U[0-9A-Fa-f]{8}|[0-7]{1,3}|[\s\S])/g,
    (whole: string, escape: string) => {
      if (escape in SIMPLE_ESCAPES) return SIMPLE_ESCAPES[escape];
      if (/^[xuU]/.test(escape)) return String.fromCodePoint(Number.parseInt(escape.slice(1), 16));
      if (/^[0-7]+$/.test(escape)) return String.fromCodePoint(Number.parseInt(escape, 8));
      return whole;
    }
  );
}

function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;
  let depth = 0;
  let lineStart = 0;

  const pushNewline = (): void => {
    const last = tokens[tokens.length - 1];
    if (last && last.type !== 'newline') tokens.push({ type: 'newline', column: pos - lineStart });
  };

  while (pos < source.length) {
    const ch = source[pos];
    const column = pos - lineStart;

    if (ch === '\n') {
      if (depth === 0) pushNewline();
      pos++;
      lineStart = pos;
      continue;
    }
    if (ch === '\\' && (source[pos + 1] === '\n' || source.startsWith('\r\n', pos + 1))) {
      pos += source[pos + 1] === '\n' ? 2 : 3;
      lineStart = pos;
      continue;
    }
    if (/\s/.test(ch)) {
      pos++;
      continue;
    }
    if (ch === '#') {
      while (pos < source.length && source[pos] !== '\n') pos++;
      continue;
    }

    const stringStart = source.slice(pos).match(/^([rRbBuUfF]{0,2})('''|"""|'|")/);
    if (stringStart) {
      const prefix = stringStart[1].toLowerCase();
      const quote = stringStart[2];
      let end = pos + stringStart[0].length;
      const bodyStart = end;
      for (;;) {
        if (end >= source.length) throw new PythonSyntaxError('Unterminated string', pos);
        if (source[end] === '\\') {
          end += 2;
          continue;
        }
        if (quote.length === 1 && source[end] === '\n') throw new PythonSyntaxError('Unterminated string', pos);
        if (source.startsWith(quote, end)) break;
        end++;
      }
      const body = source.slice(bodyStart, end);
      const isRaw = prefix.includes('r');
      tokens.push({
        type: 'string',
        value: isRaw ? body : decodeEscapes(body),
        literal: !prefix.includes('b') && !prefix.includes('f'),
        column
      });
      for (let i = pos; i < end; i++) {
        if (source[i] === '\n') lineStart = i + 1;
      }
      pos = end + quote.length;
      continue;
    }

    const name = source.slice(pos).match(/^[A-Za-z_][A-Za-z0-9_]*/);
    if (name) {
      tokens.push({ type: 'name', value: name[0], column });
      pos += name[0].length;
      continue;
    }

    const number = source.slice(pos).match(/^(?:\d[\w.]*|\.\d[\w]*)/);
    if (number) {
      tokens.push({ type: 'number', column });
      pos += number[0].length;
      continue;
    }

    const op = OPERATORS.find((candidate) => source.startsWith(candidate, pos)) || ch;
    if (OPENERS.has(op)) depth++;
    else if (CLOSERS.has(op)) depth = Math.max(0, depth - 1);
    tokens.push({ type: 'op', value: op, column });
    pos += op.length;
  }
  pushNewline();
  return tokens;
}

class SetupCallReader {
  private index = 0;
  readonly args: Record<string, SetupValue> = {};
  readonly warnings: string[] = [];

  constructor(
    private readonly tokens: Token[],
    private readonly callNames: string[]
  ) {}

  read(): void {
    let statementStart = 0;
    for (let i = 0; i < this.tokens.length; i++) {
      if (this.tokens[i].type !== 'newline') continue;
      this.readStatement(statementStart, i);
      statementStart = i + 1;
    }
  }

  private isOp(token: Token | undefined, value: string): boolean {
    return token?.type === 'op' && token.value === value;
  }

  private isCallName(token: Token | undefined): boolean {
    return token?.type === 'name' && this.callNames.includes(token.value);
  }

  private readStatement(start: number, end: number): void {
    const first = this.tokens[start];
    if (!first || first.column !== 0 || start >= end) return;
    let callAt = -1;
    if (this.isCallName(first) && this.isOp(this.tokens[start + 1], '(')) callAt = start;
    else if (
      first.type === 'name' &&
      this.isOp(this.tokens[start + 1], '=') &&
      this.isCallName(this.tokens[start + 2]) &&
      this.isOp(this.tokens[start + 3], '(')
    ) {
      callAt = start + 2;
    }
    if (callAt === -1) return;
    this.index = callAt + 2;
    this.readArguments();
  }

  private readArguments(): void {
    while (this.index < this.tokens.length) {
      const token = this.tokens[this.index];
      if (this.isOp(token, ')') || token.type === 'newline') return;
      if (token.type === 'name' && this.isOp(this.tokens[this.index + 1], '=')) {
        this.index += 2;
        this.store(token.value, this.parseExpression());
      } else {
        this.skipExpression(false);
      }
      if (!this.isOp(this.tokens[this.index], ',')) return;
      this.index++;
    }
  }

  private store(name: string, parsed: Parsed): void {
    if (parsed.kind === 'other') return;
    if (parsed.kind === 'string') {
      this.args[name] = parsed.value;
      return;
    }
    this.args[name] = parsed.kind === 'list' ? parsed.values : parsed.entries;
    if (parsed.dropped) {
      this.warnings.push(
        `setup() argument ${name}: dropped ${parsed.dropped} non-literal element${parsed.dropped === 1 ? '' : 's'}`
      );
    }
  }

  private atExpressionEnd(stopAtColon: boolean): boolean {
    const token = this.tokens[this.index];
    if (!token || token.type === 'newline') return true;
    if (token.type !== 'op') return false;
    return token.value === ',' || CLOSERS.has(token.value) || (stopAtColon && token.value === ':');
  }

  private skipExpression(stopAtColon: boolean): void {
    let depth = 0;
    while (this.index < this.tokens.length) {
      const token = this.tokens[this.index];
      if (token.type === 'newline') return;
      if (token.type === 'op') {
        if (depth === 0 && (token.value === ',' || CLOSERS.has(token.value) || (stopAtColon && token.value === ':'))) {
          return;
        }
        if (OPENERS.has(token.value)) depth++;
        else if (CLOSERS.has(token.value)) depth--;
      }
      this.index++;
    }
  }

  private parseExpression(stopAtColon = false): Parsed {
    const start = this.index;
    const parsed = this.parseLiteral();
    if (parsed.kind !== 'other' && this.atExpressionEnd(stopAtColon)) return parsed;
    this.index = start;
    this.skipExpression(stopAtColon);
    return { kind: 'other' };
  }

  private parseLiteral(): Parsed {
    const token = this.tokens[this.index];
    if (token?.type === 'string') {
      let value = '';
      let literal = true;
      let current = this.tokens[this.index];
      while (current?.type === 'string') {
        value += current.value;
        literal = literal && current.literal;
        this.index++;
        current = this.tokens[this.index];
      }
      return literal ? { kind: 'string', value } : { kind: 'other' };
    }
    if (token?.type === 'op' && OPENERS.has(token.value)) {
      this.index++;
      return token.value === '{' ? this.parseBraces() : this.parseSequence(token.value === '(' ? ')' : ']');
    }
    return { kind: 'other' };
  }

  private parseSequence(closer: string): Parsed {
    const values: string[] = [];
    let dropped = 0;
    let count = 0;
    let trailingComma = false;
    let single: Parsed = { kind: 'other' };
    while (!this.isOp(this.tokens[this.index], closer)) {
      if (this.index >= this.tokens.length || this.tokens[this.index].type === 'newline') return { kind: 'other' };
      const element = this.parseExpression();
      count++;
      single = element;
      if (element.kind === 'string') values.push(element.value);
      else dropped++;
      trailingComma = this.isOp(this.tokens[this.index], ',');
      if (trailingComma) this.index++;
      else if (!this.isOp(this.tokens[this.index], closer)) return { kind: 'other' };
    }
    this.index++;
    // a parenthesized single expression is not a tuple
    if (closer === ')' && count === 1 && !trailingComma) return single;
    return { kind: 'list', values, dropped };
  }

  private parseBraces(): Parsed {
    const entries: Record<string, string | string[]> = {};
    const values: string[] = [];
    let dropped = 0;
    let isDict: boolean | undefined;
    while (!this.isOp(this.tokens[this.index], '}')) {
      if (this.index >= this.tokens.length || this.tokens[this.index].type === 'newline') return { kind: 'other' };
      const key = this.parseExpression(true);
      if (isDict === undefined) isDict = this.isOp(this.tokens[this.index], ':');
      if (isDict) {
        if (!this.isOp(this.tokens[this.index], ':')) return { kind: 'other' };
        this.index++;
        const value = this.parseExpression();
        if (key.kind === 'string' && value.kind === 'string') entries[key.value] = value.value;
        else if (key.kind === 'string' && value.kind === 'list') {
          entries[key.value] = value.values;
          dropped += value.dropped;
        } else dropped++;
      } else if (key.kind === 'string') values.push(key.value);
      else dropped++;
      if (this.isOp(this.tokens[this.index], ',')) this.index++;
      else if (!this.isOp(this.tokens[this.index], '}')) return { kind: 'other' };
    }
    this.index++;
    if (isDict === false) return { kind: 'list', values, dropped };
    return { kind: 'dict', entries, dropped };
  }
}

export function readSetupCallArguments(source: string, callNames = ['setup', 'main']): SetupCallArguments {
  const reader = new SetupCallReader(tokenize(source), callNames);
  reader.read();
  return { args: reader.args, warnings: reader.warnings };
}
