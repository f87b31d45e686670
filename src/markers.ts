import { RequirementParseError } from './errors';

/**
 * Environment markers (`python_version < "3.8" and extra == "test"`) parsed
 * into a tree: clauses compare two operands, and/or nodes combine clauses.
 */
export type MarkerOperator = '===' | '==' | '!=' | '<=' | '>=' | '~=' | '<' | '>' | 'in' | 'not in';

export type MarkerOperand =
  | { kind: 'variable'; name: string }
  | { kind: 'value'; value: string };

export interface MarkerClause {
  kind: 'clause';
  left: MarkerOperand;
  op: MarkerOperator;
  right: MarkerOperand;
}

export interface MarkerGroup {
  kind: 'and' | 'or';
  items: MarkerNode[];
}

export type MarkerNode = MarkerClause | MarkerGroup;

const EXTRA_VARIABLE = 'extra';

const MARKER_VARIABLES = new Set([
  'python_version',
  'python_full_version',
  'os_name',
  'sys_platform',
  'platform_release',
  'platform_system',
  'platform_version',
  'platform_machine',
  'platform_python_implementation',
  'implementation_name',
  'implementation_version',
  'extra',
  // legacy spellings still found in older metadata
  'os.name',
  'sys.platform',
  'platform.version',
  'platform.machine',
  'platform.python_implementation',
  'python_implementation'
]);

type Token =
  | { type: 'lparen' | 'rparen' | 'and' | 'or' }
  | { type: 'op'; value: MarkerOperator }
  | { type: 'string'; value: string }
  | { type: 'name'; value: string };

const TOKEN_PATTERN = /\s*(?:(\()|(\))|'([^']*)'|"([^"]*)"|(===|==|!=|<=|>=|~=|<|>)|([A-Za-z_][A-Za-z0-9_.]*))/y;

function isComparison(value: string): value is Exclude<MarkerOperator, 'in' | 'not in'> {
  return ['===', '==', '!=', '<=', '>=', '~=', '<', '>'].includes(value);
}

function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  TOKEN_PATTERN.lastIndex = 0;
  let position = 0;
  while (position < text.length) {
    if (/^\s*$/.test(text.slice(position))) break;
    TOKEN_PATTERN.lastIndex = position;
    const match = TOKEN_PATTERN.exec(text);
    if (!match) throw new RequirementParseError('Invalid marker', text);
    position = TOKEN_PATTERN.lastIndex;
    const [, lparen, rparen, single, double, op, name] = match;
    if (lparen) tokens.push({ type: 'lparen' });
    else if (rparen) tokens.push({ type: 'rparen' });
    else if (single !== undefined || double !== undefined) tokens.push({ type: 'string', value: single ?? double ?? '' });
    else if (op && isComparison(op)) tokens.push({ type: 'op', value: op });
    else if (name === 'and' || name === 'or') tokens.push({ type: name });
    else if (name === 'in') tokens.push({ type: 'op', value: 'in' });
    else if (name === 'not') {
      const next = /\s+in\b/y;
      next.lastIndex = position;
      if (!next.exec(text)) throw new RequirementParseError('Expected "in" after "not" in marker', text);
      position = next.lastIndex;
      tokens.push({ type: 'op', value: 'not in' });
    } else if (name) tokens.push({ type: 'name', value: name });
  }
  return tokens;
}

class MarkerParser {
  private index = 0;

  constructor(
    private readonly tokens: Token[],
    private readonly text: string
  ) {}

  parse(): MarkerNode {
    const node = this.parseOr();
    if (this.index < this.tokens.length) this.fail('Unexpected trailing marker text');
    return node;
  }

  private fail(message: string): never {
    throw new RequirementParseError(message, this.text);
  }

  private peek(): Token | undefined {
    return this.tokens[this.index];
  }

  private parseOr(): MarkerNode {
    const items = [this.parseAnd()];
    while (this.peek()?.type === 'or') {
      this.index++;
      items.push(this.parseAnd());
    }
    return items.length === 1 ? items[0] : { kind: 'or', items };
  }

  private parseAnd(): MarkerNode {
    const items = [this.parseAtom()];
    while (this.peek()?.type === 'and') {
      this.index++;
      items.push(this.parseAtom());
    }
    return items.length === 1 ? items[0] : { kind: 'and', items };
  }

  private parseAtom(): MarkerNode {
    if (this.peek()?.type === 'lparen') {
      this.index++;
      const node = this.parseOr();
      if (this.peek()?.type !== 'rparen') this.fail('Unbalanced parenthesis in marker');
      this.index++;
      return node;
    }
    const left = this.parseOperand();
    const opToken = this.tokens[this.index++];
    if (!opToken || opToken.type !== 'op') return this.fail('Expected a marker operator');
    const right = this.parseOperand();
    return { kind: 'clause', left, op: opToken.value, right };
  }

  private parseOperand(): MarkerOperand {
    const token = this.tokens[this.index++];
    if (token?.type === 'string') return { kind: 'value', value: token.value };
    if (token?.type === 'name') {
      if (!MARKER_VARIABLES.has(token.value)) this.fail(`Unknown marker variable ${token.value}`);
      return { kind: 'variable', name: token.value };
    }
    return this.fail('Expected a marker variable or quoted value');
  }
}

export function parseMarker(text: string): MarkerNode {
  const tokens = tokenize(text);
  if (!tokens.length) throw new RequirementParseError('Empty marker', text);
  return new MarkerParser(tokens, text).parse();
}

export function* markerClauses(node: MarkerNode): Generator<MarkerClause> {
  if (node.kind === 'clause') {
    yield node;
    return;
  }
  for (const item of node.items) yield* markerClauses(item);
}

/** The literal an `extra == "..."` clause selects, searching the whole tree. */
export function getExtra(marker?: MarkerNode): string | undefined {
  if (!marker) return undefined;
  for (const clause of markerClauses(marker)) {
    if (clause.op !== '==') continue;
    const { left, right } = clause;
    if (left.kind === 'variable' && left.name === EXTRA_VARIABLE && right.kind === 'value') return right.value;
    if (right.kind === 'variable' && right.name === EXTRA_VARIABLE && left.kind === 'value') return left.value;
  }
  return undefined;
}
