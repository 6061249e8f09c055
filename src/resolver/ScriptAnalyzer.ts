/**
 * ScriptAnalyzer - Best-effort text scans over Power Query (M) script bodies.
 *
 * Nothing here parses the full grammar. A small tokenizer separates
 * comments, string literals and quoted identifiers (`#"..."`) from code so
 * that the scans do not match inside them.
 */

import { compareNames, nameKey } from '../types/ScriptRecord.js';

/**
 * Data-source functions recognized by default.
 */
export const DEFAULT_DATA_SOURCE_FUNCTIONS: readonly string[] = [
  'Sql.Database',
  'Web.Contents',
  'File.Contents',
  'Excel.Workbook',
  'Excel.CurrentWorkbook',
  'Csv.Document',
  'Json.Document',
  'Odbc.DataSource',
  'Folder.Files',
  'SharePoint.Files',
  'PowerBI.Dataflows',
];

export type TokenKind = 'comment' | 'string' | 'quoted' | 'identifier' | 'number' | 'whitespace' | 'punct';

export interface Token {
  kind: TokenKind;
  text: string;
}

export interface ScriptParameter {
  name: string;
  /** Declared type, `any` when absent, `unknown` when the entry could not be read */
  type: string;
  optional: boolean;
}

export type DataSourceKind = 'Literal' | 'Variable' | 'Record' | 'List' | 'Call' | 'Other';

export interface DataSourceCall {
  /** Data-source function, as configured (e.g. "Csv.Document") */
  function: string;
  /** First argument as written, comments removed */
  argument: string;
  /** Classification of the first argument, looking through one wrapping call */
  sourceType: DataSourceKind;
  /** Literal text, variable name, or the argument itself */
  sourceValue: string;
}

export interface ScriptAnalysis {
  parameters: ScriptParameter[];
  dataSources: DataSourceCall[];
  suggestedDependencies: string[];
}

const TOKEN_PATTERN =
  /(\/\/[^\n]*|\/\*[\s\S]*?(?:\*\/|$))|("(?:[^"]|"")*"?)|(#"(?:[^"]|"")*"?)|([\p{L}_][\p{L}\p{N}_.]*)|(\d+(?:\.\d+)?(?:[eE][+-]?\d+)?)|(\s+)|([\s\S])/gu;

const IDENTIFIER = /^[\p{L}_][\p{L}\p{N}_]*$/u;

/**
 * Split a script body into tokens. Concatenating the token texts gives the
 * input back.
 */
export function tokenize(body: string): Token[] {
  const tokens: Token[] = [];
  for (const match of body.matchAll(TOKEN_PATTERN)) {
    const [text, comment, str, quoted, identifier, num, space] = match;
    let kind: TokenKind = 'punct';
    if (comment !== undefined) kind = 'comment';
    else if (str !== undefined) kind = 'string';
    else if (quoted !== undefined) kind = 'quoted';
    else if (identifier !== undefined) kind = 'identifier';
    else if (num !== undefined) kind = 'number';
    else if (space !== undefined) kind = 'whitespace';
    tokens.push({ kind, text });
  }
  return tokens;
}

/**
 * Text of a string literal or quoted identifier with quotes removed and
 * doubled quotes unescaped.
 */
function unquote(text: string): string {
  const inner = text.startsWith('#"') ? text.slice(2) : text.slice(1);
  const closed = inner.endsWith('"') ? inner.slice(0, -1) : inner;
  return closed.replace(/""/g, '"');
}

/**
 * Index of the next token that is neither whitespace nor a comment.
 */
function nextSignificant(tokens: readonly Token[], from: number): number {
  let i = from;
  while (i < tokens.length) {
    const token = tokens[i];
    if (!token || (token.kind !== 'whitespace' && token.kind !== 'comment')) break;
    i++;
  }
  return i;
}

/**
 * Suggest dependencies from call-like references to known script names:
 * `Name(` or `#"Quoted Name"(`. Returns canonical names, sorted, without
 * the script itself.
 */
export function suggestDependencies(
  body: string,
  knownNames: Iterable<string>,
  selfName?: string
): string[] {
  const known = new Map<string, string>();
  for (const name of knownNames) {
    known.set(nameKey(name), name);
  }
  const selfKey = selfName !== undefined ? nameKey(selfName) : undefined;

  const tokens = tokenize(body);
  const found = new Set<string>();

  tokens.forEach((token, i) => {
    if (token.kind !== 'identifier' && token.kind !== 'quoted') return;
    if (tokens[nextSignificant(tokens, i + 1)]?.text !== '(') return;

    const candidate = token.kind === 'quoted' ? unquote(token.text) : token.text;
    const key = nameKey(candidate);
    const canonical = known.get(key);
    if (canonical !== undefined && key !== selfKey) {
      found.add(canonical);
    }
  });

  return [...found].sort(compareNames);
}

const PARAMETER_LIST = /\(([^()]*)\)(?:\s+as\s+[^=()]*?)?\s*=>/isu;
const PARAMETER = /^(optional\s+)?([\p{L}_][\p{L}\p{N}_]*|#"(?:[^"]|"")*")(?:\s+as\s+([\s\S]+?))?$/iu;

/**
 * Parameters of a function script such as
 * `(path as text, optional delimiter as nullable text) => ...`.
 *
 * @returns Empty list when the body is not a function
 */
export function findParameters(body: string): ScriptParameter[] {
  // Comments can hold parentheses and arrows; strings stay so positions line up
  const code = tokenize(body)
    .filter((token) => token.kind !== 'comment')
    .map((token) => token.text)
    .join('');

  const match = PARAMETER_LIST.exec(code);
  const list = match?.[1]?.trim();
  if (!list) return [];

  const parameters: ScriptParameter[] = [];
  for (const raw of list.split(',')) {
    const part = raw.trim();
    if (part.length === 0) continue;

    const param = PARAMETER.exec(part);
    const name = param?.[2];
    if (!param || name === undefined) {
      parameters.push({ name: part, type: 'unknown', optional: false });
      continue;
    }

    parameters.push({
      name: name.startsWith('#"') ? unquote(name) : name,
      type: param[3]?.trim() || 'any',
      optional: param[1] !== undefined,
    });
  }
  return parameters;
}

const OPENERS = new Set(['(', '[', '{']);
const CLOSERS = new Set([')', ']', '}']);

/**
 * Collect the tokens of the first argument of a call whose opening
 * parenthesis is at `open`. Returns undefined when the call is not closed.
 */
function firstArgument(tokens: readonly Token[], open: number): { tokens: Token[]; end: number } | undefined {
  let depth = 0;
  const collected: Token[] = [];

  for (let i = open + 1; i < tokens.length; i++) {
    const token = tokens[i];
    if (!token) break;

    if (token.kind === 'punct') {
      if (OPENERS.has(token.text)) {
        depth++;
      } else if (CLOSERS.has(token.text)) {
        if (depth === 0) return { tokens: collected, end: i };
        depth--;
      } else if (token.text === ',' && depth === 0) {
        return { tokens: collected, end: i };
      }
    }

    if (token.kind !== 'comment') collected.push(token);
  }

  return undefined;
}

/**
 * Classify a data-source argument. A call wrapping a literal or a variable
 * (`File.Contents(path)`) reports what it wraps.
 */
export function classifyArgument(argument: string): { type: DataSourceKind; value: string } {
  const tokens = tokenize(argument.trim()).filter((token) => token.kind !== 'whitespace' && token.kind !== 'comment');
  const [head] = tokens;
  if (!head) return { type: 'Other', value: '' };

  if (tokens.length === 1) {
    if (head.kind === 'string') return { type: 'Literal', value: unquote(head.text) };
    if (head.kind === 'quoted') return { type: 'Variable', value: unquote(head.text) };
    if (head.kind === 'identifier' && IDENTIFIER.test(head.text)) return { type: 'Variable', value: head.text };
  }

  if (head.text === '[') return { type: 'Record', value: argument.trim() };
  if (head.text === '{') return { type: 'List', value: argument.trim() };

  const all = tokenize(argument.trim());
  const callee = nextSignificant(all, 0);
  const open = nextSignificant(all, callee + 1);
  if (all[callee]?.kind === 'identifier' && all[open]?.text === '(') {
    const inner = firstArgument(all, open);
    if (inner) {
      const wrapped = classifyArgument(inner.tokens.map((token) => token.text).join(''));
      if (wrapped.type === 'Literal' || wrapped.type === 'Variable') {
        return wrapped;
      }
    }
    return { type: 'Call', value: argument.trim() };
  }

  return { type: 'Other', value: argument.trim() };
}

/**
 * Calls of data-source functions with their first argument classified.
 */
export function findDataSources(
  body: string,
  functions: readonly string[] = DEFAULT_DATA_SOURCE_FUNCTIONS
): DataSourceCall[] {
  const lookup = new Map(functions.map((fn) => [fn.toLowerCase(), fn] as const));
  const tokens = tokenize(body);
  const sources: DataSourceCall[] = [];

  let i = 0;
  while (i < tokens.length) {
    const token = tokens[i];
    const fn = token?.kind === 'identifier' ? lookup.get(token.text.toLowerCase()) : undefined;
    const open = nextSignificant(tokens, i + 1);

    if (fn !== undefined && tokens[open]?.text === '(') {
      const arg = firstArgument(tokens, open);
      if (arg) {
        const argument = arg.tokens.map((t) => t.text).join('').trim();
        const source = classifyArgument(argument);
        sources.push({ function: fn, argument, sourceType: source.type, sourceValue: source.value });
        // A source wrapped in the argument is reported through this call
        i = arg.end;
        continue;
      }
    }
    i++;
  }

  return sources;
}

/**
 * Run every scan over one body.
 */
export function analyzeScript(
  body: string,
  knownNames: Iterable<string>,
  options: { selfName?: string; dataSourceFunctions?: readonly string[] } = {}
): ScriptAnalysis {
  return {
    parameters: findParameters(body),
    dataSources: findDataSources(body, options.dataSourceFunctions),
    suggestedDependencies: suggestDependencies(body, knownNames, options.selfName),
  };
}
