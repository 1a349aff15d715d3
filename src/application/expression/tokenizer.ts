import { ParseError } from '../../domain/errors.js';

export type ComparisonOperator = '>' | '<' | '>=' | '<=' | '==' | '!=';

export type Token =
  | { readonly kind: 'number'; readonly value: number; readonly text: string; readonly position: number }
  | { readonly kind: 'string'; readonly value: string; readonly position: number }
  | { readonly kind: 'identifier'; readonly name: string; readonly position: number }
  | { readonly kind: 'keyword'; readonly keyword: Keyword; readonly position: number }
  | { readonly kind: 'operator'; readonly operator: ComparisonOperator; readonly position: number }
  | { readonly kind: 'lparen' | 'rparen' | 'dot' | 'eof'; readonly position: number };

export type Keyword = 'and' | 'or' | 'not' | 'true' | 'false';

const KEYWORDS: ReadonlySet<string> = new Set<Keyword>(['and', 'or', 'not', 'true', 'false']);

/** Conditions longer than this are rejected outright. */
export const MAX_CONDITION_LENGTH = 2048;

const IDENT_START = /[A-Za-z_]/;
const IDENT_PART = /[A-Za-z0-9_]/;
const DIGIT = /[0-9]/;
const WHITESPACE = /\s/;

function isKeyword(word: string): word is Keyword {
  return KEYWORDS.has(word);
}

/** Tokens after which a `-` is a binary position, so it cannot start a number. */
function endsOperand(token: Token | undefined): boolean {
  if (token === undefined) return false;
  switch (token.kind) {
    case 'number':
    case 'string':
    case 'identifier':
    case 'rparen':
      return true;
    case 'keyword':
      return token.keyword === 'true' || token.keyword === 'false';
    default:
      return false;
  }
}

/**
 * Splits a rule condition into tokens.
 *
 * Digits directly after a `.` are read as an integer path segment
 * (`percentiles.95`), never as a decimal.
 */
export function tokenize(source: string): Token[] {
  if (source.length > MAX_CONDITION_LENGTH) {
    throw new ParseError(`Condition exceeds ${MAX_CONDITION_LENGTH} characters`, MAX_CONDITION_LENGTH);
  }

  const tokens: Token[] = [];
  let i = 0;

  while (i < source.length) {
    const ch = source.charAt(i);

    if (WHITESPACE.test(ch)) {
      i++;
      continue;
    }

    const start = i;
    const previous = tokens.at(-1);

    if (ch === '(' || ch === ')') {
      tokens.push({ kind: ch === '(' ? 'lparen' : 'rparen', position: start });
      i++;
      continue;
    }

    if (ch === '.') {
      tokens.push({ kind: 'dot', position: start });
      i++;
      continue;
    }

    if (ch === '>' || ch === '<' || ch === '=' || ch === '!') {
      const two = source.slice(i, i + 2);
      if (two === '>=' || two === '<=' || two === '==' || two === '!=') {
        tokens.push({ kind: 'operator', operator: two, position: start });
        i += 2;
        continue;
      }
      if (ch === '>' || ch === '<') {
        tokens.push({ kind: 'operator', operator: ch, position: start });
        i++;
        continue;
      }
      throw new ParseError(ch === '=' ? 'Unexpected "=", use "==" for equality' : 'Unexpected "!", use "not" or "!="', start);
    }

    if (ch === '"' || ch === "'") {
      const quote = ch;
      let value = '';
      i++;
      let closed = false;
      while (i < source.length) {
        const c = source.charAt(i);
        if (c === '\\') {
          const next = source.charAt(i + 1);
          if (next === '') break;
          value += next === 'n' ? '\n' : next === 't' ? '\t' : next;
          i += 2;
          continue;
        }
        if (c === quote) {
          closed = true;
          i++;
          break;
        }
        value += c;
        i++;
      }
      if (!closed) throw new ParseError('Unterminated string literal', start);
      tokens.push({ kind: 'string', value, position: start });
      continue;
    }

    if (previous?.kind === 'dot' && DIGIT.test(ch)) {
      while (i < source.length && DIGIT.test(source.charAt(i))) i++;
      tokens.push({ kind: 'identifier', name: source.slice(start, i), position: start });
      continue;
    }

    const signed = ch === '-' && DIGIT.test(source.charAt(i + 1)) && !endsOperand(previous);
    if (DIGIT.test(ch) || signed) {
      if (signed) i++;
      while (i < source.length && DIGIT.test(source.charAt(i))) i++;
      if (source.charAt(i) === '.' && DIGIT.test(source.charAt(i + 1))) {
        i++;
        while (i < source.length && DIGIT.test(source.charAt(i))) i++;
      }
      if (source.charAt(i) === 'e' || source.charAt(i) === 'E') {
        let j = i + 1;
        if (source.charAt(j) === '+' || source.charAt(j) === '-') j++;
        if (DIGIT.test(source.charAt(j))) {
          i = j;
          while (i < source.length && DIGIT.test(source.charAt(i))) i++;
        }
      }
      const text = source.slice(start, i);
      const value = Number(text);
      if (!Number.isFinite(value)) throw new ParseError(`Invalid number "${text}"`, start);
      tokens.push({ kind: 'number', value, text, position: start });
      continue;
    }

    if (IDENT_START.test(ch)) {
      while (i < source.length && IDENT_PART.test(source.charAt(i))) i++;
      const word = source.slice(start, i);
      if (isKeyword(word)) {
        tokens.push({ kind: 'keyword', keyword: word, position: start });
      } else {
        tokens.push({ kind: 'identifier', name: word, position: start });
      }
      continue;
    }

    throw new ParseError(`Unexpected character "${ch}"`, start);
  }

  tokens.push({ kind: 'eof', position: source.length });
  return tokens;
}
