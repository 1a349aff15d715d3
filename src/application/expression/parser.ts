import { ParseError } from '../../domain/errors.js';
import { tokenize } from './tokenizer.js';
import type { ComparisonOperator, Token } from './tokenizer.js';

export type { ComparisonOperator } from './tokenizer.js';

export type LiteralValue = number | string | boolean;

/** Immutable expression tree produced by `parseCondition`. */
export type Expression =
  | { readonly type: 'literal'; readonly value: LiteralValue }
  | { readonly type: 'path'; readonly segments: readonly string[]; readonly text: string }
  | { readonly type: 'not'; readonly operand: Expression }
  | { readonly type: 'logical'; readonly operator: 'and' | 'or'; readonly left: Expression; readonly right: Expression }
  | {
      readonly type: 'comparison';
      readonly operator: ComparisonOperator;
      readonly left: Expression;
      readonly right: Expression;
    };

/** Nesting limit for parentheses and `not` chains. */
export const MAX_DEPTH = 64;

/**
 * Recursive-descent parser over the condition grammar:
 *
 * ```
 * or         := and ("or" and)*
 * and        := unary ("and" unary)*
 * unary      := "not" unary | comparison
 * comparison := primary (op primary)?
 * primary    := number | string | "true" | "false" | path | "(" or ")"
 * path       := identifier ("." (identifier | integer))*
 * ```
 *
 * Comparisons do not chain: `a < b < c` is rejected.
 */
class Parser {
  private index = 0;
  private depth = 0;

  constructor(private readonly tokens: readonly Token[]) {}

  parse(): Expression {
    const expr = this.parseOr();
    const next = this.peek();
    if (next.kind !== 'eof') {
      throw new ParseError(`Unexpected ${describeToken(next)}`, next.position);
    }
    return expr;
  }

  private parseOr(): Expression {
    let left = this.parseAnd();
    while (this.matchKeyword('or')) {
      const right = this.parseAnd();
      left = node({ type: 'logical', operator: 'or', left, right });
    }
    return left;
  }

  private parseAnd(): Expression {
    let left = this.parseUnary();
    while (this.matchKeyword('and')) {
      const right = this.parseUnary();
      left = node({ type: 'logical', operator: 'and', left, right });
    }
    return left;
  }

  private parseUnary(): Expression {
    const token = this.peek();
    if (token.kind === 'keyword' && token.keyword === 'not') {
      this.index++;
      this.enter(token.position);
      const operand = this.parseUnary();
      this.depth--;
      return node({ type: 'not', operand });
    }
    return this.parseComparison();
  }

  private parseComparison(): Expression {
    const left = this.parsePrimary();
    const token = this.peek();
    if (token.kind !== 'operator') return left;

    this.index++;
    const right = this.parsePrimary();
    const trailing = this.peek();
    if (trailing.kind === 'operator') {
      throw new ParseError('Comparisons cannot be chained, combine them with "and"', trailing.position);
    }
    return node({ type: 'comparison', operator: token.operator, left, right });
  }

  private parsePrimary(): Expression {
    const token = this.next();
    switch (token.kind) {
      case 'number':
        return node({ type: 'literal', value: token.value });
      case 'string':
        return node({ type: 'literal', value: token.value });
      case 'keyword':
        if (token.keyword === 'true' || token.keyword === 'false') {
          return node({ type: 'literal', value: token.keyword === 'true' });
        }
        throw new ParseError(`Unexpected keyword "${token.keyword}"`, token.position);
      case 'identifier':
        return this.parsePath(token.name);
      case 'lparen': {
        this.enter(token.position);
        const inner = this.parseOr();
        this.depth--;
        const closing = this.next();
        if (closing.kind !== 'rparen') {
          throw new ParseError(`Expected ")" but found ${describeToken(closing)}`, closing.position);
        }
        return inner;
      }
      default:
        throw new ParseError(`Expected a value but found ${describeToken(token)}`, token.position);
    }
  }

  private parsePath(head: string): Expression {
    const segments = [head];
    while (this.peek().kind === 'dot') {
      this.index++;
      const segment = this.next();
      if (segment.kind === 'identifier') {
        segments.push(segment.name);
      } else if (segment.kind === 'keyword') {
        segments.push(segment.keyword);
      } else {
        throw new ParseError(`Expected a field name after "." but found ${describeToken(segment)}`, segment.position);
      }
    }
    return node({ type: 'path', segments: Object.freeze(segments), text: segments.join('.') });
  }

  private enter(position: number): void {
    this.depth++;
    if (this.depth > MAX_DEPTH) {
      throw new ParseError(`Expression nesting exceeds ${MAX_DEPTH} levels`, position);
    }
  }

  private matchKeyword(keyword: 'and' | 'or'): boolean {
    const token = this.peek();
    if (token.kind === 'keyword' && token.keyword === keyword) {
      this.index++;
      return true;
    }
    return false;
  }

  private peek(): Token {
    return this.tokens[this.index] ?? this.eof();
  }

  private next(): Token {
    const token = this.peek();
    if (token.kind !== 'eof') this.index++;
    return token;
  }

  private eof(): Token {
    const last = this.tokens.at(-1);
    return { kind: 'eof', position: last?.position ?? 0 };
  }
}

function node(expr: Expression): Expression {
  return Object.freeze(expr);
}

function describeToken(token: Token): string {
  switch (token.kind) {
    case 'number':
      return `number ${token.text}`;
    case 'string':
      return `string "${token.value}"`;
    case 'identifier':
      return `"${token.name}"`;
    case 'keyword':
      return `"${token.keyword}"`;
    case 'operator':
      return `"${token.operator}"`;
    case 'lparen':
      return '"("';
    case 'rparen':
      return '")"';
    case 'dot':
      return '"."';
    case 'eof':
      return 'end of condition';
  }
}

/**
 * Parses a rule condition into an immutable expression tree.
 * Throws `ParseError` for malformed input, including an empty condition.
 */
export function parseCondition(source: string): Expression {
  if (source.trim() === '') {
    throw new ParseError('Condition cannot be empty', 0);
  }
  return new Parser(tokenize(source)).parse();
}

/** Every dotted path the expression reads, in first-seen order. */
export function referencedPaths(expr: Expression): string[] {
  const seen = new Set<string>();
  const visit = (e: Expression): void => {
    switch (e.type) {
      case 'path':
        seen.add(e.text);
        return;
      case 'not':
        visit(e.operand);
        return;
      case 'logical':
      case 'comparison':
        visit(e.left);
        visit(e.right);
        return;
      case 'literal':
        return;
    }
  };
  visit(expr);
  return [...seen];
}
