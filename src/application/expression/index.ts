export { tokenize, MAX_CONDITION_LENGTH } from './tokenizer.js';
export type { Token, Keyword, ComparisonOperator } from './tokenizer.js';
export { parseCondition, referencedPaths, MAX_DEPTH } from './parser.js';
export type { Expression, LiteralValue } from './parser.js';
export { evaluateCondition, evaluate } from './evaluator.js';
export type { EvaluationContext, EvaluationOutcome } from './evaluator.js';
