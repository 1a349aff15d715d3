import type { Database } from '../infrastructure/db/index.js';
import {
  insertRule,
  findAllRules,
  findRuleById,
  updateRule as repoUpdate,
  patchRule as repoPatch,
  deleteRule as repoDelete,
  rowToRule,
} from '../infrastructure/db/index.js';
import type { RuleRow, RuleInput, PatchRuleInput } from '../infrastructure/db/index.js';
import type { AlertRule } from '../domain/rule.js';
import { compileRule } from './rule-engine.js';
import type { RuleEngine } from './rule-engine.js';

export type { RuleRow };

/** The part of the engine rule CRUD drives. */
export type RuleRegistry = Pick<RuleEngine, 'register' | 'update' | 'remove' | 'get'>;

/** Placeholder id used to validate a rule before the database assigns one. */
const DRAFT_ID = 'draft';

function toRule(id: string, input: RuleInput): AlertRule {
  return { id, ...input };
}

/** Registers or replaces the stored rule in the running engine. */
function apply(engine: RuleRegistry, row: RuleRow): void {
  const rule = rowToRule(row);
  if (engine.get(rule.id) === null) engine.register(rule);
  else engine.update(rule);
}

/**
 * Create a new rule.
 *
 * The rule is validated before it is stored, so a ParseError or
 * ConfigError leaves the database untouched.
 */
export async function createRule(db: Database, engine: RuleRegistry, input: RuleInput): Promise<RuleRow> {
  compileRule(toRule(DRAFT_ID, input));
  const row = await insertRule(db, input);
  apply(engine, row);
  return row;
}

/** List all rules (enabled and disabled). */
export async function listRules(db: Database): Promise<RuleRow[]> {
  return findAllRules(db);
}

/** Fetch a single rule by ID. Returns null if not found. */
export async function getRule(db: Database, ruleId: string): Promise<RuleRow | null> {
  const row = await findRuleById(db, ruleId);
  return row ?? null;
}

/** Full replace of a rule. Returns updated row or null if not found. */
export async function updateRuleFull(
  db: Database,
  engine: RuleRegistry,
  ruleId: string,
  input: RuleInput,
): Promise<RuleRow | null> {
  compileRule(toRule(ruleId, input));
  const row = await repoUpdate(db, ruleId, input);
  if (row === undefined) return null;
  apply(engine, row);
  return row;
}

/** Partial update of a rule. Returns updated row or null if not found. */
export async function patchRulePartial(
  db: Database,
  engine: RuleRegistry,
  ruleId: string,
  input: PatchRuleInput,
): Promise<RuleRow | null> {
  const existing = await findRuleById(db, ruleId);
  if (existing === undefined) return null;

  compileRule({ ...rowToRule(existing), ...input });
  const row = await repoPatch(db, ruleId, input);
  if (row === undefined) return null;
  apply(engine, row);
  return row;
}

/** Delete a rule. Returns true if deleted, false if not found. */
export async function removeRule(db: Database, engine: RuleRegistry, ruleId: string): Promise<boolean> {
  const deleted = await repoDelete(db, ruleId);
  if (deleted) engine.remove(ruleId);
  return deleted;
}
