export { rules, alerts, alertHistory } from './schema.js';
export { createDbClient } from './client.js';
export type { Database, SqlClient } from './client.js';
export { ensureSchema } from './migrate.js';
export {
  insertRule,
  findAllRules,
  findRuleById,
  updateRule,
  patchRule,
  deleteRule,
  rowToRule,
} from './rule-repository.js';
export type { RuleRow, RuleInput, PatchRuleInput } from './rule-repository.js';
export { upsertAlert, insertAlertHistory, findAlertHistory } from './alert-repository.js';
export type { AlertRow, AlertHistoryRow } from './alert-repository.js';
export { default as dbPlugin } from './db-plugin.js';
export type { DbPluginOptions } from './db-plugin.js';
export { createAlertRecorder } from './alert-recorder.js';
export type { AlertRecorder } from './alert-recorder.js';
