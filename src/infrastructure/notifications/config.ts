import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import type { NotificationChannel } from '../../domain/rule.js';
import { NOTIFICATION_CHANNELS } from '../../domain/rule.js';

/**
 * Notification channel configuration loaded from YAML.
 */
export interface NotificationConfig {
  slack: { enabled: boolean; webhook_url: string };
  email: { enabled: boolean; smtp_host: string; recipients: string[] };
  webhook: { enabled: boolean; url: string; headers: Record<string, string>; timeout_ms: number };
  /** Channels used when an escalating rule names none of its own. */
  escalation: { channels: NotificationChannel[] };
}

/**
 * Default configuration: every channel disabled, no default escalation.
 */
export const DEFAULT_CONFIG: NotificationConfig = {
  slack: { enabled: false, webhook_url: '' },
  email: { enabled: false, smtp_host: '', recipients: [] },
  webhook: { enabled: false, url: '', headers: {}, timeout_ms: 5000 },
  escalation: { channels: [] },
};

type YamlScalar = string | number | boolean;
type YamlValue = YamlScalar | string[] | Record<string, string>;
type YamlSection = Record<string, YamlValue>;

function unquote(value: string): string {
  if (value.length >= 2) {
    const first = value[0];
    if ((first === '"' || first === "'") && value.endsWith(first)) return value.slice(1, -1);
  }
  return value;
}

function parseScalar(raw: string): YamlScalar | string[] {
  const value = raw.trim();
  if (value === '[]') return [];
  if (value.startsWith('[') && value.endsWith(']')) {
    return value.slice(1, -1).split(',').map((item) => unquote(item.trim())).filter((item) => item !== '');
  }
  if (value === 'true') return true;
  if (value === 'false') return false;
  if (/^-?\d+(\.\d+)?$/.test(value)) return Number(value);
  return unquote(value);
}

function indentOf(line: string): number {
  return line.length - line.trimStart().length;
}

/**
 * Minimal YAML parser for the notification config structure.
 *
 * Handles only the subset used in config/notifications.yaml: top-level
 * sections holding scalars, inline or dashed string lists, and one level
 * of nested string maps (webhook headers). Not a general-purpose parser.
 */
export function parseSimpleYaml(content: string): Record<string, YamlSection> {
  const result: Record<string, YamlSection> = {};
  let section: YamlSection | null = null;
  let currentKey = '';
  let keyIndent = 0;

  for (const rawLine of content.split('\n')) {
    const line = rawLine.trimEnd();
    const trimmed = line.trim();
    if (trimmed === '' || trimmed.startsWith('#')) continue;

    const indent = indentOf(line);

    if (indent === 0) {
      const colonIdx = trimmed.indexOf(':');
      if (colonIdx === -1) continue;
      section = {};
      result[trimmed.slice(0, colonIdx).trim()] = section;
      currentKey = '';
      continue;
    }
    if (section === null) continue;

    if (trimmed.startsWith('- ')) {
      const existing = section[currentKey];
      const list = Array.isArray(existing) ? existing : [];
      list.push(unquote(trimmed.slice(2).trim()));
      section[currentKey] = list;
      continue;
    }

    const colonIdx = trimmed.indexOf(':');
    if (colonIdx === -1) continue;
    const key = trimmed.slice(0, colonIdx).trim();
    const rawValue = trimmed.slice(colonIdx + 1);

    const parent = section[currentKey];
    if (currentKey !== '' && indent > keyIndent && (parent === '' || (typeof parent === 'object' && !Array.isArray(parent)))) {
      const nested: Record<string, string> = typeof parent === 'object' && !Array.isArray(parent) ? parent : {};
      nested[key] = unquote(rawValue.trim());
      section[currentKey] = nested;
      continue;
    }

    section[key] = parseScalar(rawValue);
    currentKey = key;
    keyIndent = indent;
  }

  return result;
}

function bool(section: YamlSection, key: string, fallback: boolean): boolean {
  const value = section[key];
  return typeof value === 'boolean' ? value : fallback;
}

function str(section: YamlSection, key: string, fallback: string): string {
  const value = section[key];
  return typeof value === 'string' ? value : fallback;
}

function num(section: YamlSection, key: string, fallback: number): number {
  const value = section[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function list(section: YamlSection, key: string, fallback: string[]): string[] {
  const value = section[key];
  return Array.isArray(value) ? value : fallback;
}

function map(section: YamlSection, key: string, fallback: Record<string, string>): Record<string, string> {
  const value = section[key];
  return typeof value === 'object' && !Array.isArray(value) ? value : fallback;
}

function channels(values: readonly string[]): NotificationChannel[] {
  return NOTIFICATION_CHANNELS.filter((channel) => values.includes(channel));
}

/**
 * Loads notification configuration from the YAML file.
 *
 * Falls back to DEFAULT_CONFIG if the file is missing or unparseable.
 * Merges loaded values over defaults so missing keys get default values.
 * Unknown escalation channel names are ignored.
 */
export function loadNotificationConfig(configPath?: string): NotificationConfig {
  const filePath = configPath ?? resolve(process.cwd(), 'config', 'notifications.yaml');

  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch {
    return structuredClone(DEFAULT_CONFIG);
  }

  const parsed = parseSimpleYaml(content);
  const slack = parsed['slack'] ?? {};
  const email = parsed['email'] ?? {};
  const webhook = parsed['webhook'] ?? {};
  const escalation = parsed['escalation'] ?? {};
  const defaults = DEFAULT_CONFIG;

  return {
    slack: {
      enabled: bool(slack, 'enabled', defaults.slack.enabled),
      webhook_url: str(slack, 'webhook_url', defaults.slack.webhook_url),
    },
    email: {
      enabled: bool(email, 'enabled', defaults.email.enabled),
      smtp_host: str(email, 'smtp_host', defaults.email.smtp_host),
      recipients: list(email, 'recipients', [...defaults.email.recipients]),
    },
    webhook: {
      enabled: bool(webhook, 'enabled', defaults.webhook.enabled),
      url: str(webhook, 'url', defaults.webhook.url),
      headers: map(webhook, 'headers', { ...defaults.webhook.headers }),
      timeout_ms: num(webhook, 'timeout_ms', defaults.webhook.timeout_ms),
    },
    escalation: {
      channels: channels(list(escalation, 'channels', [...defaults.escalation.channels])),
    },
  };
}
