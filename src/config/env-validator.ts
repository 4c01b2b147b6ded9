/**
 * Startup configuration validator.
 *
 * Reports missing required keys, malformed values and which optional features are active.
 * No secret values are ever included in the output.
 */

import { CONFIG_SCHEMA } from './env-schema.js';
import type { ConfigCondition, ConfigKeySpec } from './env-schema.js';
import type { VoxloopConfig } from './json-config.js';

export type ConfigIssueClass = 'missing_required' | 'format_error';

export interface ConfigIssue {
  key: string;
  class: ConfigIssueClass;
  message: string;
  remediation: string;
}

export interface ConfigValidationResult {
  /** true when nothing fatal was found. */
  ok: boolean;
  issues: ConfigIssue[];
  activeFeatures: ConfigCondition[];
  fatalIssues: ConfigIssue[];
  validatedAt: string;
}

type Env = Record<string, string | undefined>;

/** Keys that may also be supplied through the config file instead of the environment. */
function configValue(config: VoxloopConfig, key: string): string {
  switch (key) {
    case 'API_SECRET':
      return config.runtime.apiSecret;
    case 'GROQ_API_KEY':
      return config.speech.groqApiKey;
    case 'LOCAL_TTS_COMMAND':
      return config.speech.localTtsCommand;
    default:
      return '';
  }
}

function hasValue(spec: ConfigKeySpec, env: Env, config?: VoxloopConfig): boolean {
  const raw = env[spec.key];
  if (typeof raw === 'string' && raw.trim().length > 0) {
    return true;
  }
  return config ? configValue(config, spec.key).trim().length > 0 : false;
}

function formatError(spec: ConfigKeySpec, raw: string): string | null {
  const value = raw.trim();
  switch (spec.format) {
    case 'port': {
      const parsed = Number(value);
      if (!Number.isInteger(parsed) || parsed < 1 || parsed > 65535) {
        return `${spec.key} must be an integer in range 1-65535, got '${value}'.`;
      }
      return null;
    }
    case 'positive_int': {
      const parsed = Number(value);
      if (!Number.isInteger(parsed) || parsed <= 0) {
        return `${spec.key} must be a positive integer, got '${value}'.`;
      }
      return null;
    }
    case 'url':
      return /^https?:\/\/\S+$/i.test(value) ? null : `${spec.key} must be an http(s) URL.`;
    case 'backend_id':
      return /^[a-z0-9][a-z0-9._-]*$/i.test(value) ? null : `${spec.key} must be a backend id, got '${value}'.`;
    default:
      return null;
  }
}

export function validateEnvironment(env: Env = process.env, config?: VoxloopConfig): ConfigValidationResult {
  const issues: ConfigIssue[] = [];
  const activeFeatures = new Set<ConfigCondition>();

  for (const spec of CONFIG_SCHEMA) {
    const present = hasValue(spec, env, config);

    if (spec.class === 'required' && !present) {
      issues.push({
        key: spec.key,
        class: 'missing_required',
        message: `Required key '${spec.key}' is not set.`,
        remediation: spec.remediation,
      });
      continue;
    }
    if (spec.class === 'conditional' && spec.condition && present) {
      activeFeatures.add(spec.condition);
    }

    const raw = env[spec.key];
    if (spec.type === 'env' && raw) {
      const message = formatError(spec, raw);
      if (message) {
        issues.push({ key: spec.key, class: 'format_error', message, remediation: spec.remediation });
      }
    }
  }

  const fatalIssues = issues.filter((issue) => issue.class === 'missing_required');
  return {
    ok: fatalIssues.length === 0,
    issues,
    activeFeatures: [...activeFeatures],
    fatalIssues,
    validatedAt: new Date().toISOString(),
  };
}
