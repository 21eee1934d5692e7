/**
 * ${VAR} substitution for tool configuration files
 */

import { isRecord } from '../utils/records';

const ENV_VAR_PATTERN = /\$\{([^}]+)\}/g;

export type EnvSource = Record<string, string | undefined>;

/**
 * Names of every ${VAR} reference in the value that the environment does not define.
 */
export function findMissingEnvVars(value: unknown, env: EnvSource): string[] {
  const missing = new Set<string>();

  const visit = (node: unknown): void => {
    if (typeof node === 'string') {
      for (const match of node.matchAll(ENV_VAR_PATTERN)) {
        if (env[match[1]] === undefined) {
          missing.add(match[1]);
        }
      }
    } else if (Array.isArray(node)) {
      node.forEach(visit);
    } else if (isRecord(node)) {
      Object.values(node).forEach(visit);
    }
  };

  visit(value);
  return Array.from(missing).sort();
}

/**
 * Replace ${VAR} references in every string of the value. Call
 * findMissingEnvVars first; unresolved references are left untouched.
 */
export function substituteEnvVars<T>(value: T, env: EnvSource): T;
export function substituteEnvVars(value: unknown, env: EnvSource): unknown {
  if (typeof value === 'string') {
    return value.replace(ENV_VAR_PATTERN, (whole: string, name: string) => env[name] ?? whole);
  }
  if (Array.isArray(value)) {
    return value.map((item) => substituteEnvVars(item, env));
  }
  if (isRecord(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [key, substituteEnvVars(item, env)]),
    );
  }
  return value;
}
