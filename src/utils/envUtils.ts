/**
 * Utility functions for environment variable parsing
 */

const TRUTHY = ['1', 'true', 'yes', 'on'];
const FALSY = ['0', 'false', 'no', 'off'];

/**
 * Parse a boolean environment variable that accepts multiple truthy/falsy values:
 * - Truthy: "1", "true", "yes", "on" (case insensitive)
 * - Falsy: "0", "false", "no", "off" (case insensitive)
 * Anything else (including undefined/empty) yields `defaultValue`.
 */
export function parseBooleanEnv(envVar: string | undefined, defaultValue = false): boolean {
  if (!envVar) return defaultValue;
  const normalized = envVar.toLowerCase().trim();
  if (TRUTHY.includes(normalized)) return true;
  if (FALSY.includes(normalized)) return false;
  return defaultValue;
}

export function getBooleanEnv(name: string, defaultValue = false, env: NodeJS.ProcessEnv = process.env): boolean {
  return parseBooleanEnv(env[name], defaultValue);
}

/** Positive finite integer from env; anything else falls back. */
export function getPositiveIntEnv(name: string, defaultValue: number, env: NodeJS.ProcessEnv = process.env): number {
  const raw = env[name];
  if (raw === undefined || !raw.trim().length) return defaultValue;
  const value = Number.parseInt(raw, 10);
  return Number.isFinite(value) && value > 0 ? value : defaultValue;
}

export function getStringEnv(name: string, defaultValue: string, env: NodeJS.ProcessEnv = process.env): string {
  const raw = env[name];
  if (raw && raw.trim().length) return raw.trim();
  return defaultValue;
}

export function getOptionalStringEnv(name: string, env: NodeJS.ProcessEnv = process.env): string | undefined {
  const raw = env[name];
  return raw && raw.trim().length ? raw.trim() : undefined;
}
