/**
 * Environment variable validation
 *
 * Validates required environment variables at startup and fails fast
 * if any are missing.
 */

import { logInfo, logWarn, logError } from "../utils/logger";

type NodeEnv = 'development' | 'production' | 'test';

export interface EnvConfig {
  // Required
  GEMINI_API_KEY: string;

  // Optional with defaults
  PORT: number;
  NODE_ENV: NodeEnv;
  CORPUS_PATH: string;
}

const REQUIRED_VARS = [
  'GEMINI_API_KEY',
] as const;

const OPTIONAL_VARS_WITH_DEFAULTS = {
  PORT: '5000',
  NODE_ENV: 'development',
  CORPUS_PATH: 'data/corpus.json',
} as const;

const NODE_ENVS: readonly NodeEnv[] = ['development', 'production', 'test'];

function parseNodeEnv(raw: string | undefined): NodeEnv {
  return NODE_ENVS.find((env) => env === raw) ?? 'development';
}

function parsePort(raw: string | undefined): number {
  const port = parseInt(raw || OPTIONAL_VARS_WITH_DEFAULTS.PORT, 10);
  return Number.isInteger(port) && port > 0 && port < 65536 ? port : parseInt(OPTIONAL_VARS_WITH_DEFAULTS.PORT, 10);
}

/**
 * Validates that all required environment variables are set.
 * Call this at app startup before any other initialization.
 *
 * @throws Error if any required variables are missing
 */
export function validateEnv(): void {
  const missing: string[] = [];
  const warnings: string[] = [];

  for (const varName of REQUIRED_VARS) {
    const value = process.env[varName];
    if (!value || value.trim() === '') {
      missing.push(varName);
    }
  }

  const rawPort = process.env.PORT;
  if (rawPort && parsePort(rawPort) !== parseInt(rawPort, 10)) {
    warnings.push(`PORT="${rawPort}" is not a valid port - falling back to ${OPTIONAL_VARS_WITH_DEFAULTS.PORT}`);
  }

  if (process.env.NODE_ENV && parseNodeEnv(process.env.NODE_ENV) !== process.env.NODE_ENV) {
    warnings.push(`NODE_ENV="${process.env.NODE_ENV}" is not recognized - treating as development`);
  }

  for (const warning of warnings) {
    logWarn("env_warning", { warning });
  }

  // Fail if required vars are missing
  if (missing.length > 0) {
    const message = `Missing required environment variables:\n${missing.map(v => `  - ${v}`).join('\n')}`;
    logError("startup_failed", { missing });
    throw new Error(message);
  }

  logInfo("env_validated");
}

/**
 * Get a validated environment configuration object.
 * Only call after validateEnv() has succeeded.
 */
export function getEnvConfig(): EnvConfig {
  return {
    GEMINI_API_KEY: requireEnvVar('GEMINI_API_KEY'),
    PORT: parsePort(process.env.PORT),
    NODE_ENV: parseNodeEnv(process.env.NODE_ENV),
    CORPUS_PATH: getEnvVar('CORPUS_PATH', OPTIONAL_VARS_WITH_DEFAULTS.CORPUS_PATH),
  };
}

/**
 * Type-safe environment variable getter with default.
 * Use for optional variables that have sensible defaults.
 */
export function getEnvVar(name: string, defaultValue: string): string {
  return process.env[name] || defaultValue;
}

/**
 * Type-safe required environment variable getter.
 * Throws if the variable is not set. Use after validateEnv().
 */
export function requireEnvVar(name: string): string {
  const value = process.env[name];
  if (!value || value.trim() === '') {
    throw new Error(`Required environment variable ${name} is not set`);
  }
  return value;
}
