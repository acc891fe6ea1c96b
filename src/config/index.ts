/**
 * Configuration for the type mapper.
 *
 * Values come from explicit overrides first, then environment variables,
 * then defaults:
 *
 * - `TAXON_MAPPER_ENV` (falls back to `NODE_ENV`): development, test, production
 * - `TAXON_MAPPER_LOG_LEVEL`: trace, debug, info, warn, error, fatal, silent
 * - `TAXON_MAPPER_OVERLAP_POLICY`: first_match, warn, error
 */

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * What resolution does when more than one mapper can handle a type.
 *
 * - `first_match`: take the earliest registered mapper, stop scanning
 * - `warn`: take the earliest registered mapper, log the overlap
 * - `error`: refuse to resolve the type
 */
export const OVERLAP_POLICIES = ['first_match', 'warn', 'error'] as const;

export type OverlapPolicy = (typeof OVERLAP_POLICIES)[number];

export interface MapperConfig {
  /** Deployment environment (default: "development") */
  environment: string;

  /** Minimum log level (default: "silent" under test, otherwise "info") */
  logLevel: LogLevel;

  /** Handling of overlapping mappers (default: "first_match") */
  overlapPolicy: OverlapPolicy;

  /** Pretty-print logs through pino-pretty (default: only in development) */
  prettyLogs: boolean;
}

/**
 * Error raised for invalid configuration values.
 */
export class ConfigurationError extends Error {
  readonly variable: string;

  constructor(variable: string, value: string, allowed: readonly string[]) {
    super(`Invalid value '${value}' for ${variable}. Expected one of: ${allowed.join(', ')}`);
    this.name = 'ConfigurationError';
    this.variable = variable;
  }
}

type Env = Record<string, string | undefined>;

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function isOverlapPolicy(value: string): value is OverlapPolicy {
  return OVERLAP_POLICIES.some((policy) => policy === value);
}

function readLogLevel(env: Env, environment: string): LogLevel {
  const raw = env.TAXON_MAPPER_LOG_LEVEL?.trim().toLowerCase();
  if (!raw) {
    return environment === 'test' ? 'silent' : 'info';
  }
  if (!isLogLevel(raw)) {
    throw new ConfigurationError('TAXON_MAPPER_LOG_LEVEL', raw, LOG_LEVELS);
  }
  return raw;
}

function readOverlapPolicy(env: Env): OverlapPolicy {
  const raw = env.TAXON_MAPPER_OVERLAP_POLICY?.trim().toLowerCase();
  if (!raw) {
    return 'first_match';
  }
  if (!isOverlapPolicy(raw)) {
    throw new ConfigurationError('TAXON_MAPPER_OVERLAP_POLICY', raw, OVERLAP_POLICIES);
  }
  return raw;
}

/**
 * Build configuration from environment variables.
 *
 * @param env - Environment to read (default: process.env)
 * @throws ConfigurationError if a variable holds an unknown value
 */
export function loadConfig(env: Env = process.env): MapperConfig {
  const environment = env.TAXON_MAPPER_ENV?.trim() || env.NODE_ENV?.trim() || 'development';

  return {
    environment,
    logLevel: readLogLevel(env, environment),
    overlapPolicy: readOverlapPolicy(env),
    prettyLogs: environment === 'development',
  };
}

/**
 * Merge explicit overrides over the environment-derived configuration.
 */
export function resolveConfig(overrides: Partial<MapperConfig> = {}, env: Env = process.env): MapperConfig {
  const base = loadConfig(env);
  const { environment, logLevel, overlapPolicy, prettyLogs } = overrides;

  if (logLevel !== undefined && (typeof logLevel !== 'string' || !isLogLevel(logLevel))) {
    throw new ConfigurationError('logLevel', String(logLevel), LOG_LEVELS);
  }
  if (
    overlapPolicy !== undefined &&
    (typeof overlapPolicy !== 'string' || !isOverlapPolicy(overlapPolicy))
  ) {
    throw new ConfigurationError('overlapPolicy', String(overlapPolicy), OVERLAP_POLICIES);
  }

  return {
    environment: environment ?? base.environment,
    logLevel: logLevel ?? base.logLevel,
    overlapPolicy: overlapPolicy ?? base.overlapPolicy,
    prettyLogs: prettyLogs ?? base.prettyLogs,
  };
}
