import type { NestedScoreMode } from 'policy-query-filter/elasticsearch';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const NESTED_SCORE_MODES = ['avg', 'max', 'min', 'sum', 'none'] as const;

export interface ServiceConfig {
  port: number;
  host: string;
  logLevel: LogLevel;
  /** Maximum request body size in bytes. */
  bodyLimit: number;
  nestedScoreMode?: NestedScoreMode;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function isOneOf<T extends string>(values: readonly T[], value: string): value is T {
  return (values as readonly string[]).includes(value);
}

function parseInteger(name: string, raw: string, min: number, max: number): number {
  const value = /^\d+$/.test(raw) ? parseInt(raw, 10) : NaN;
  if (Number.isNaN(value) || value < min || value > max) {
    throw new ConfigError(`${name} must be an integer between ${min} and ${max}, got '${raw}'`);
  }
  return value;
}

/** Reads the service configuration from environment variables. */
export function loadConfig(env: NodeJS.ProcessEnv): ServiceConfig {
  const port = parseInteger('PORT', env['PORT'] ?? '3000', 0, 65535);
  const host = env['HOST'] ?? '0.0.0.0';
  const bodyLimit = parseInteger('BODY_LIMIT', env['BODY_LIMIT'] ?? '1048576', 1, Number.MAX_SAFE_INTEGER);

  const logLevel = env['LOG_LEVEL'] ?? 'info';
  if (!isOneOf(LOG_LEVELS, logLevel)) {
    throw new ConfigError(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got '${logLevel}'`);
  }

  const nestedScoreMode = env['NESTED_SCORE_MODE'];
  if (nestedScoreMode === undefined || nestedScoreMode === '') {
    return { port, host, logLevel, bodyLimit };
  }
  if (!isOneOf(NESTED_SCORE_MODES, nestedScoreMode)) {
    throw new ConfigError(
      `NESTED_SCORE_MODE must be one of ${NESTED_SCORE_MODES.join(', ')}, got '${nestedScoreMode}'`,
    );
  }
  return { port, host, logLevel, bodyLimit, nestedScoreMode };
}
