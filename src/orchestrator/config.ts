/**
 * Environment configuration
 */

import { DEFAULT_ORCHESTRATOR_CONFIG, OrchestratorConfig } from './interfaces/types';
import { LogLevel, isLogLevel } from './metrics/logger';

export interface ApiEnvConfig {
  port: number;
  apiKeys: string[];
}

export interface EnvConfig {
  orchestrator: OrchestratorConfig;
  api: ApiEnvConfig;
  logLevel: LogLevel;
}

function parseInteger(value: string | undefined, fallback: number, min: number = 0): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) || parsed < min ? fallback : parsed;
}

/**
 * Read configuration from environment variables.
 * Missing or malformed values fall back to the defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const defaults = DEFAULT_ORCHESTRATOR_CONFIG;
  const assignmentIntervalMs = parseInteger(
    env['ASSIGNMENT_INTERVAL_MS'],
    defaults.assignmentIntervalMs,
    1
  );

  const orchestrator: OrchestratorConfig = {
    assignmentIntervalMs,
    // Backoff after a failed cycle defaults to ten intervals
    errorBackoffMs: parseInteger(env['ERROR_BACKOFF_MS'], assignmentIntervalMs * 10, 1),
    activityWindowMs: parseInteger(env['ACTIVITY_WINDOW_MS'], defaults.activityWindowMs),
    discoveryIntervalMs: parseInteger(env['DISCOVERY_INTERVAL_MS'], defaults.discoveryIntervalMs),
    stateKey: env['STATE_KEY'] || defaults.stateKey,
    discoveryKey: env['DISCOVERY_KEY'] || defaults.discoveryKey,
  };

  if (env['REDIS_URL']) {
    orchestrator.redisUrl = env['REDIS_URL'];
  }

  const logLevel = env['LOG_LEVEL'];

  return {
    orchestrator,
    api: {
      port: parseInteger(env['API_PORT'], 3000, 1),
      apiKeys: (env['API_KEYS'] || '')
        .split(',')
        .map((key) => key.trim())
        .filter((key) => key.length > 0),
    },
    logLevel: isLogLevel(logLevel) ? logLevel : 'info',
  };
}
