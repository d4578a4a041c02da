import { Axiom } from '@axiomhq/js';
import { Config, LogLevelSchema, type LogLevel } from '@quorum/shared-types';

export type { LogLevel };

export interface LoggerEnv {
  LOG_LEVEL?: string;
  AXIOM_TOKEN?: string;
  AXIOM_ORG_ID?: string;
  AXIOM_DATASET?: string;
}

const METHODS: Record<LogLevel, 'debug' | 'log' | 'warn' | 'error'> = {
  debug: 'debug',
  info: 'log',
  warn: 'warn',
  error: 'error',
};

const RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

// Cached per token so a changed token rebuilds the client
let axiomClient: { token: string; client: Axiom } | null = null;

function getAxiom(env: LoggerEnv): Axiom | null {
  const token = env.AXIOM_TOKEN;
  if (!token) return null;
  if (axiomClient?.token !== token) {
    axiomClient = { token, client: new Axiom({ token, orgId: env.AXIOM_ORG_ID }) };
  }
  return axiomClient.client;
}

function threshold(env: LoggerEnv): LogLevel {
  const parsed = LogLevelSchema.safeParse(env.LOG_LEVEL);
  return parsed.success ? parsed.data : Config.log.defaultLevel;
}

/**
 * Structured logger.
 *
 * Outputs a single JSON object per call so that log drains can index every
 * field (e.g. `| where component == "BALLOT"`). When AXIOM_TOKEN is set the
 * same payload is queued for Axiom ingestion; call `flushLogs()` before the
 * process exits to deliver it.
 */
export function log(
  level: LogLevel,
  component: string,
  event: string,
  data?: Record<string, unknown>,
  env: LoggerEnv = process.env,
): void {
  if (RANK[level] < RANK[threshold(env)]) return;

  const payload = { timestamp: new Date().toISOString(), level, component, event, ...data };
  console[METHODS[level]](JSON.stringify(payload));

  const axiom = getAxiom(env);
  if (axiom) {
    axiom.ingest(env.AXIOM_DATASET || Config.log.defaultDataset, [payload]);
  }
}

/** Deliver queued Axiom events. No-op when Axiom is not configured. */
export async function flushLogs(): Promise<void> {
  if (!axiomClient) return;
  await axiomClient.client.flush();
}
