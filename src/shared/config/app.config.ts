export interface AppConfig {
  port: number;
  databasePath: string;
  nodeEnv: string;
  logLevel: string;
  prettyLogs: boolean;
}

const DEFAULT_PORT = 3000;
const DEFAULT_DATABASE_PATH = './data/contacts.db';

function defaultLogLevel(nodeEnv: string): string {
  if (nodeEnv === 'test') return 'silent';
  return nodeEnv === 'production' ? 'info' : 'debug';
}

function parsePort(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === '') {
    return DEFAULT_PORT;
  }
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid PORT value: ${raw}`);
  }
  return port;
}

/**
 * Reads application settings from the environment. Called from the
 * `forRootAsync` factories so values are taken at bootstrap, not import time.
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const nodeEnv = env.NODE_ENV ?? 'development';

  return {
    port: parsePort(env.PORT),
    databasePath: env.DATABASE_PATH ?? DEFAULT_DATABASE_PATH,
    nodeEnv,
    logLevel: env.LOG_LEVEL ?? defaultLogLevel(nodeEnv),
    prettyLogs: nodeEnv !== 'production' && nodeEnv !== 'test',
  };
}
