import path from 'path';

export type LogLevel = 'silent' | 'info' | 'debug';

export interface ServerConfig {
  port: number;
  corsOrigin: string;
  rateLimit: {
    windowMs: number;
    max: number;
  };
  activitiesFile: string;
  staticDir: string;
  logLevel: LogLevel;
}

const DEFAULT_PORT = 8000;
const DEFAULT_RATE_LIMIT_WINDOW_MS = 15 * 60 * 1000; // 15 minutes
const DEFAULT_RATE_LIMIT_MAX = 100;

const parsePositiveInt = (value: string | undefined, fallback: number): number => {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
};

export const parseLogLevel = (value: string | undefined): LogLevel => {
  switch (value) {
    case 'silent':
    case 'debug':
      return value;
    default:
      return 'info';
  }
};

export const getServerConfig = (env: NodeJS.ProcessEnv = process.env): ServerConfig => ({
  port: parsePositiveInt(env.PORT, DEFAULT_PORT),
  corsOrigin: env.CORS_ORIGIN || '*',
  rateLimit: {
    windowMs: parsePositiveInt(env.RATE_LIMIT_WINDOW_MS, DEFAULT_RATE_LIMIT_WINDOW_MS),
    max: parsePositiveInt(env.RATE_LIMIT_MAX, DEFAULT_RATE_LIMIT_MAX)
  },
  activitiesFile: env.ACTIVITIES_FILE
    ? path.resolve(env.ACTIVITIES_FILE)
    : path.resolve(__dirname, '..', 'data', 'activities.json'),
  staticDir: env.STATIC_DIR
    ? path.resolve(env.STATIC_DIR)
    : path.resolve(__dirname, '..', 'static'),
  logLevel: parseLogLevel(env.LOG_LEVEL)
});
