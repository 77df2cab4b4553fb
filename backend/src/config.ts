/**
 * Backend configuration from environment variables
 */

export type ServerConfig = {
  readonly port: number;
  readonly uploadLimitBytes: number;
};

const DEFAULT_PORT = 3001;
const DEFAULT_UPLOAD_LIMIT_MB = 10;

const positiveInt = (raw: string | undefined, fallback: number): number => {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  return Number.isInteger(value) && value > 0 ? value : fallback;
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): ServerConfig => ({
  port: positiveInt(env.PORT, DEFAULT_PORT),
  uploadLimitBytes: positiveInt(env.UPLOAD_LIMIT_MB, DEFAULT_UPLOAD_LIMIT_MB) * 1024 * 1024,
});
