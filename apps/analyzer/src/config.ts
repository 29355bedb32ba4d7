import path from 'path';

export interface AppConfig {
  port: number;
  host: string;
  geoipDatabasePath: string;
  geoipMaxLookups: number;
  maxUploadBytes: number;
  logger: boolean;
}

export const DEFAULT_API_PORT = 5432;
export const DEFAULT_GEOIP_MAX_LOOKUPS = 20;
export const DEFAULT_MAX_UPLOAD_BYTES = 100 * 1024 * 1024;
export const DEFAULT_GEOIP_DATABASE_PATH = './data/GeoLite2-City.mmdb';

export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: parsePositiveInt(env.API_PORT, DEFAULT_API_PORT),
    host: env.API_HOST || '0.0.0.0',
    geoipDatabasePath: path.resolve(env.GEOIP_DATABASE_PATH || DEFAULT_GEOIP_DATABASE_PATH),
    geoipMaxLookups: parsePositiveInt(env.GEOIP_MAX_LOOKUPS, DEFAULT_GEOIP_MAX_LOOKUPS),
    maxUploadBytes: parsePositiveInt(env.MAX_UPLOAD_BYTES, DEFAULT_MAX_UPLOAD_BYTES),
    logger: env.FASTIFY_LOGGER === '1' || env.FASTIFY_LOGGER === 'true',
  };
}

export function parsePositiveInt(value: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(value || '', 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return fallback;
  }
  return parsed;
}

export function formatAppConfigForLog(config: AppConfig): string {
  return `listen=${config.host}:${config.port} geoip=${config.geoipDatabasePath} geoipMaxLookups=${config.geoipMaxLookups} maxUploadBytes=${config.maxUploadBytes} logger=${config.logger ? '1' : '0'}`;
}
