import 'dotenv/config';

export interface AppConfig {
  zoom: {
    apiKey: string;
    apiSecret: string;
    baseUrl: string;
    recycleLicenses: boolean;
    licensesCount?: number;
    timezone?: string;
    maxRecordsPerCall: number;
  };
}

export const ZOOM_API_URL = 'https://api.zoom.us/v2/';

// Zoom rejects page_size above 300.
export const ZOOM_MAX_RECORDS_PER_CALL = 300;

function getEnvVar(env: NodeJS.ProcessEnv, name: string): string {
  return env[name]?.trim() || '';
}

function getFlag(env: NodeJS.ProcessEnv, name: string): boolean {
  return ['1', 'true', 'yes', 'on'].includes(getEnvVar(env, name).toLowerCase());
}

function getNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const value = Number(getEnvVar(env, name) || Number.NaN);
  return Number.isFinite(value) ? value : undefined;
}

/**
 * Reads the connector settings from the environment (and .env).
 * Nothing is validated here; ZoomClient rejects incomplete settings when it is constructed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    zoom: {
      apiKey: getEnvVar(env, 'ZOOM_API_KEY'),
      apiSecret: getEnvVar(env, 'ZOOM_API_SECRET'),
      baseUrl: ZOOM_API_URL,
      recycleLicenses: getFlag(env, 'ZOOM_RECYCLE_LICENSES'),
      licensesCount: getNumber(env, 'ZOOM_LICENSES_COUNT'),
      timezone: getEnvVar(env, 'ZOOM_TIMEZONE') || undefined,
      maxRecordsPerCall: getNumber(env, 'ZOOM_MAX_RECORDS_PER_CALL') ?? ZOOM_MAX_RECORDS_PER_CALL
    }
  };
}
