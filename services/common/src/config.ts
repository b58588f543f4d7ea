export interface RuntimeConfig {
  serviceName: string;
  logLevel: string;
  enableRequestLogging: boolean;
}

export interface MonitoringConfig {
  traceHeader: string;
  requestIdHeader: string;
}

export interface ServiceConfig {
  env: string;
  runtime: RuntimeConfig;
  monitoring: MonitoringConfig;
}

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

let cachedConfig: ServiceConfig | null = null;

export function parseNumber(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value.trim().length === 0) {
    return defaultValue;
  }

  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    return defaultValue;
  }

  return parsed;
}

export function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined) {
    return defaultValue;
  }

  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes', 'y', 'on'].includes(normalized)) {
    return true;
  }
  if (['false', '0', 'no', 'n', 'off'].includes(normalized)) {
    return false;
  }
  return defaultValue;
}

function resolveLogLevel(): string {
  const value = process.env.LOG_LEVEL?.trim().toLowerCase();
  if (!value) {
    return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
  }

  return (LOG_LEVELS as readonly string[]).includes(value) ? value : 'info';
}

function validateConfig(config: ServiceConfig): void {
  if (config.runtime.serviceName.trim().length === 0) {
    throw new Error('SERVICE_NAME must not be empty.');
  }

  if (config.monitoring.requestIdHeader.trim().length === 0) {
    throw new Error('REQUEST_ID_HEADER must not be empty.');
  }
}

function loadConfig(): ServiceConfig {
  const config: ServiceConfig = {
    env: process.env.NODE_ENV ?? 'development',
    runtime: {
      serviceName: process.env.SERVICE_NAME ?? 'arec-service',
      logLevel: resolveLogLevel(),
      enableRequestLogging: parseBoolean(process.env.ENABLE_REQUEST_LOGGING, true)
    },
    monitoring: {
      traceHeader: process.env.TRACE_HEADER ?? 'traceparent',
      requestIdHeader: process.env.REQUEST_ID_HEADER ?? 'X-Request-ID'
    }
  };

  validateConfig(config);
  cachedConfig = config;

  return cachedConfig;
}

export function getConfig(): ServiceConfig {
  return cachedConfig ?? loadConfig();
}

export function resetConfigForTesting(): void {
  cachedConfig = null;
}
