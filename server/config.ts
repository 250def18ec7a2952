import type { LogLevel } from '../simulation/types/simulation.js';
import type { PrometheusConfig, PrometheusMode } from './services/prometheus.js';

export interface ServerConfig {
  port: number;
  logLevel: LogLevel;
  seed?: string;
  corsOrigin: string;
  prometheus: PrometheusConfig;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

type Env = Record<string, string | undefined>;

export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase();
  if (!normalized) return 'info';
  const level = LOG_LEVELS.find((candidate) => candidate === normalized);
  if (!level) throw new Error(`Invalid LOG_LEVEL. Expected one of ${LOG_LEVELS.join(', ')}`);
  return level;
}

function parsePrometheusMode(value: string | undefined): PrometheusMode {
  const normalized = value?.trim().toLowerCase();
  if (!normalized || normalized === 'scrape') return 'scrape';
  if (normalized === 'pushgateway') return 'pushgateway';
  if (normalized === 'both') return 'both';
  throw new Error('Invalid PROMETHEUS_MODE. Expected scrape, pushgateway, or both');
}

function parsePort(value: string | undefined): number {
  const port = Number(value?.trim() || 3001);
  if (!Number.isInteger(port) || port < 0 || port > 65535) throw new Error(`Invalid PORT: ${value}`);
  return port;
}

export function resolveServerConfig(env: Env = process.env): ServerConfig {
  const pushgatewayUrl = env.PUSHGATEWAY_URL?.trim();
  const seed = env.SIM_SEED?.trim();
  return {
    port: parsePort(env.PORT),
    logLevel: parseLogLevel(env.LOG_LEVEL),
    ...(seed ? { seed } : {}),
    corsOrigin: env.CORS_ORIGIN?.trim() || 'http://localhost:5173',
    prometheus: {
      enabled: env.PROMETHEUS_ENABLED?.trim().toLowerCase() === 'true',
      mode: parsePrometheusMode(env.PROMETHEUS_MODE),
      jobName: env.PROMETHEUS_JOB_NAME?.trim() || 'ran_simulation',
      ...(pushgatewayUrl ? { pushgatewayUrl } : {})
    }
  };
}
