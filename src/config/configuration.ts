/**
 * 应用配置
 */
import { AppConfig } from '../types';

/**
 * 读取整数环境变量，未设置时使用默认值
 */
export function intFromEnv(name: string, defaultValue: number, min = 0): number {
  const raw = process.env[name];
  if (raw === undefined || raw === '') {
    return defaultValue;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`${name} must be an integer >= ${min}, got '${raw}'`);
  }
  return value;
}

export default (): AppConfig => ({
  port: intFromEnv('PORT', 3000, 1),
  nodeEnv: process.env.NODE_ENV || 'development',
  url: {
    gitBaseUrl: process.env.URL_GIT || 'http://localhost:3000/git',
    uiBaseUrl: process.env.URL_UI || 'http://localhost:3000',
  },
  platform: {
    apiBaseUrl: process.env.PLATFORM_API_BASE_URL || 'http://localhost:3000/api/v1/internal',
    token: process.env.PLATFORM_API_TOKEN || '',
    timeoutMs: intFromEnv('PLATFORM_API_TIMEOUT_MS', 30000),
  },
  delivery: {
    endpoint: process.env.WEBHOOK_DELIVERY_ENDPOINT || 'http://localhost:3001/internal/webhooks',
    token: process.env.WEBHOOK_DELIVERY_TOKEN || '',
    timeoutMs: intFromEnv('WEBHOOK_DELIVERY_TIMEOUT_MS', 30000),
  },
  webhook: {
    eventReaderName: process.env.WEBHOOK_EVENT_READER_NAME || 'webhook',
    concurrency: intFromEnv('WEBHOOK_CONCURRENCY', 4, 1),
    maxRetries: intFromEnv('WEBHOOK_MAX_RETRIES', 3),
    eventTimeoutMs: intFromEnv('WEBHOOK_EVENT_TIMEOUT_MS', 60000, 1),
    retryDelayMs: intFromEnv('WEBHOOK_RETRY_DELAY_MS', 1000),
  },
});
