/**
 * HTTP 客户端工具函数
 */
import axios, { AxiosInstance } from 'axios';

/**
 * 创建带认证头的 HTTP 客户端
 */
export function createHttpClient(baseUrl: string, token: string, timeoutMs: number): AxiosInstance {
  const headers: Record<string, string> = {
    'Content-Type': 'application/json',
  };
  if (token) {
    headers['Authorization'] = `Bearer ${token}`;
  }

  return axios.create({
    baseURL: baseUrl,
    headers,
    timeout: timeoutMs,
  });
}
