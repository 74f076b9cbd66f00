/**
 * 触发流程的错误类型与工具函数
 */
import axios from 'axios';

/**
 * 触发流程错误基类
 */
export class WebhookTriggerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * 实体或提交不存在：数据一致性问题，事件直接丢弃，不重试
 */
export class NotFoundError extends WebhookTriggerError {}

/**
 * 存储或传输层故障：交给事件总线重新投递
 */
export class BackendError extends WebhookTriggerError {}

/**
 * 上下文已取消：与不存在区分，不按失败记录
 */
export class CancellationError extends WebhookTriggerError {}

/**
 * 提取错误信息
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * 信号已取消时抛出 CancellationError
 */
export function throwIfCancelled(signal: AbortSignal | undefined, operation: string): void {
  if (signal?.aborted) {
    throw new CancellationError(`${operation} cancelled`, { cause: signal.reason });
  }
}

/**
 * 将查询失败归类为 NotFound / Cancellation / Backend
 */
export function toLookupError(
  error: unknown,
  what: string,
  signal?: AbortSignal,
): WebhookTriggerError {
  if (error instanceof WebhookTriggerError) {
    return error;
  }

  if (signal?.aborted || axios.isCancel(error)) {
    return new CancellationError(`lookup of ${what} cancelled`, { cause: error });
  }

  if (axios.isAxiosError(error) && error.response?.status === 404) {
    return new NotFoundError(`${what} doesn't exist`, { cause: error });
  }

  return new BackendError(`failed to get ${what}: ${errorMessage(error)}`, { cause: error });
}
