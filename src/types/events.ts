/**
 * Pull Request 生命周期领域事件
 */
import type { MergeMethod } from './index';

/**
 * 事件类型
 */
export enum PullReqEventKind {
  CREATED = 'pullreq:created',
  REOPENED = 'pullreq:reopened',
  BRANCH_UPDATED = 'pullreq:branch-updated',
  CLOSED = 'pullreq:closed',
  MERGED = 'pullreq:merged',
}

/**
 * 所有 Pull Request 事件共有的字段
 */
export interface PullReqEventBase {
  principalId: number; // 触发事件的主体
  pullReqId: number;
  sourceRepoId: number;
  targetRepoId: number;
  number: number;
}

export interface PullReqCreatedEvent extends PullReqEventBase {
  sourceBranch: string;
  targetBranch: string;
  sourceSha: string;
}

export interface PullReqReopenedEvent extends PullReqEventBase {
  sourceSha: string;
  mergeBaseSha: string;
}

export interface PullReqBranchUpdatedEvent extends PullReqEventBase {
  oldSha: string;
  newSha: string;
  forced: boolean;
}

export interface PullReqClosedEvent extends PullReqEventBase {
  sourceSha: string;
}

export interface PullReqMergedEvent extends PullReqEventBase {
  mergeMethod: MergeMethod;
  mergeSha: string;
  targetSha: string;
  sourceSha: string;
}

/**
 * 事件类型到负载的映射
 */
export interface PullReqEventPayloads {
  [PullReqEventKind.CREATED]: PullReqCreatedEvent;
  [PullReqEventKind.REOPENED]: PullReqReopenedEvent;
  [PullReqEventKind.BRANCH_UPDATED]: PullReqBranchUpdatedEvent;
  [PullReqEventKind.CLOSED]: PullReqClosedEvent;
  [PullReqEventKind.MERGED]: PullReqMergedEvent;
}

/**
 * 事件总线投递的事件，发布后不可变
 */
export interface DomainEvent<K extends PullReqEventKind> {
  readonly id: string; // 全局唯一，下游投递用于去重
  readonly kind: K;
  readonly payload: Readonly<PullReqEventPayloads[K]>;
  readonly createdAt: number;
}

/**
 * 事件消费者，signal 取消时应尽快中止
 */
export type EventConsumer<K extends PullReqEventKind> = (
  event: DomainEvent<K>,
  signal: AbortSignal,
) => Promise<void>;

/**
 * 消费者配置
 */
export interface ConsumerOptions {
  readerName: string; // 读取者名称，用于日志
  concurrency: number; // 并发消费数
  maxRetries: number; // 失败后的最大重新投递次数
  timeoutMs: number; // 单次投递超时
  retryDelayMs: number; // 首次重新投递前的等待，之后逐次翻倍
}

/**
 * 订阅句柄
 */
export interface Subscription {
  readonly kind: PullReqEventKind;
  /**
   * 停止接收新事件，等待进行中的消费完成
   */
  unsubscribe(): Promise<void>;
}

/**
 * 事件总线（至少一次投递，不保证顺序）
 */
export interface EventBus {
  subscribe<K extends PullReqEventKind>(
    kind: K,
    consumer: EventConsumer<K>,
    options: ConsumerOptions,
  ): Subscription;
  publish<K extends PullReqEventKind>(kind: K, payload: PullReqEventPayloads[K], id?: string): DomainEvent<K>;
}
