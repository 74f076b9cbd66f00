/**
 * 核心类型定义
 */

// 重新导出事件和 Webhook 类型
export { PullReqEventKind } from './events';
export type {
  DomainEvent,
  PullReqEventBase,
  PullReqEventPayloads,
  PullReqCreatedEvent,
  PullReqReopenedEvent,
  PullReqBranchUpdatedEvent,
  PullReqClosedEvent,
  PullReqMergedEvent,
  EventBus,
  EventConsumer,
  ConsumerOptions,
  Subscription,
} from './events';
export { WebhookTrigger, WebhookParentType } from './webhook';
export type {
  RepositoryInfo,
  PrincipalInfo,
  PullReqInfo,
  CommitInfo,
  ReferenceInfo,
  WebhookPayload,
  WebhookHandoff,
  WebhookDelivery,
  PullReqCreatedPayload,
  PullReqReopenedPayload,
  PullReqBranchUpdatedPayload,
  PullReqClosedPayload,
  PullReqMergedPayload,
} from './webhook';
export type {
  PlatformPrincipal,
  PlatformRepository,
  PlatformPullReq,
  PlatformCommit,
} from './platform';

/**
 * 主体类型
 */
export enum PrincipalType {
  USER = 'user',
  SERVICE = 'service',
  SERVICE_ACCOUNT = 'serviceaccount',
}

/**
 * Pull Request 状态
 */
export enum PullReqState {
  OPEN = 'open',
  CLOSED = 'closed',
  MERGED = 'merged',
}

/**
 * 合并方式
 */
export enum MergeMethod {
  MERGE = 'merge',
  SQUASH = 'squash',
  REBASE = 'rebase',
}

/**
 * 主体（用户、服务、服务账号）
 */
export interface Principal {
  id: number;
  uid: string;
  displayName: string;
  email: string;
  type: PrincipalType;
  created: number; // 创建时间（毫秒时间戳）
  updated: number; // 更新时间（毫秒时间戳）
}

/**
 * 仓库
 */
export interface Repository {
  id: number;
  uid: string; // 仓库标识
  path: string; // 完整路径，如 space/repo
  gitUid: string; // Git 存储层标识
  defaultBranch: string;
}

/**
 * Pull Request
 */
export interface PullReq {
  id: number;
  number: number; // 仓库内编号
  state: PullReqState;
  isDraft: boolean;
  title: string;
  sourceRepoId: number; // 源仓库（fork 场景下与目标仓库不同）
  sourceBranch: string;
  targetRepoId: number;
  targetBranch: string;
  mergeMethod?: MergeMethod;
}

/**
 * Git 身份
 */
export interface Identity {
  name: string;
  email: string;
}

/**
 * Git 签名
 */
export interface Signature {
  identity: Identity;
  when: string; // ISO-8601
}

/**
 * Git 提交
 */
export interface Commit {
  sha: string;
  message: string;
  author: Signature;
  committer: Signature;
}

/**
 * 主体存储
 */
export interface PrincipalStore {
  findPrincipal(id: number, signal?: AbortSignal): Promise<Principal>;
}

/**
 * 仓库存储
 */
export interface RepositoryStore {
  findRepository(id: number, signal?: AbortSignal): Promise<Repository>;
}

/**
 * Pull Request 存储
 */
export interface PullReqStore {
  findPullReq(id: number, signal?: AbortSignal): Promise<PullReq>;
}

/**
 * Git 数据访问
 */
export interface GitDataAccessor {
  getCommit(repoGitUid: string, sha: string, signal?: AbortSignal): Promise<Commit>;
}

/**
 * URL 生成
 */
export interface UrlProvider {
  generateRepoCloneUrl(repoPath: string): string;
  generateUiRepoUrl(repoPath: string): string;
}

/**
 * 配置接口
 */
export interface AppConfig {
  port: number;
  nodeEnv: string;
  url: {
    gitBaseUrl: string;
    uiBaseUrl: string;
  };
  platform: {
    apiBaseUrl: string;
    token: string;
    timeoutMs: number;
  };
  delivery: {
    endpoint: string;
    token: string;
    timeoutMs: number;
  };
  webhook: {
    eventReaderName: string;
    concurrency: number;
    maxRetries: number;
    eventTimeoutMs: number;
    retryDelayMs: number;
  };
}
