/**
 * Webhook 负载类型定义（对外线上格式，字段名为 snake_case）
 */
import type { MergeMethod, PrincipalType, PullReqState, Repository } from './index';

/**
 * Webhook 触发类型
 * 订阅方依赖这些取值，只能新增，不能重命名
 */
export enum WebhookTrigger {
  PULLREQ_CREATED = 'pullreq_created',
  PULLREQ_REOPENED = 'pullreq_reopened',
  PULLREQ_BRANCH_UPDATED = 'pullreq_branch_updated',
  PULLREQ_CLOSED = 'pullreq_closed',
  PULLREQ_MERGED = 'pullreq_merged',
}

/**
 * Webhook 所属的父级资源类型
 */
export enum WebhookParentType {
  REPO = 'repo',
}

export interface RepositoryInfo {
  id: number;
  path: string;
  uid: string;
  default_branch: string;
  git_url: string; // 克隆地址
  url: string; // 页面地址
}

export interface PrincipalInfo {
  id: number;
  uid: string;
  display_name: string;
  email: string;
  type: PrincipalType;
  created: number;
  updated: number;
}

export interface PullReqInfo {
  number: number;
  state: PullReqState;
  is_draft: boolean;
  title: string;
  source_repo_id: number;
  source_branch: string;
  target_repo_id: number;
  target_branch: string;
  merge_strategy: MergeMethod | null;
}

export interface IdentityInfo {
  name: string;
  email: string;
}

export interface SignatureInfo {
  identity: IdentityInfo;
  when: string;
}

export interface CommitInfo {
  sha: string;
  message: string;
  author: SignatureInfo;
  committer: SignatureInfo;
}

/**
 * 指定仓库下的 Git 引用（fork 场景下源分支与目标分支位于不同仓库）
 */
export interface ReferenceInfo {
  name: string; // 始终带 refs/heads/ 前缀
  repo: RepositoryInfo;
}

// ---- 负载片段 ----

export interface BaseSegment<T extends WebhookTrigger> {
  trigger: T;
  repo: RepositoryInfo;
  principal: PrincipalInfo;
}

export interface PullReqSegment {
  pull_req: PullReqInfo;
}

export interface PullReqTargetReferenceSegment {
  target_ref: ReferenceInfo;
}

export interface ReferenceSegment {
  ref: ReferenceInfo;
}

export interface ReferenceDetailsSegment {
  sha: string;
  commit: CommitInfo;
}

export interface ReferenceUpdateSegment {
  old_sha: string;
  forced: boolean;
}

// ---- 各触发类型的负载 ----

/**
 * pullreq_created 负载
 */
export interface PullReqCreatedPayload {
  readonly trigger: WebhookTrigger.PULLREQ_CREATED;
  readonly repo: RepositoryInfo;
  readonly principal: PrincipalInfo;
  readonly pull_req: PullReqInfo;
  readonly target_ref: ReferenceInfo;
  readonly ref: ReferenceInfo;
  readonly sha: string;
  readonly commit: CommitInfo;
}

/**
 * pullreq_reopened 负载
 * 字段与 created 相同，但保留独立类型，订阅方以 trigger 区分
 */
export interface PullReqReopenedPayload {
  readonly trigger: WebhookTrigger.PULLREQ_REOPENED;
  readonly repo: RepositoryInfo;
  readonly principal: PrincipalInfo;
  readonly pull_req: PullReqInfo;
  readonly target_ref: ReferenceInfo;
  readonly ref: ReferenceInfo;
  readonly sha: string;
  readonly commit: CommitInfo;
}

/**
 * pullreq_branch_updated 负载
 */
export interface PullReqBranchUpdatedPayload {
  readonly trigger: WebhookTrigger.PULLREQ_BRANCH_UPDATED;
  readonly repo: RepositoryInfo;
  readonly principal: PrincipalInfo;
  readonly pull_req: PullReqInfo;
  readonly target_ref: ReferenceInfo;
  readonly ref: ReferenceInfo;
  readonly sha: string; // 新的 SHA
  readonly commit: CommitInfo;
  readonly old_sha: string;
  readonly forced: boolean;
}

/**
 * pullreq_closed 负载
 */
export interface PullReqClosedPayload {
  readonly trigger: WebhookTrigger.PULLREQ_CLOSED;
  readonly repo: RepositoryInfo;
  readonly principal: PrincipalInfo;
  readonly pull_req: PullReqInfo;
  readonly target_ref: ReferenceInfo;
  readonly ref: ReferenceInfo;
  readonly sha: string;
  readonly commit: CommitInfo;
}

/**
 * pullreq_merged 负载
 */
export interface PullReqMergedPayload {
  readonly trigger: WebhookTrigger.PULLREQ_MERGED;
  readonly repo: RepositoryInfo;
  readonly principal: PrincipalInfo;
  readonly pull_req: PullReqInfo;
  readonly target_ref: ReferenceInfo;
  readonly ref: ReferenceInfo;
  readonly sha: string;
  readonly commit: CommitInfo;
}

/**
 * 所有 Webhook 负载，按 trigger 区分
 */
export type WebhookPayload =
  | PullReqCreatedPayload
  | PullReqReopenedPayload
  | PullReqBranchUpdatedPayload
  | PullReqClosedPayload
  | PullReqMergedPayload;

/**
 * 交给投递子系统的内容
 */
export interface WebhookHandoff<P extends WebhookPayload = WebhookPayload> {
  eventId: string; // 投递侧去重键
  trigger: P['trigger'];
  repo: Repository; // 目标仓库，用于匹配订阅
  payload: P;
}

/**
 * Webhook 投递协作方
 */
export interface WebhookDelivery {
  dispatch(handoff: WebhookHandoff, signal?: AbortSignal): Promise<void>;
}
