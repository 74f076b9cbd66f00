/**
 * Webhook 负载片段构建
 * 每个函数返回一组字段，由各触发类型按固定顺序组合
 */
import { GIT_REFERENCE_NAME_PREFIX_BRANCH } from '../constants';
import { CommitInfo, PrincipalInfo, PullReq, RepositoryInfo, WebhookTrigger } from '../types';
import {
  BaseSegment,
  PullReqSegment,
  PullReqTargetReferenceSegment,
  ReferenceDetailsSegment,
  ReferenceSegment,
  ReferenceUpdateSegment,
} from '../types/webhook';
import { pullReqInfoFrom } from './projection.util';

/**
 * 分支名转换为完整引用名
 */
export function branchReferenceName(branch: string): string {
  return GIT_REFERENCE_NAME_PREFIX_BRANCH + branch;
}

/**
 * 公共字段：触发类型、目标仓库和触发主体
 */
export function baseSegment<T extends WebhookTrigger>(
  trigger: T,
  repo: RepositoryInfo,
  principal: PrincipalInfo,
): BaseSegment<T> {
  return { trigger, repo, principal };
}

/**
 * Pull Request 信息
 */
export function pullReqSegment(pr: PullReq): PullReqSegment {
  return { pull_req: pullReqInfoFrom(pr) };
}

/**
 * 目标分支，位于目标仓库
 */
export function targetReferenceSegment(pr: PullReq, targetRepo: RepositoryInfo): PullReqTargetReferenceSegment {
  return {
    target_ref: {
      name: branchReferenceName(pr.targetBranch),
      repo: targetRepo,
    },
  };
}

/**
 * 源分支，位于源仓库
 */
export function referenceSegment(pr: PullReq, sourceRepo: RepositoryInfo): ReferenceSegment {
  return {
    ref: {
      name: branchReferenceName(pr.sourceBranch),
      repo: sourceRepo,
    },
  };
}

/**
 * 引用当前指向的提交
 */
export function referenceDetailsSegment(sha: string, commit: CommitInfo): ReferenceDetailsSegment {
  return { sha, commit };
}

/**
 * 分支更新前的 SHA 及是否强制推送
 */
export function referenceUpdateSegment(oldSha: string, forced: boolean): ReferenceUpdateSegment {
  return { old_sha: oldSha, forced };
}
