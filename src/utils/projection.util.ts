/**
 * 内部实体到 Webhook 公开结构的投影（纯函数，无 I/O）
 */
import {
  Commit,
  CommitInfo,
  Principal,
  PrincipalInfo,
  PullReq,
  PullReqInfo,
  Repository,
  RepositoryInfo,
  Signature,
  UrlProvider,
} from '../types';
import type { SignatureInfo } from '../types/webhook';

/**
 * 仓库投影，链接由 UrlProvider 生成
 */
export function repositoryInfoFrom(repo: Repository, urlProvider: UrlProvider): RepositoryInfo {
  return {
    id: repo.id,
    path: repo.path,
    uid: repo.uid,
    default_branch: repo.defaultBranch,
    git_url: urlProvider.generateRepoCloneUrl(repo.path),
    url: urlProvider.generateUiRepoUrl(repo.path),
  };
}

/**
 * 主体投影
 */
export function principalInfoFrom(principal: Principal): PrincipalInfo {
  return {
    id: principal.id,
    uid: principal.uid,
    display_name: principal.displayName,
    email: principal.email,
    type: principal.type,
    created: principal.created,
    updated: principal.updated,
  };
}

/**
 * Pull Request 投影，未合并时 merge_strategy 为 null
 */
export function pullReqInfoFrom(pr: PullReq): PullReqInfo {
  return {
    number: pr.number,
    state: pr.state,
    is_draft: pr.isDraft,
    title: pr.title,
    source_repo_id: pr.sourceRepoId,
    source_branch: pr.sourceBranch,
    target_repo_id: pr.targetRepoId,
    target_branch: pr.targetBranch,
    merge_strategy: pr.mergeMethod ?? null,
  };
}

/**
 * 签名投影
 */
function signatureInfoFrom(signature: Signature): SignatureInfo {
  return {
    identity: {
      name: signature.identity.name,
      email: signature.identity.email,
    },
    when: signature.when,
  };
}

/**
 * 提交投影
 */
export function commitInfoFrom(commit: Commit): CommitInfo {
  return {
    sha: commit.sha,
    message: commit.message,
    author: signatureInfoFrom(commit.author),
    committer: signatureInfoFrom(commit.committer),
  };
}
