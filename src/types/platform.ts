/**
 * 平台内部 API 响应类型定义
 */

/**
 * GET /principals/:id
 */
export interface PlatformPrincipal {
  id: number;
  uid: string;
  display_name: string;
  email: string;
  type: string;
  created: number;
  updated: number;
}

/**
 * GET /repos/:id
 */
export interface PlatformRepository {
  id: number;
  uid: string;
  path: string;
  git_uid: string;
  default_branch: string;
}

/**
 * GET /pullreqs/:id
 */
export interface PlatformPullReq {
  id: number;
  number: number;
  state: string;
  is_draft: boolean;
  title: string;
  source_repo_id: number;
  source_branch: string;
  target_repo_id: number;
  target_branch: string;
  merge_method?: string | null;
}

/**
 * GET /git/:gitUid/commits/:sha
 */
export interface PlatformCommit {
  sha: string;
  message: string;
  author: {
    identity: {
      name: string;
      email: string;
    };
    when: string;
  };
  committer: {
    identity: {
      name: string;
      email: string;
    };
    when: string;
  };
}
