/**
 * 提交信息获取服务
 */
import { Inject, Injectable } from '@nestjs/common';
import { GIT_DATA_ACCESSOR } from '../constants';
import { CommitInfo, GitDataAccessor } from '../types';
import { throwIfCancelled, toLookupError } from '../utils/error.util';
import { commitInfoFrom } from '../utils/projection.util';

@Injectable()
export class CommitInfoService {
  constructor(@Inject(GIT_DATA_ACCESSOR) private readonly git: GitDataAccessor) {}

  /**
   * 解析事件对应的提交
   * 每次触发都重新获取，不做缓存和重试
   */
  async fetchCommitInfoForEvent(repoGitUid: string, sha: string, signal?: AbortSignal): Promise<CommitInfo> {
    throwIfCancelled(signal, `fetch of commit '${sha}'`);

    try {
      const commit = await this.git.getCommit(repoGitUid, sha, signal);
      return commitInfoFrom(commit);
    } catch (error) {
      // 提交已被回收或 SHA 无效时为 NotFound
      throw toLookupError(error, `commit with sha '${sha}'`, signal);
    }
  }
}
