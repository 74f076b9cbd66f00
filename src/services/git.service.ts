/**
 * Git 数据访问服务
 */
import { Inject, Injectable, Logger } from '@nestjs/common';
import { AxiosInstance } from 'axios';
import { PLATFORM_HTTP_CLIENT } from '../constants';
import { Commit, GitDataAccessor, PlatformCommit } from '../types';
import { toLookupError } from '../utils/error.util';

@Injectable()
export class GitService implements GitDataAccessor {
  private readonly logger = new Logger(GitService.name);

  constructor(@Inject(PLATFORM_HTTP_CLIENT) private readonly httpClient: AxiosInstance) {}

  /**
   * 按 SHA 获取提交
   */
  async getCommit(repoGitUid: string, sha: string, signal?: AbortSignal): Promise<Commit> {
    const url = `/git/${encodeURIComponent(repoGitUid)}/commits/${encodeURIComponent(sha)}`;

    try {
      const response = await this.httpClient.get<PlatformCommit>(url, { signal });
      const commit = response.data;

      return {
        sha: commit.sha,
        message: commit.message,
        author: {
          identity: { name: commit.author.identity.name, email: commit.author.identity.email },
          when: commit.author.when,
        },
        committer: {
          identity: { name: commit.committer.identity.name, email: commit.committer.identity.email },
          when: commit.committer.when,
        },
      };
    } catch (error) {
      const lookupError = toLookupError(error, `commit with sha '${sha}'`, signal);
      this.logger.debug(`Failed to get commit ${sha} in ${repoGitUid}: ${lookupError.message}`);
      throw lookupError;
    }
  }
}
