/**
 * 平台存储服务：通过内部 API 读取主体、仓库和 Pull Request
 */
import { Inject, Injectable, Logger } from '@nestjs/common';
import { AxiosInstance } from 'axios';
import { PLATFORM_HTTP_CLIENT } from '../constants';
import {
  MergeMethod,
  PlatformPrincipal,
  PlatformPullReq,
  PlatformRepository,
  Principal,
  PrincipalStore,
  PrincipalType,
  PullReq,
  PullReqState,
  PullReqStore,
  Repository,
  RepositoryStore,
} from '../types';
import { BackendError, toLookupError } from '../utils/error.util';

@Injectable()
export class PlatformService implements PrincipalStore, RepositoryStore, PullReqStore {
  private readonly logger = new Logger(PlatformService.name);

  constructor(@Inject(PLATFORM_HTTP_CLIENT) private readonly httpClient: AxiosInstance) {}

  /**
   * 获取主体
   */
  async findPrincipal(id: number, signal?: AbortSignal): Promise<Principal> {
    const data = await this.get<PlatformPrincipal>(`/principals/${id}`, `principal with id '${id}'`, signal);
    const type = enumValue(PrincipalType, data.type);
    if (!type) {
      throw new BackendError(`principal with id '${id}' has unknown type '${data.type}'`);
    }

    return {
      id: data.id,
      uid: data.uid,
      displayName: data.display_name,
      email: data.email,
      type,
      created: data.created,
      updated: data.updated,
    };
  }

  /**
   * 获取仓库
   */
  async findRepository(id: number, signal?: AbortSignal): Promise<Repository> {
    const data = await this.get<PlatformRepository>(`/repos/${id}`, `repo with id '${id}'`, signal);

    return {
      id: data.id,
      uid: data.uid,
      path: data.path,
      gitUid: data.git_uid,
      defaultBranch: data.default_branch,
    };
  }

  /**
   * 获取 Pull Request
   */
  async findPullReq(id: number, signal?: AbortSignal): Promise<PullReq> {
    const data = await this.get<PlatformPullReq>(`/pullreqs/${id}`, `pull request with id '${id}'`, signal);
    const state = enumValue(PullReqState, data.state);
    if (!state) {
      throw new BackendError(`pull request with id '${id}' has unknown state '${data.state}'`);
    }
    const mergeMethod = data.merge_method ? enumValue(MergeMethod, data.merge_method) : undefined;
    if (data.merge_method && !mergeMethod) {
      throw new BackendError(`pull request with id '${id}' has unknown merge method '${data.merge_method}'`);
    }

    return {
      id: data.id,
      number: data.number,
      state,
      isDraft: data.is_draft,
      title: data.title,
      sourceRepoId: data.source_repo_id,
      sourceBranch: data.source_branch,
      targetRepoId: data.target_repo_id,
      targetBranch: data.target_branch,
      mergeMethod,
    };
  }

  private async get<T>(url: string, what: string, signal?: AbortSignal): Promise<T> {
    try {
      const response = await this.httpClient.get<T>(url, { signal });
      return response.data;
    } catch (error) {
      const lookupError = toLookupError(error, what, signal);
      this.logger.debug(`Platform lookup failed for ${what}: ${lookupError.message}`);
      throw lookupError;
    }
  }
}

/**
 * 将接口返回的字符串收窄为枚举值
 */
export function enumValue<E extends string>(values: Record<string, E>, value: string): E | undefined {
  return Object.values(values).find(candidate => candidate === value);
}
