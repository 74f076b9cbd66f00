/**
 * 测试夹具：示例实体与进程内协作方
 */
import axios, { AxiosError, AxiosInstance, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import {
  Commit,
  DomainEvent,
  GitDataAccessor,
  Principal,
  PrincipalStore,
  PrincipalType,
  PullReq,
  PullReqEventKind,
  PullReqEventPayloads,
  PullReqState,
  PullReqStore,
  Repository,
  RepositoryStore,
  UrlProvider,
  WebhookDelivery,
  WebhookHandoff,
} from '../src/types';
import { NotFoundError } from '../src/utils/error.util';

export const principal: Principal = {
  id: 7,
  uid: 'jdoe',
  displayName: 'Jane Doe',
  email: 'jane@example.com',
  type: PrincipalType.USER,
  created: 1700000000000,
  updated: 1700000500000,
};

export const targetRepo: Repository = {
  id: 1,
  uid: 'app',
  path: 'acme/app',
  gitUid: 'git-target',
  defaultBranch: 'main',
};

export const sourceRepo: Repository = {
  id: 2,
  uid: 'app',
  path: 'jdoe/app',
  gitUid: 'git-source',
  defaultBranch: 'main',
};

export const pullReq: PullReq = {
  id: 42,
  number: 5,
  state: PullReqState.OPEN,
  isDraft: false,
  title: 'Add feature x',
  sourceRepoId: 2,
  sourceBranch: 'feature/x',
  targetRepoId: 1,
  targetBranch: 'main',
};

export function makeCommit(sha: string): Commit {
  return {
    sha,
    message: `commit ${sha}`,
    author: { identity: { name: 'Jane Doe', email: 'jane@example.com' }, when: '2024-01-02T03:04:05Z' },
    committer: { identity: { name: 'Jane Doe', email: 'jane@example.com' }, when: '2024-01-02T03:04:05Z' },
  };
}

export function makeEvent<K extends PullReqEventKind>(
  kind: K,
  payload: PullReqEventPayloads[K],
  id = 'event-1',
): DomainEvent<K> {
  return { id, kind, payload, createdAt: 1700000000000 };
}

export const staticUrlProvider: UrlProvider = {
  generateRepoCloneUrl: path => `https://git.example.com/${path}.git`,
  generateUiRepoUrl: path => `https://example.com/${path}`,
};

/**
 * 进程内存储，记录查询顺序
 */
export class InMemoryStores implements PrincipalStore, RepositoryStore, PullReqStore {
  readonly principals = new Map<number, Principal>([[principal.id, principal]]);
  readonly repos = new Map<number, Repository>([
    [targetRepo.id, targetRepo],
    [sourceRepo.id, sourceRepo],
  ]);
  readonly pullReqs = new Map<number, PullReq>([[pullReq.id, pullReq]]);
  readonly calls: string[] = [];

  async findPrincipal(id: number): Promise<Principal> {
    this.calls.push(`principal:${id}`);
    return found(this.principals.get(id), `principal with id '${id}'`);
  }

  async findRepository(id: number): Promise<Repository> {
    this.calls.push(`repo:${id}`);
    return found(this.repos.get(id), `repo with id '${id}'`);
  }

  async findPullReq(id: number): Promise<PullReq> {
    this.calls.push(`pullreq:${id}`);
    return found(this.pullReqs.get(id), `pull request with id '${id}'`);
  }
}

/**
 * 进程内 Git 数据，键为 gitUid:sha
 */
export class InMemoryGit implements GitDataAccessor {
  readonly commits = new Map<string, Commit>();
  readonly calls: string[] = [];

  add(gitUid: string, sha: string): this {
    this.commits.set(`${gitUid}:${sha}`, makeCommit(sha));
    return this;
  }

  async getCommit(repoGitUid: string, sha: string): Promise<Commit> {
    this.calls.push(`${repoGitUid}:${sha}`);
    return found(this.commits.get(`${repoGitUid}:${sha}`), `commit with sha '${sha}'`);
  }
}

/**
 * 记录每次交付
 */
export class RecordingDelivery implements WebhookDelivery {
  readonly handoffs: WebhookHandoff[] = [];

  async dispatch(handoff: WebhookHandoff): Promise<void> {
    this.handoffs.push(handoff);
  }
}

function found<T>(value: T | undefined, what: string): T {
  if (value === undefined) {
    throw new NotFoundError(`${what} doesn't exist`);
  }
  return value;
}

export interface FakeResponse {
  status: number;
  data?: unknown;
}

/**
 * 使用自定义 adapter 的 axios 客户端，不访问网络
 */
export function createFakeHttpClient(
  route: (config: InternalAxiosRequestConfig) => FakeResponse,
  baseURL = 'http://platform.test',
): { client: AxiosInstance; requests: InternalAxiosRequestConfig[] } {
  const requests: InternalAxiosRequestConfig[] = [];

  const client = axios.create({
    baseURL,
    adapter: async config => {
      requests.push(config);
      const { status, data } = route(config);
      const response: AxiosResponse = { data, status, statusText: String(status), headers: {}, config };
      if (status >= 400) {
        const code = status < 500 ? AxiosError.ERR_BAD_REQUEST : AxiosError.ERR_BAD_RESPONSE;
        throw new AxiosError(`Request failed with status code ${status}`, code, config, null, response);
      }
      return response;
    },
  });

  return { client, requests };
}
