/**
 * Pull Request 事件处理：为每类事件组装对应的 Webhook 负载
 */
import { Inject, Injectable } from '@nestjs/common';
import { URL_PROVIDER } from '../../constants';
import {
  CommitInfo,
  DomainEvent,
  PullReqBranchUpdatedPayload,
  PullReqClosedPayload,
  PullReqCreatedPayload,
  PullReqEventKind,
  PullReqMergedPayload,
  PullReqReopenedPayload,
  RepositoryInfo,
  UrlProvider,
  WebhookTrigger,
} from '../../types';
import { CommitInfoService } from '../../services/commit-info.service';
import { principalInfoFrom, repositoryInfoFrom } from '../../utils/projection.util';
import {
  baseSegment,
  pullReqSegment,
  referenceDetailsSegment,
  referenceSegment,
  referenceUpdateSegment,
  targetReferenceSegment,
} from '../../utils/segment.util';
import { PullReqTriggerContext, WebhookTriggerService } from './webhook-trigger.service';

/**
 * 构建负载所需的已解析数据
 */
interface ResolvedReferences {
  targetRepoInfo: RepositoryInfo;
  sourceRepoInfo: RepositoryInfo;
  commitInfo: CommitInfo;
}

@Injectable()
export class PullReqTriggerService {
  constructor(
    private readonly triggerService: WebhookTriggerService,
    private readonly commitInfoService: CommitInfoService,
    @Inject(URL_PROVIDER) private readonly urlProvider: UrlProvider,
  ) {}

  /**
   * 处理 Pull Request 创建事件，触发 pullreq_created
   */
  async handleEventPullReqCreated(event: DomainEvent<PullReqEventKind.CREATED>, signal?: AbortSignal): Promise<void> {
    const { principalId, pullReqId, sourceSha } = event.payload;

    await this.triggerService.triggerForEventWithPullReq<PullReqCreatedPayload>(
      WebhookTrigger.PULLREQ_CREATED,
      event.id,
      principalId,
      pullReqId,
      async context => {
        const { targetRepoInfo, sourceRepoInfo, commitInfo } = await this.resolve(context, sourceSha, signal);

        return {
          ...baseSegment(WebhookTrigger.PULLREQ_CREATED, targetRepoInfo, principalInfoFrom(context.principal)),
          ...pullReqSegment(context.pullReq),
          ...targetReferenceSegment(context.pullReq, targetRepoInfo),
          ...referenceSegment(context.pullReq, sourceRepoInfo),
          ...referenceDetailsSegment(sourceSha, commitInfo),
        };
      },
      signal,
    );
  }

  /**
   * 处理 Pull Request 重新打开事件，触发 pullreq_reopened
   */
  async handleEventPullReqReopened(event: DomainEvent<PullReqEventKind.REOPENED>, signal?: AbortSignal): Promise<void> {
    const { principalId, pullReqId, sourceSha } = event.payload;

    await this.triggerService.triggerForEventWithPullReq<PullReqReopenedPayload>(
      WebhookTrigger.PULLREQ_REOPENED,
      event.id,
      principalId,
      pullReqId,
      async context => {
        const { targetRepoInfo, sourceRepoInfo, commitInfo } = await this.resolve(context, sourceSha, signal);

        return {
          ...baseSegment(WebhookTrigger.PULLREQ_REOPENED, targetRepoInfo, principalInfoFrom(context.principal)),
          ...pullReqSegment(context.pullReq),
          ...targetReferenceSegment(context.pullReq, targetRepoInfo),
          ...referenceSegment(context.pullReq, sourceRepoInfo),
          ...referenceDetailsSegment(sourceSha, commitInfo),
        };
      },
      signal,
    );
  }

  /**
   * 处理源分支更新事件，触发 pullreq_branch_updated
   * 引用详情使用新的 SHA
   */
  async handleEventPullReqBranchUpdated(
    event: DomainEvent<PullReqEventKind.BRANCH_UPDATED>,
    signal?: AbortSignal,
  ): Promise<void> {
    const { principalId, pullReqId, oldSha, newSha, forced } = event.payload;

    await this.triggerService.triggerForEventWithPullReq<PullReqBranchUpdatedPayload>(
      WebhookTrigger.PULLREQ_BRANCH_UPDATED,
      event.id,
      principalId,
      pullReqId,
      async context => {
        const { targetRepoInfo, sourceRepoInfo, commitInfo } = await this.resolve(context, newSha, signal);

        return {
          ...baseSegment(WebhookTrigger.PULLREQ_BRANCH_UPDATED, targetRepoInfo, principalInfoFrom(context.principal)),
          ...pullReqSegment(context.pullReq),
          ...targetReferenceSegment(context.pullReq, targetRepoInfo),
          ...referenceSegment(context.pullReq, sourceRepoInfo),
          ...referenceDetailsSegment(newSha, commitInfo),
          ...referenceUpdateSegment(oldSha, forced),
        };
      },
      signal,
    );
  }

  /**
   * 处理 Pull Request 关闭事件，触发 pullreq_closed
   */
  async handleEventPullReqClosed(event: DomainEvent<PullReqEventKind.CLOSED>, signal?: AbortSignal): Promise<void> {
    const { principalId, pullReqId, sourceSha } = event.payload;

    await this.triggerService.triggerForEventWithPullReq<PullReqClosedPayload>(
      WebhookTrigger.PULLREQ_CLOSED,
      event.id,
      principalId,
      pullReqId,
      async context => {
        const { targetRepoInfo, sourceRepoInfo, commitInfo } = await this.resolve(context, sourceSha, signal);

        return {
          ...baseSegment(WebhookTrigger.PULLREQ_CLOSED, targetRepoInfo, principalInfoFrom(context.principal)),
          ...pullReqSegment(context.pullReq),
          ...targetReferenceSegment(context.pullReq, targetRepoInfo),
          ...referenceSegment(context.pullReq, sourceRepoInfo),
          ...referenceDetailsSegment(sourceSha, commitInfo),
        };
      },
      signal,
    );
  }

  /**
   * 处理 Pull Request 合并事件，触发 pullreq_merged
   */
  async handleEventPullReqMerged(event: DomainEvent<PullReqEventKind.MERGED>, signal?: AbortSignal): Promise<void> {
    const { principalId, pullReqId, sourceSha } = event.payload;

    await this.triggerService.triggerForEventWithPullReq<PullReqMergedPayload>(
      WebhookTrigger.PULLREQ_MERGED,
      event.id,
      principalId,
      pullReqId,
      async context => {
        const { targetRepoInfo, sourceRepoInfo, commitInfo } = await this.resolve(context, sourceSha, signal);

        return {
          ...baseSegment(WebhookTrigger.PULLREQ_MERGED, targetRepoInfo, principalInfoFrom(context.principal)),
          ...pullReqSegment(context.pullReq),
          ...targetReferenceSegment(context.pullReq, targetRepoInfo),
          ...referenceSegment(context.pullReq, sourceRepoInfo),
          ...referenceDetailsSegment(sourceSha, commitInfo),
        };
      },
      signal,
    );
  }

  /**
   * 在源仓库中解析提交，并投影两个仓库
   */
  private async resolve(
    { targetRepo, sourceRepo }: PullReqTriggerContext,
    sha: string,
    signal?: AbortSignal,
  ): Promise<ResolvedReferences> {
    const commitInfo = await this.commitInfoService.fetchCommitInfoForEvent(sourceRepo.gitUid, sha, signal);

    return {
      targetRepoInfo: repositoryInfoFrom(targetRepo, this.urlProvider),
      sourceRepoInfo: repositoryInfoFrom(sourceRepo, this.urlProvider),
      commitInfo,
    };
  }
}
