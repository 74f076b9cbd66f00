/**
 * Webhook 触发编排服务
 */
import { Inject, Injectable, Logger } from '@nestjs/common';
import { PRINCIPAL_STORE, PULLREQ_STORE, REPOSITORY_STORE, WEBHOOK_DELIVERY } from '../../constants';
import {
  Principal,
  PrincipalStore,
  PullReq,
  PullReqStore,
  Repository,
  RepositoryStore,
  WebhookDelivery,
  WebhookPayload,
} from '../../types';
import { throwIfCancelled, toLookupError } from '../../utils/error.util';

/**
 * 构建负载时可用的实体
 */
export interface PullReqTriggerContext {
  principal: Principal;
  pullReq: PullReq;
  targetRepo: Repository;
  sourceRepo: Repository;
}

/**
 * 负载构建回调，仅在全部查询成功后调用
 */
export type PayloadBuilder<P extends WebhookPayload> = (context: PullReqTriggerContext) => Promise<P>;

@Injectable()
export class WebhookTriggerService {
  private readonly logger = new Logger(WebhookTriggerService.name);

  constructor(
    @Inject(PRINCIPAL_STORE) private readonly principalStore: PrincipalStore,
    @Inject(PULLREQ_STORE) private readonly pullReqStore: PullReqStore,
    @Inject(REPOSITORY_STORE) private readonly repoStore: RepositoryStore,
    @Inject(WEBHOOK_DELIVERY) private readonly delivery: WebhookDelivery,
  ) {}

  /**
   * 为 Pull Request 事件触发 Webhook
   *
   * 依次查询主体、Pull Request、目标仓库、源仓库，任一失败即中止，
   * 不会产生部分负载。成功后只交付一次，不做重试；
   * 同一事件被重新投递时整个流程会完整重跑，去重由投递方按 eventId 处理。
   */
  async triggerForEventWithPullReq<P extends WebhookPayload>(
    trigger: P['trigger'],
    eventId: string,
    principalId: number,
    pullReqId: number,
    buildPayload: PayloadBuilder<P>,
    signal?: AbortSignal,
  ): Promise<void> {
    const principal = await this.lookup(`principal with id '${principalId}'`, signal, s =>
      this.principalStore.findPrincipal(principalId, s),
    );
    const pullReq = await this.lookup(`pull request with id '${pullReqId}'`, signal, s =>
      this.pullReqStore.findPullReq(pullReqId, s),
    );
    const targetRepo = await this.lookup(`repo with id '${pullReq.targetRepoId}'`, signal, s =>
      this.repoStore.findRepository(pullReq.targetRepoId, s),
    );
    const sourceRepo = await this.lookup(`repo with id '${pullReq.sourceRepoId}'`, signal, s =>
      this.repoStore.findRepository(pullReq.sourceRepoId, s),
    );

    const payload = await buildPayload({ principal, pullReq, targetRepo, sourceRepo });

    throwIfCancelled(signal, `trigger ${trigger} for event ${eventId}`);
    this.logger.debug(`Dispatching ${trigger} for pull request ${pullReq.number} in ${targetRepo.path} (event=${eventId})`);

    await this.delivery.dispatch({ eventId, trigger, repo: targetRepo, payload }, signal);
  }

  private async lookup<T>(
    what: string,
    signal: AbortSignal | undefined,
    find: (signal?: AbortSignal) => Promise<T>,
  ): Promise<T> {
    throwIfCancelled(signal, `lookup of ${what}`);

    try {
      return await find(signal);
    } catch (error) {
      throw toLookupError(error, what, signal);
    }
  }
}
