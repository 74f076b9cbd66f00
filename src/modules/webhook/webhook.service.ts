/**
 * Webhook 分发服务：订阅 Pull Request 事件并交给对应的处理方法
 */
import { Inject, Injectable, Logger, OnApplicationShutdown, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EVENT_BUS } from '../../constants';
import { AppConfig, ConsumerOptions, DomainEvent, EventBus, PullReqEventKind, Subscription } from '../../types';
import { CancellationError, NotFoundError, errorMessage } from '../../utils/error.util';
import { PullReqTriggerService } from './pullreq-trigger.service';

@Injectable()
export class WebhookService implements OnModuleInit, OnApplicationShutdown {
  private readonly logger = new Logger(WebhookService.name);
  private subscriptions: Subscription[] = [];

  constructor(
    private readonly configService: ConfigService<AppConfig, true>,
    @Inject(EVENT_BUS) private readonly eventBus: EventBus,
    private readonly pullReqTriggerService: PullReqTriggerService,
  ) {}

  /**
   * 启动时为每类事件注册一个消费者
   */
  onModuleInit(): void {
    const webhookConfig = this.configService.get('webhook', { infer: true });
    const options: ConsumerOptions = {
      readerName: webhookConfig.eventReaderName,
      concurrency: webhookConfig.concurrency,
      maxRetries: webhookConfig.maxRetries,
      timeoutMs: webhookConfig.eventTimeoutMs,
      retryDelayMs: webhookConfig.retryDelayMs,
    };
    const handler = this.pullReqTriggerService;

    this.subscriptions = [
      this.eventBus.subscribe(
        PullReqEventKind.CREATED,
        (event, signal) => this.consume(event, () => handler.handleEventPullReqCreated(event, signal)),
        options,
      ),
      this.eventBus.subscribe(
        PullReqEventKind.REOPENED,
        (event, signal) => this.consume(event, () => handler.handleEventPullReqReopened(event, signal)),
        options,
      ),
      this.eventBus.subscribe(
        PullReqEventKind.BRANCH_UPDATED,
        (event, signal) => this.consume(event, () => handler.handleEventPullReqBranchUpdated(event, signal)),
        options,
      ),
      this.eventBus.subscribe(
        PullReqEventKind.CLOSED,
        (event, signal) => this.consume(event, () => handler.handleEventPullReqClosed(event, signal)),
        options,
      ),
      this.eventBus.subscribe(
        PullReqEventKind.MERGED,
        (event, signal) => this.consume(event, () => handler.handleEventPullReqMerged(event, signal)),
        options,
      ),
    ];

    this.logger.log(`Webhook service registered ${this.subscriptions.length} event consumers`);
  }

  /**
   * 关闭时取消订阅，等待进行中的处理完成
   */
  async onApplicationShutdown(signal?: string): Promise<void> {
    const subscriptions = this.subscriptions;
    this.subscriptions = [];

    this.logger.log(`Shutting down webhook service (${signal ?? 'no signal'}), draining ${subscriptions.length} consumers`);
    await Promise.all(subscriptions.map(subscription => subscription.unsubscribe()));
    this.logger.log('Webhook service drained');
  }

  /**
   * 执行处理并应用错误策略
   * - NotFound：记录后丢弃事件
   * - 取消：交回事件总线，不按失败记录
   * - 其他：记录后交回事件总线重新投递
   */
  async consume<K extends PullReqEventKind>(event: DomainEvent<K>, handle: () => Promise<void>): Promise<void> {
    const startTime = Date.now();

    try {
      await handle();
      this.logger.debug(`Processed ${event.kind} event ${event.id} in ${Date.now() - startTime}ms`);
    } catch (error) {
      if (error instanceof NotFoundError) {
        this.logger.warn(`Discarding ${event.kind} event ${event.id}: ${error.message}`);
        return;
      }

      if (error instanceof CancellationError) {
        this.logger.debug(`Processing of ${event.kind} event ${event.id} cancelled: ${error.message}`);
        throw error;
      }

      this.logger.error(
        `Failed to process ${event.kind} event ${event.id}: ${errorMessage(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      throw error;
    }
  }
}
