/**
 * 进程内事件总线
 *
 * 每个订阅拥有独立的消费池，失败的事件按指数退避在 maxRetries 次内重新投递（至少一次）。
 * 取消导致的失败不重新投递。不同事件之间不保证顺序。
 */
import { Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import PQueue from 'p-queue';
import {
  ConsumerOptions,
  DomainEvent,
  EventBus,
  EventConsumer,
  PullReqEventKind,
  PullReqEventPayloads,
  Subscription,
} from '../types';
import { CancellationError, errorMessage } from '../utils/error.util';

/**
 * 总线内部登记的读取者（擦除具体事件类型）
 */
interface RegisteredReader extends Subscription {
  offer(event: DomainEvent<PullReqEventKind>): void;
  onIdle(): Promise<void>;
}

/**
 * 第 attempt 次失败后的重新投递延迟（指数退避）
 */
export function getBackoffDelay(baseDelayMs: number, attempt: number): number {
  return baseDelayMs * Math.pow(2, attempt);
}

/**
 * 单个订阅的事件读取者
 *
 * 关闭后不再接收新事件，但已接收事件的重新投递仍会完成。
 */
class EventReader<K extends PullReqEventKind> implements RegisteredReader {
  private readonly queue: PQueue;
  private readonly pendingRetries = new Set<Promise<void>>();
  private closed = false;

  constructor(
    readonly kind: K,
    private readonly consumer: EventConsumer<K>,
    private readonly options: ConsumerOptions,
    private readonly logger: Logger,
    private readonly onClose: () => void,
  ) {
    this.queue = new PQueue({ concurrency: Math.max(1, options.concurrency) });
  }

  offer(event: DomainEvent<PullReqEventKind>): void {
    if (!this.accepts(event)) {
      return;
    }
    if (this.closed) {
      this.logger.warn(`[${this.options.readerName}] reader closed, event ${event.id} (${event.kind}) not delivered`);
      return;
    }

    this.enqueue(event, 0);
  }

  /**
   * 等待队列和所有待执行的重新投递完成
   */
  async onIdle(): Promise<void> {
    await this.queue.onIdle();
    while (this.pendingRetries.size > 0) {
      await Promise.all([...this.pendingRetries]);
      await this.queue.onIdle();
    }
  }

  async unsubscribe(): Promise<void> {
    if (!this.closed) {
      this.closed = true;
      this.onClose();
    }
    await this.onIdle();
  }

  private accepts(event: DomainEvent<PullReqEventKind>): event is DomainEvent<K> {
    return event.kind === this.kind;
  }

  private enqueue(event: DomainEvent<K>, attempt: number): void {
    this.queue.add(() => this.deliver(event, attempt)).catch((error: unknown) => {
      this.logger.error(`[${this.options.readerName}] event ${event.id} (${event.kind}) dropped: ${errorMessage(error)}`);
    });
  }

  private scheduleRetry(event: DomainEvent<K>, attempt: number): void {
    const delayMs = getBackoffDelay(this.options.retryDelayMs, attempt - 1);
    const retry: Promise<void> = new Promise<void>(resolve => setTimeout(resolve, delayMs)).then(() => {
      this.pendingRetries.delete(retry);
      this.enqueue(event, attempt);
    });
    this.pendingRetries.add(retry);
  }

  private async deliver(event: DomainEvent<K>, attempt: number): Promise<void> {
    try {
      await this.consumer(event, AbortSignal.timeout(this.options.timeoutMs));
    } catch (error) {
      if (error instanceof CancellationError) {
        this.logger.debug(`[${this.options.readerName}] event ${event.id} cancelled: ${error.message}`);
        return;
      }

      if (attempt >= this.options.maxRetries) {
        this.logger.error(
          `[${this.options.readerName}] event ${event.id} (${event.kind}) failed after ${attempt + 1} attempts: ${errorMessage(error)}`,
        );
        return;
      }

      this.logger.warn(
        `[${this.options.readerName}] event ${event.id} (${event.kind}) failed (attempt ${attempt + 1}/${this.options.maxRetries + 1}), redelivering`,
      );
      this.scheduleRetry(event, attempt + 1);
    }
  }
}

@Injectable()
export class EventBusService implements EventBus {
  private readonly logger = new Logger(EventBusService.name);
  private readonly readers = new Set<RegisteredReader>();

  /**
   * 注册消费者
   */
  subscribe<K extends PullReqEventKind>(
    kind: K,
    consumer: EventConsumer<K>,
    options: ConsumerOptions,
  ): Subscription {
    const reader: RegisteredReader = new EventReader(kind, consumer, options, this.logger, () => {
      this.readers.delete(reader);
    });
    this.readers.add(reader);

    this.logger.log(
      `[${options.readerName}] subscribed to ${kind} (concurrency=${options.concurrency}, maxRetries=${options.maxRetries})`,
    );
    return reader;
  }

  /**
   * 发布事件，立即返回，消费异步进行
   */
  publish<K extends PullReqEventKind>(
    kind: K,
    payload: PullReqEventPayloads[K],
    id: string = randomUUID(),
  ): DomainEvent<K> {
    const frozenPayload: Readonly<PullReqEventPayloads[K]> = Object.freeze<PullReqEventPayloads[K]>(payload);
    const event: DomainEvent<K> = { id, kind, payload: frozenPayload, createdAt: Date.now() };
    Object.freeze(event);

    const readers = [...this.readers].filter(reader => reader.kind === kind);
    if (readers.length === 0) {
      this.logger.debug(`No subscribers for ${kind}, event ${id} dropped`);
    }
    for (const reader of readers) {
      reader.offer(event);
    }

    return event;
  }

  /**
   * 等待所有订阅的消费池空闲
   */
  async onIdle(): Promise<void> {
    await Promise.all([...this.readers].map(reader => reader.onIdle()));
  }
}
