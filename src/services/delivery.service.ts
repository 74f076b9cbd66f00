/**
 * Webhook 投递服务：把组装好的负载交给投递子系统
 */
import { Inject, Injectable, Logger } from '@nestjs/common';
import { AxiosInstance } from 'axios';
import { DELIVERY_HTTP_CLIENT } from '../constants';
import { WebhookDelivery, WebhookHandoff, WebhookParentType } from '../types';
import { BackendError, CancellationError, errorMessage, throwIfCancelled } from '../utils/error.util';

/**
 * 投递子系统接收的触发请求
 */
export interface TriggerRequest {
  trigger_id: string;
  trigger: string;
  parent_type: WebhookParentType;
  parent_id: number;
  payload: unknown;
}

@Injectable()
export class DeliveryService implements WebhookDelivery {
  private readonly logger = new Logger(DeliveryService.name);

  constructor(@Inject(DELIVERY_HTTP_CLIENT) private readonly httpClient: AxiosInstance) {}

  /**
   * 单次交付，重试和结果由投递子系统负责
   */
  async dispatch(handoff: WebhookHandoff, signal?: AbortSignal): Promise<void> {
    throwIfCancelled(signal, `handoff of event ${handoff.eventId}`);

    const body: TriggerRequest = {
      trigger_id: handoff.eventId,
      trigger: handoff.trigger,
      parent_type: WebhookParentType.REPO,
      parent_id: handoff.repo.id,
      payload: handoff.payload,
    };

    try {
      await this.httpClient.post('/triggers', body, {
        signal,
        headers: { 'Idempotency-Key': handoff.eventId },
      });
      this.logger.log(`Handed off ${handoff.trigger} for repo ${handoff.repo.path} (event=${handoff.eventId})`);
    } catch (error) {
      if (signal?.aborted) {
        throw new CancellationError(`handoff of event ${handoff.eventId} cancelled`, { cause: error });
      }
      throw new BackendError(`failed to hand off event ${handoff.eventId}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}
