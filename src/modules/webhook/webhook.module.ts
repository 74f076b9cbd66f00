/**
 * Webhook 模块
 */
import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import {
  DELIVERY_HTTP_CLIENT,
  EVENT_BUS,
  GIT_DATA_ACCESSOR,
  PLATFORM_HTTP_CLIENT,
  PRINCIPAL_STORE,
  PULLREQ_STORE,
  REPOSITORY_STORE,
  URL_PROVIDER,
  WEBHOOK_DELIVERY,
} from '../../constants';
import { AppConfig } from '../../types';
import { CommitInfoService } from '../../services/commit-info.service';
import { DeliveryService } from '../../services/delivery.service';
import { EventBusService } from '../../services/event-bus.service';
import { GitService } from '../../services/git.service';
import { PlatformService } from '../../services/platform.service';
import { UrlProviderService } from '../../services/url-provider.service';
import { createHttpClient } from '../../utils/http.util';
import { PullReqTriggerService } from './pullreq-trigger.service';
import { WebhookTriggerService } from './webhook-trigger.service';
import { WebhookController } from './webhook.controller';
import { WebhookService } from './webhook.service';

@Module({
  imports: [ConfigModule],
  controllers: [WebhookController],
  providers: [
    WebhookService,
    WebhookTriggerService,
    PullReqTriggerService,
    CommitInfoService,
    EventBusService,
    PlatformService,
    GitService,
    DeliveryService,
    UrlProviderService,
    { provide: EVENT_BUS, useExisting: EventBusService },
    { provide: PRINCIPAL_STORE, useExisting: PlatformService },
    { provide: REPOSITORY_STORE, useExisting: PlatformService },
    { provide: PULLREQ_STORE, useExisting: PlatformService },
    { provide: GIT_DATA_ACCESSOR, useExisting: GitService },
    { provide: WEBHOOK_DELIVERY, useExisting: DeliveryService },
    { provide: URL_PROVIDER, useExisting: UrlProviderService },
    {
      provide: PLATFORM_HTTP_CLIENT,
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AppConfig, true>) => {
        const platform = configService.get('platform', { infer: true });
        return createHttpClient(platform.apiBaseUrl, platform.token, platform.timeoutMs);
      },
    },
    {
      provide: DELIVERY_HTTP_CLIENT,
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AppConfig, true>) => {
        const delivery = configService.get('delivery', { infer: true });
        return createHttpClient(delivery.endpoint, delivery.token, delivery.timeoutMs);
      },
    },
  ],
})
export class WebhookModule {}
