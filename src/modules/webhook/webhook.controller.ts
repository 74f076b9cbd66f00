/**
 * 事件接入控制器：外部事件总线通过 HTTP 推送 Pull Request 事件
 */
import { Body, Controller, HttpCode, HttpStatus, Inject, Logger, Post } from '@nestjs/common';
import { EVENT_BUS } from '../../constants';
import { DomainEvent, EventBus, PullReqEventKind } from '../../types';
import {
  PullReqBranchUpdatedEventDto,
  PullReqClosedEventDto,
  PullReqCreatedEventDto,
  PullReqMergedEventDto,
  PullReqReopenedEventDto,
  toEventBase,
} from './dto/pullreq-event.dto';

export interface EventAcceptedResponse {
  message: string;
  id: string;
}

@Controller('events/pullreq')
export class WebhookController {
  private readonly logger = new Logger(WebhookController.name);

  constructor(@Inject(EVENT_BUS) private readonly eventBus: EventBus) {}

  @Post('created')
  @HttpCode(HttpStatus.ACCEPTED)
  publishCreated(@Body() dto: PullReqCreatedEventDto): EventAcceptedResponse {
    const event = this.eventBus.publish(
      PullReqEventKind.CREATED,
      {
        ...toEventBase(dto),
        sourceBranch: dto.source_branch,
        targetBranch: dto.target_branch,
        sourceSha: dto.source_sha,
      },
      dto.id,
    );
    return this.accepted(event);
  }

  @Post('reopened')
  @HttpCode(HttpStatus.ACCEPTED)
  publishReopened(@Body() dto: PullReqReopenedEventDto): EventAcceptedResponse {
    const event = this.eventBus.publish(
      PullReqEventKind.REOPENED,
      {
        ...toEventBase(dto),
        sourceSha: dto.source_sha,
        mergeBaseSha: dto.merge_base_sha,
      },
      dto.id,
    );
    return this.accepted(event);
  }

  @Post('branch-updated')
  @HttpCode(HttpStatus.ACCEPTED)
  publishBranchUpdated(@Body() dto: PullReqBranchUpdatedEventDto): EventAcceptedResponse {
    const event = this.eventBus.publish(
      PullReqEventKind.BRANCH_UPDATED,
      {
        ...toEventBase(dto),
        oldSha: dto.old_sha,
        newSha: dto.new_sha,
        forced: dto.forced,
      },
      dto.id,
    );
    return this.accepted(event);
  }

  @Post('closed')
  @HttpCode(HttpStatus.ACCEPTED)
  publishClosed(@Body() dto: PullReqClosedEventDto): EventAcceptedResponse {
    const event = this.eventBus.publish(
      PullReqEventKind.CLOSED,
      {
        ...toEventBase(dto),
        sourceSha: dto.source_sha,
      },
      dto.id,
    );
    return this.accepted(event);
  }

  @Post('merged')
  @HttpCode(HttpStatus.ACCEPTED)
  publishMerged(@Body() dto: PullReqMergedEventDto): EventAcceptedResponse {
    const event = this.eventBus.publish(
      PullReqEventKind.MERGED,
      {
        ...toEventBase(dto),
        mergeMethod: dto.merge_method,
        mergeSha: dto.merge_sha,
        targetSha: dto.target_sha,
        sourceSha: dto.source_sha,
      },
      dto.id,
    );
    return this.accepted(event);
  }

  private accepted(event: DomainEvent<PullReqEventKind>): EventAcceptedResponse {
    this.logger.log(`Received ${event.kind} event ${event.id} for pull request ${event.payload.pullReqId}`);
    return { message: 'Event accepted', id: event.id };
  }
}
