import { Test, TestingModule } from '@nestjs/testing';
import { PRINCIPAL_STORE, PULLREQ_STORE, REPOSITORY_STORE, WEBHOOK_DELIVERY } from '../../constants';
import { PullReqClosedPayload, WebhookTrigger } from '../../types';
import { BackendError, CancellationError, NotFoundError } from '../../utils/error.util';
import { commitInfoFrom, principalInfoFrom, repositoryInfoFrom } from '../../utils/projection.util';
import {
  baseSegment,
  pullReqSegment,
  referenceDetailsSegment,
  referenceSegment,
  targetReferenceSegment,
} from '../../utils/segment.util';
import { InMemoryStores, RecordingDelivery, makeCommit, staticUrlProvider, targetRepo } from '../../../test/fixtures';
import { PullReqTriggerContext, WebhookTriggerService } from './webhook-trigger.service';

function buildClosedPayload(context: PullReqTriggerContext): PullReqClosedPayload {
  const targetRepoInfo = repositoryInfoFrom(context.targetRepo, staticUrlProvider);
  const sourceRepoInfo = repositoryInfoFrom(context.sourceRepo, staticUrlProvider);

  return {
    ...baseSegment(WebhookTrigger.PULLREQ_CLOSED, targetRepoInfo, principalInfoFrom(context.principal)),
    ...pullReqSegment(context.pullReq),
    ...targetReferenceSegment(context.pullReq, targetRepoInfo),
    ...referenceSegment(context.pullReq, sourceRepoInfo),
    ...referenceDetailsSegment('abc123', commitInfoFrom(makeCommit('abc123'))),
  };
}

describe('WebhookTriggerService', () => {
  let service: WebhookTriggerService;
  let stores: InMemoryStores;
  let delivery: RecordingDelivery;
  let builder: jest.Mock<Promise<PullReqClosedPayload>, [PullReqTriggerContext]>;

  beforeEach(async () => {
    stores = new InMemoryStores();
    delivery = new RecordingDelivery();
    builder = jest.fn(async (context: PullReqTriggerContext) => buildClosedPayload(context));

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        WebhookTriggerService,
        { provide: PRINCIPAL_STORE, useValue: stores },
        { provide: PULLREQ_STORE, useValue: stores },
        { provide: REPOSITORY_STORE, useValue: stores },
        { provide: WEBHOOK_DELIVERY, useValue: delivery },
      ],
    }).compile();

    service = module.get<WebhookTriggerService>(WebhookTriggerService);
  });

  const trigger = (principalId = 7, pullReqId = 42, signal?: AbortSignal): Promise<void> =>
    service.triggerForEventWithPullReq(WebhookTrigger.PULLREQ_CLOSED, 'event-1', principalId, pullReqId, builder, signal);

  it('should look up principal, pull request, target repo and source repo in order', async () => {
    await trigger();

    expect(stores.calls).toEqual(['principal:7', 'pullreq:42', 'repo:1', 'repo:2']);
  });

  it('should pass every looked-up entity to the builder', async () => {
    await trigger();

    expect(builder).toHaveBeenCalledTimes(1);
    const [context] = builder.mock.calls[0];
    expect(context.principal.uid).toBe('jdoe');
    expect(context.pullReq.number).toBe(5);
    expect(context.targetRepo.path).toBe('acme/app');
    expect(context.sourceRepo.path).toBe('jdoe/app');
  });

  it('should hand off exactly one payload for the target repo', async () => {
    await trigger();

    expect(delivery.handoffs).toHaveLength(1);
    const [handoff] = delivery.handoffs;
    expect(handoff.eventId).toBe('event-1');
    expect(handoff.trigger).toBe(WebhookTrigger.PULLREQ_CLOSED);
    expect(handoff.repo).toEqual(targetRepo);
    expect(handoff.payload.trigger).toBe(WebhookTrigger.PULLREQ_CLOSED);
    expect(handoff.payload.sha).toBe('abc123');
  });

  it('should stop at the first missing entity', async () => {
    stores.pullReqs.clear();

    await expect(trigger()).rejects.toMatchObject({
      name: 'NotFoundError',
      message: "pull request with id '42' doesn't exist",
    });
    expect(stores.calls).toEqual(['principal:7', 'pullreq:42']);
    expect(builder).not.toHaveBeenCalled();
    expect(delivery.handoffs).toHaveLength(0);
  });

  it('should report a missing source repo by its id', async () => {
    stores.repos.delete(2);

    await expect(trigger()).rejects.toMatchObject({ name: 'NotFoundError', message: "repo with id '2' doesn't exist" });
    expect(builder).not.toHaveBeenCalled();
  });

  it('should wrap store failures as BackendError', async () => {
    jest.spyOn(stores, 'findPrincipal').mockRejectedValueOnce(new Error('timeout'));

    await expect(trigger()).rejects.toMatchObject({
      name: 'BackendError',
      message: "failed to get principal with id '7': timeout",
    });
    expect(delivery.handoffs).toHaveLength(0);
  });

  it('should not hand off when the builder fails', async () => {
    builder.mockRejectedValueOnce(new BackendError('commit store unavailable'));

    await expect(trigger()).rejects.toThrow('commit store unavailable');
    expect(delivery.handoffs).toHaveLength(0);
  });

  it('should stop with CancellationError when aborted during a lookup', async () => {
    const controller = new AbortController();
    jest.spyOn(stores, 'findPullReq').mockImplementationOnce(async () => {
      controller.abort();
      throw new Error('request aborted');
    });

    await expect(trigger(7, 42, controller.signal)).rejects.toMatchObject({
      name: 'CancellationError',
      message: "lookup of pull request with id '42' cancelled",
    });
    expect(stores.calls).toEqual(['principal:7']);
    expect(builder).not.toHaveBeenCalled();
    expect(delivery.handoffs).toHaveLength(0);
  });

  it('should not touch the stores once cancelled', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(trigger(7, 42, controller.signal)).rejects.toBeInstanceOf(CancellationError);
    expect(stores.calls).toHaveLength(0);
  });
});
