import { PullReqState, WebhookTrigger } from '../types';
import { principal, pullReq, sourceRepo, staticUrlProvider, targetRepo } from '../../test/fixtures';
import { principalInfoFrom, repositoryInfoFrom } from './projection.util';
import {
  baseSegment,
  branchReferenceName,
  pullReqSegment,
  referenceDetailsSegment,
  referenceSegment,
  referenceUpdateSegment,
  targetReferenceSegment,
} from './segment.util';

describe('segment.util', () => {
  const targetRepoInfo = repositoryInfoFrom(targetRepo, staticUrlProvider);
  const sourceRepoInfo = repositoryInfoFrom(sourceRepo, staticUrlProvider);

  it('should prefix branch names with refs/heads/', () => {
    expect(branchReferenceName('main')).toBe('refs/heads/main');
    expect(branchReferenceName('feature/x')).toBe('refs/heads/feature/x');
    expect(branchReferenceName('release/2024/q1')).toBe('refs/heads/release/2024/q1');
  });

  it('should build the base segment with the trigger as discriminator', () => {
    const segment = baseSegment(WebhookTrigger.PULLREQ_CREATED, targetRepoInfo, principalInfoFrom(principal));

    expect(segment.trigger).toBe('pullreq_created');
    expect(segment.repo).toBe(targetRepoInfo);
    expect(segment.principal.uid).toBe('jdoe');
  });

  it('should scope the target reference to the target repository', () => {
    expect(targetReferenceSegment(pullReq, targetRepoInfo)).toEqual({
      target_ref: { name: 'refs/heads/main', repo: targetRepoInfo },
    });
  });

  it('should scope the source reference to the source repository', () => {
    expect(referenceSegment(pullReq, sourceRepoInfo)).toEqual({
      ref: { name: 'refs/heads/feature/x', repo: sourceRepoInfo },
    });
  });

  it('should project the pull request', () => {
    expect(pullReqSegment({ ...pullReq, state: PullReqState.CLOSED }).pull_req.state).toBe('closed');
  });

  it('should build reference details and update segments', () => {
    const commit = {
      sha: 'bbb',
      message: 'update',
      author: { identity: { name: 'a', email: 'a@example.com' }, when: '2024-01-01T00:00:00Z' },
      committer: { identity: { name: 'a', email: 'a@example.com' }, when: '2024-01-01T00:00:00Z' },
    };

    expect(referenceDetailsSegment('bbb', commit)).toEqual({ sha: 'bbb', commit });
    expect(referenceUpdateSegment('aaa', true)).toEqual({ old_sha: 'aaa', forced: true });
  });
});
