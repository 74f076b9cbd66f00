import { AxiosError, AxiosHeaders, CanceledError } from 'axios';
import {
  BackendError,
  CancellationError,
  NotFoundError,
  throwIfCancelled,
  toLookupError,
} from './error.util';

function axiosError(status: number): AxiosError {
  const config = { headers: new AxiosHeaders() };
  return new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_REQUEST', config, null, {
    data: {},
    status,
    statusText: String(status),
    headers: {},
    config,
  });
}

describe('error.util', () => {
  it('should pass typed errors through unchanged', () => {
    const error = new NotFoundError("repo with id '1' doesn't exist");
    expect(toLookupError(error, "repo with id '1'")).toBe(error);
  });

  it('should map a 404 response to NotFoundError', () => {
    const error = toLookupError(axiosError(404), "principal with id '7'");
    expect(error).toBeInstanceOf(NotFoundError);
    expect(error.message).toBe("principal with id '7' doesn't exist");
  });

  it('should map other failures to BackendError with the cause', () => {
    const cause = axiosError(503);
    const error = toLookupError(cause, "principal with id '7'");
    expect(error).toBeInstanceOf(BackendError);
    expect(error.message).toBe("failed to get principal with id '7': Request failed with status code 503");
    expect(error.cause).toBe(cause);
  });

  it('should map axios cancellation to CancellationError', () => {
    expect(toLookupError(new CanceledError(), 'pull request')).toBeInstanceOf(CancellationError);
  });

  it('should prefer cancellation when the signal is aborted', () => {
    const controller = new AbortController();
    controller.abort();
    expect(toLookupError(axiosError(404), 'repo', controller.signal)).toBeInstanceOf(CancellationError);
  });

  it('should throw only when the signal is aborted', () => {
    const controller = new AbortController();
    expect(() => throwIfCancelled(controller.signal, 'lookup')).not.toThrow();
    expect(() => throwIfCancelled(undefined, 'lookup')).not.toThrow();

    controller.abort();
    expect(() => throwIfCancelled(controller.signal, 'lookup')).toThrow(CancellationError);
    expect(() => throwIfCancelled(controller.signal, 'lookup')).toThrow('lookup cancelled');
  });

  it('should name errors after their class', () => {
    expect(new BackendError('boom').name).toBe('BackendError');
  });
});
