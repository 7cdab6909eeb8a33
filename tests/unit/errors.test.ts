/**
 * Unit Tests: failure classification.
 */
import { describe, it, expect } from 'vitest';
import {
  ClientError,
  RequestTimeoutError,
  RetriesExhaustedError,
  ServerError,
  TransportError,
  ValidationError,
  classifyFailure,
} from '../../src/errors.js';
import { connectionError, timeoutError } from '../helpers/mock-fetch.js';

describe('classifyFailure', () => {
  it('maps timeout and abort errors to RequestTimeoutError', () => {
    const fromTimeout = classifyFailure(timeoutError(), 5000);
    expect(fromTimeout).toBeInstanceOf(RequestTimeoutError);
    expect(fromTimeout.message).toBe('Request timeout');

    const abort = new Error('aborted');
    abort.name = 'AbortError';
    expect(classifyFailure(abort, 5000)).toBeInstanceOf(RequestTimeoutError);
  });

  it('includes the socket error in transport failures', () => {
    const failure = classifyFailure(connectionError(), 5000);
    expect(failure).toBeInstanceOf(TransportError);
    expect(failure.message).toBe('fetch failed (connect ECONNREFUSED 127.0.0.1:4000)');
  });

  it('passes classified errors through', () => {
    const error = new ServerError(503, 'busy');
    expect(classifyFailure(error, 5000)).toBe(error);
  });

  it('wraps non-Error rejections', () => {
    expect(classifyFailure('socket hang up', 5000).message).toBe('socket hang up');
  });
});

describe('error taxonomy', () => {
  it('formats HTTP failures with a bounded body excerpt', () => {
    const error = new ClientError(422, 'x'.repeat(300));
    expect(error.message).toBe(`HTTP 422: ${'x'.repeat(200)}`);
    expect(error.code).toBe('HTTP_4XX');
    expect(error.body).toHaveLength(300);
  });

  it('keeps the last failure on an exhausted retry', () => {
    const last = new RequestTimeoutError(1000);
    const exhausted = new RetriesExhaustedError(last, 3);
    expect(exhausted.cause).toBe(last);
    expect(exhausted.attempts).toBe(3);
    expect(exhausted.message).toBe('Request timeout');
  });

  it('joins validation issues into the message', () => {
    const error = new ValidationError(['a: bad', 'b: worse']);
    expect(error.message).toBe('Invalid configuration: a: bad; b: worse');
    expect(error.code).toBe('VALIDATION_ERROR');
  });
});
