import {
  AuthorizationFailure,
  BadRequestFailure,
  ConnectionFailure,
  InvalidResponseFailure,
  UnexpectedStatusFailure,
  unwrap,
} from '../src/errors';
import type { PostResult } from '../src/types';

describe('failures', () => {
  test('carry their kind, status and body', () => {
    const failures = [
      new AuthorizationFailure('denied'),
      new BadRequestFailure('missing name'),
      new UnexpectedStatusFailure(502, 'gateway'),
      new InvalidResponseFailure('Response body is not valid JSON', '<html>'),
    ];

    expect(failures.map(f => [f.name, f.kind, f.status, f.body])).toEqual([
      ['AuthorizationFailure', 'authorization', 403, 'denied'],
      ['BadRequestFailure', 'bad_request', 400, 'missing name'],
      ['UnexpectedStatusFailure', 'unexpected_status', 502, 'gateway'],
      ['InvalidResponseFailure', 'invalid_response', 200, '<html>'],
    ]);
  });

  test('ConnectionFailure keeps the transport error as its cause', () => {
    const cause = new Error('ECONNREFUSED');
    const failure = new ConnectionFailure('http://localhost:8089/repositories', cause);

    expect(failure).toBeInstanceOf(Error);
    expect(failure.message).toBe('Unable to connect to http://localhost:8089/repositories');
    expect(failure.cause).toBe(cause);
    expect(failure.status).toBeUndefined();
  });
});

describe('unwrap', () => {
  test('returns the data of a success', () => {
    const result: PostResult<{ uri: string }> = { success: true, data: { uri: '/repositories/2' } };
    expect(unwrap(result)).toEqual({ uri: '/repositories/2' });
  });

  test('throws the failure', () => {
    const error = new BadRequestFailure('missing name');
    const result: PostResult<unknown> = { success: false, error };
    expect(() => unwrap(result)).toThrow(error);
  });
});
