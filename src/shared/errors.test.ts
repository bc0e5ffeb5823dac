import test from 'node:test';
import assert from 'node:assert/strict';
import {
  AuthenticationError,
  isPortalError,
  NetworkError,
  ParseError,
  SessionExpiredError,
  settle,
  toPortalError,
  ValidationError
} from './errors.js';

test('each error class carries its kind, name and status hint', () => {
  const cases = [
    [new NetworkError(), 'network', 'NetworkError', 0],
    [new AuthenticationError(), 'authentication', 'AuthenticationError', 401],
    [new ParseError(), 'parse', 'ParseError', 200],
    [new SessionExpiredError(), 'session_expired', 'SessionExpiredError', 401],
    [new ValidationError([]), 'validation', 'ValidationError', 422]
  ] as const;

  for (const [error, kind, name, statusCode] of cases) {
    assert.equal(error.kind, kind);
    assert.equal(error.name, name);
    assert.equal(error.statusCode, statusCode);
    assert.ok(error instanceof Error);
    assert.ok(isPortalError(error));
  }
});

test('ValidationError message lists every issue', () => {
  const error = new ValidationError([
    { field: 'login', message: 'must not be empty' },
    { field: 'password', message: 'must not be empty' }
  ]);
  assert.equal(error.message, 'Validation failed: login: must not be empty; password: must not be empty');
  assert.equal(error.issues.length, 2);
});

test('toPortalError passes listed kinds through unchanged', () => {
  const original = new NetworkError('HTTP 502: Bad Gateway');
  assert.equal(toPortalError(original, 'authentication'), original);
});

test('toPortalError wraps kinds outside the pass-through list', () => {
  const expired = new SessionExpiredError();
  const wrapped = toPortalError(expired, 'parse', ['parse']);
  assert.ok(wrapped instanceof ParseError);
  assert.equal(wrapped.cause, expired);
});

test('toPortalError wraps plain errors with context', () => {
  const cause = new TypeError('boom');
  const wrapped = toPortalError(cause, 'authentication', undefined, 'Authentication failed');
  assert.ok(wrapped instanceof AuthenticationError);
  assert.equal(wrapped.message, 'Authentication failed: boom');
  assert.equal(wrapped.cause, cause);
});

test('toPortalError handles non-Error throwables', () => {
  const wrapped = toPortalError('plain string', 'network');
  assert.ok(wrapped instanceof NetworkError);
  assert.equal(wrapped.message, 'plain string');
});

test('settle captures success and failure as results', async () => {
  const ok = await settle(Promise.resolve(42));
  assert.deepEqual(ok, { ok: true, value: 42 });

  const failed = await settle(Promise.reject(new SessionExpiredError()));
  assert.equal(failed.ok, false);
  if (failed.ok) return;
  assert.equal(failed.error.kind, 'session_expired');

  const unexpected = await settle(Promise.reject(new RangeError('odd')));
  assert.equal(unexpected.ok, false);
  if (unexpected.ok) return;
  assert.equal(unexpected.error.kind, 'parse');
  assert.equal(unexpected.error.message, 'odd');
});
