import test from 'node:test';
import assert from 'node:assert/strict';
import { loadConfig } from './config.js';
import { ValidationError } from './errors.js';

test('loadConfig: empty environment -> defaults', () => {
  assert.deepEqual(loadConfig({}), {
    baseUrl: 'https://lk.misis.ru',
    timeout: 30000,
    maxRetries: 3,
    backoffBaseMs: 1000,
    logLevel: undefined,
    login: undefined,
    password: undefined
  });
});

test('loadConfig: overrides are parsed and trailing slashes dropped', () => {
  const config = loadConfig({
    MISIS_BASE_URL: 'http://localhost:3000/',
    MISIS_TIMEOUT_MS: '5000',
    MISIS_MAX_RETRIES: '5',
    MISIS_BACKOFF_MS: '0',
    LOG_LEVEL: 'DEBUG',
    MISIS_LOGIN: 'student',
    MISIS_PASSWORD: 'test-password'
  });

  assert.equal(config.baseUrl, 'http://localhost:3000');
  assert.equal(config.timeout, 5000);
  assert.equal(config.maxRetries, 5);
  assert.equal(config.backoffBaseMs, 0);
  assert.equal(config.logLevel, 'debug');
  assert.equal(config.login, 'student');
  assert.equal(config.password, 'test-password');
});

test('loadConfig: bad values name the variable', () => {
  assert.throws(() => loadConfig({ MISIS_MAX_RETRIES: '0' }), (error: unknown) => {
    assert.ok(error instanceof ValidationError);
    assert.equal(error.issues[0].field, 'MISIS_MAX_RETRIES');
    return true;
  });
  assert.throws(() => loadConfig({ MISIS_TIMEOUT_MS: 'soon' }), {
    message: 'Validation failed: MISIS_TIMEOUT_MS: must be an integer, received: soon'
  });
  assert.throws(() => loadConfig({ LOG_LEVEL: 'loud' }), { message: 'Validation failed: LOG_LEVEL: unknown level: loud' });
  assert.throws(() => loadConfig({ MISIS_BASE_URL: 'lk.misis.ru' }), ValidationError);
});
