// tests/unit/HttpCore.test.ts

import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';
import nock from 'nock';
import { HttpCore } from '../../src/core/http/HttpCore';
import { NetworkError, NetworkTimeoutError } from '../../src/utils/errors';
import { MetricsCollector } from '../../src/observability/MetricsCollector';
import { noopMetrics, quietLogger } from '../helpers/fakes';

const HOST = 'https://console.test';

describe('HttpCore', () => {
  let httpCore: HttpCore;

  beforeAll(() => {
    nock.disableNetConnect();
  });

  afterAll(() => {
    nock.enableNetConnect();
  });

  beforeEach(() => {
    nock.cleanAll();
    httpCore = new HttpCore({ timeout: 5000, keepAlive: false }, noopMetrics(), quietLogger());
  });

  it('should return the body as raw text', async () => {
    nock(HOST).get('/web/api/v2.1/sites').reply(200, { data: [{ id: 1 }] });

    const response = await httpCore.get({ url: `${HOST}/web/api/v2.1/sites` });

    expect(response.status).toBe(200);
    expect(response.data).toBe('{"data":[{"id":1}]}');
  });

  it('should return error statuses instead of throwing', async () => {
    nock(HOST).get('/web/api/v2.1/missing').reply(404, { errors: [] });

    const response = await httpCore.get({ url: `${HOST}/web/api/v2.1/missing` });

    expect(response.status).toBe(404);
  });

  it('should send caller headers, query and a request id', async () => {
    const scope = nock(HOST)
      .get('/web/api/v2.1/agents')
      .query({ limit: '100', cursor: 'abc' })
      .matchHeader('authorization', 'ApiToken test-token')
      .matchHeader('accept', 'application/json')
      .matchHeader('x-request-id', /^[0-9a-f-]{36}$/)
      .reply(200, '[]');

    await httpCore.get({
      url: `${HOST}/web/api/v2.1/agents`,
      headers: { Authorization: 'ApiToken test-token' },
      query: { limit: 100, cursor: 'abc' },
    });

    expect(scope.isDone()).toBe(true);
  });

  it('should lower-case response header names', async () => {
    nock(HOST).get('/web/api/v2.1/alerts').reply(429, '', { 'Retry-After': '5' });

    const response = await httpCore.get({ url: `${HOST}/web/api/v2.1/alerts` });

    expect(response.status).toBe(429);
    expect(response.headers['retry-after']).toBe('5');
  });

  it('should count each request once under its final status', async () => {
    const metrics = new MetricsCollector();
    const counted = new HttpCore({ timeout: 5000, keepAlive: false }, metrics, quietLogger());
    nock(HOST).get('/web/api/v2.1/sites').reply(200, '[]').get('/web/api/v2.1/agents').reply(404, '');

    await counted.get({ url: `${HOST}/web/api/v2.1/sites` });
    await counted.get({ url: `${HOST}/web/api/v2.1/agents` });

    const text = await metrics.getMetrics();
    expect(text).toContain('http_requests_total{host="console.test",method="GET",status="200"} 1');
    expect(text).toContain('http_requests_total{host="console.test",method="GET",status="404"} 1');
    expect(text).not.toContain('status="initiated"');
  });

  it('should wrap connection failures in NetworkError', async () => {
    nock(HOST).get('/web/api/v2.1/sites').replyWithError({ code: 'ECONNRESET', message: 'socket hang up' });

    await expect(httpCore.get({ url: `${HOST}/web/api/v2.1/sites` })).rejects.toBeInstanceOf(NetworkError);
  });

  it('should report timeouts as NetworkTimeoutError', async () => {
    nock(HOST).get('/web/api/v2.1/sites').delay(500).reply(200, '[]');

    await expect(httpCore.get({ url: `${HOST}/web/api/v2.1/sites`, timeout: 50 })).rejects.toBeInstanceOf(
      NetworkTimeoutError
    );
  });
});
