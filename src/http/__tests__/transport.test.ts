/**
 * Tests for the undici transport
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { MockAgent, errors } from 'undici';
import { UndiciTransport, toTransportError } from '../transport.js';
import { hasHeader, findHeader, withoutHeader } from '../headers.js';

const ORIGIN = 'https://sqs.us-east-1.amazonaws.com';

describe('UndiciTransport', () => {
  let agent: MockAgent;
  let transport: UndiciTransport;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
    transport = new UndiciTransport({ dispatcher: agent, timeout: 5000 });
  });

  afterEach(async () => {
    await agent.close();
  });

  it('should return status, lower-cased headers and body', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: '/?Action=ListQueues&Version=2012-11-05', method: 'GET' })
      .reply(200, '<ListQueuesResponse/>', { headers: { 'X-Amzn-RequestId': 'req-1' } });

    const result = await transport.send({
      method: 'GET',
      url: `${ORIGIN}/?Action=ListQueues&Version=2012-11-05`,
      headers: [['accept', 'application/xml']],
    });

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.status).toBe(200);
    expect(result.data.headers['x-amzn-requestid']).toBe('req-1');
    expect(new TextDecoder().decode(result.data.body)).toBe('<ListQueuesResponse/>');
  });

  it('should send a request with a body', async () => {
    agent.get(ORIGIN).intercept({ path: '/', method: 'POST' }).reply(200, 'ok');

    const result = await transport.send({
      method: 'POST',
      url: `${ORIGIN}/`,
      headers: [['content-type', 'application/x-www-form-urlencoded; charset=utf-8']],
      body: new TextEncoder().encode('Action=ListQueues&Version=2012-11-05'),
    });

    expect(result.success ? new TextDecoder().decode(result.data.body) : undefined).toBe('ok');
  });

  it('should return error statuses as responses', async () => {
    agent.get(ORIGIN).intercept({ path: '/', method: 'POST' }).reply(400, '<ErrorResponse/>');

    const result = await transport.send({ method: 'POST', url: `${ORIGIN}/`, headers: [] });

    expect(result.success ? result.data.status : undefined).toBe(400);
  });

  it('should reject an invalid URL without a network call', async () => {
    const result = await transport.send({ method: 'GET', url: 'not a url', headers: [] });

    expect(result.success ? undefined : result.error.reason).toBe('bad-url');
  });

  it('should report connection failures as network errors', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: '/', method: 'GET' })
      .replyWithError(new Error('connection reset'));

    const result = await transport.send({ method: 'GET', url: `${ORIGIN}/`, headers: [] });

    const error = result.success ? undefined : result.error;
    expect(error?.code).toBe('TRANSPORT');
    expect(error?.reason).toBe('network');
  });

  it('should keep its configuration', () => {
    expect(transport.getConfig().timeout).toBe(5000);
  });
});

describe('toTransportError', () => {
  it('should map undici timeouts', () => {
    expect(toTransportError(new errors.HeadersTimeoutError()).reason).toBe('timeout');
    expect(toTransportError(new errors.BodyTimeoutError()).reason).toBe('timeout');
    expect(toTransportError(new errors.ConnectTimeoutError()).reason).toBe('timeout');
  });

  it('should map invalid URL arguments to bad-url', () => {
    expect(toTransportError(new errors.InvalidArgumentError('invalid url')).reason).toBe('bad-url');
    expect(toTransportError(new errors.InvalidArgumentError('invalid origin')).reason).toBe('bad-url');
  });

  it('should map other invalid arguments to network', () => {
    const error = toTransportError(new errors.InvalidArgumentError('invalid x-custom header'));
    expect(error.reason).toBe('network');
    expect(error.message).toBe('Invalid request: invalid x-custom header');
    expect(toTransportError(new errors.InvalidArgumentError('invalid request method')).reason).toBe(
      'network'
    );
  });

  it('should map aborts', () => {
    const abort = new Error('The operation was aborted');
    abort.name = 'AbortError';

    const error = toTransportError(abort);
    expect(error.reason).toBe('network');
    expect(error.message).toBe('Request aborted');
  });

  it('should map anything else to network', () => {
    expect(toTransportError('socket hang up').message).toBe('Network error: socket hang up');
  });
});

describe('header helpers', () => {
  const headers = [
    ['Content-Type', 'application/json'],
    ['X-Amz-Target', 'DynamoDB_20120810.ListTables'],
    ['content-type', 'text/plain'],
  ] as const;

  it('should match names case-insensitively', () => {
    expect(hasHeader(headers, 'CONTENT-TYPE')).toBe(true);
    expect(hasHeader(headers, 'accept')).toBe(false);
  });

  it('should find the first value', () => {
    expect(findHeader(headers, 'content-type')).toBe('application/json');
    expect(findHeader(headers, 'accept')).toBeUndefined();
  });

  it('should remove every matching header', () => {
    expect(withoutHeader(headers, 'Content-Type')).toEqual([
      ['X-Amz-Target', 'DynamoDB_20120810.ListTables'],
    ]);
  });
});
