/**
 * Tests for the body model
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { Body, bodyToString, bodyToBytes, toTransportBody, decodeJsonBody } from './index.js';
import { knownService } from '../service/index.js';

const region = { kind: 'regional', region: 'us-east-1' } as const;

describe('Body', () => {
  it('should serialize JSON compactly', () => {
    const body = Body.json({ TableName: 'jobs', Keys: [1, true, null] });
    expect(bodyToString(body)).toBe('{"TableName":"jobs","Keys":[1,true,null]}');
  });

  it('should accept values typed by an interface', () => {
    interface GetItemInput {
      TableName: string;
      Key: { id: { S: string } };
      ConsistentRead?: boolean;
    }
    const input: GetItemInput = { TableName: 'jobs', Key: { id: { S: 'job-1' } } };

    expect(bodyToString(Body.json(input))).toBe('{"TableName":"jobs","Key":{"id":{"S":"job-1"}}}');
  });

  it('should keep the JSON value', () => {
    const value = { Limit: 10 };
    const body = Body.json(value);
    expect(body.kind === 'json' ? body.value : undefined).toEqual(value);
  });

  it('should render empty bodies as an empty string', () => {
    expect(bodyToString(Body.empty())).toBe('');
    expect(bodyToBytes(Body.empty())).toHaveLength(0);
  });

  it('should encode text as UTF-8', () => {
    expect(Array.from(bodyToBytes(Body.text('é', 'text/plain')))).toEqual([0xc3, 0xa9]);
  });

  it('should freeze bodies', () => {
    expect(Object.isFrozen(Body.json({}))).toBe(true);
    expect(Object.isFrozen(Body.text('a', 'text/plain'))).toBe(true);
  });
});

describe('toTransportBody', () => {
  it('should use the JSON protocol content type', () => {
    const result = toTransportBody(Body.json({}), knownService('dynamodb', region));
    expect(result.contentType).toBe('application/x-amz-json-1.0');
    expect(new TextDecoder().decode(result.payload)).toBe('{}');
  });

  it('should use the service JSON version', () => {
    const result = toTransportBody(Body.json({}), knownService('logs', region));
    expect(result.contentType).toBe('application/x-amz-json-1.1');
  });

  it('should use application/json for REST+JSON services', () => {
    const result = toTransportBody(Body.json({}), knownService('sesv2', region));
    expect(result.contentType).toBe('application/json');
  });

  it('should keep the mime type of text bodies', () => {
    const result = toTransportBody(
      Body.text('<a/>', 'application/xml; charset=utf-8'),
      knownService('s3', region)
    );
    expect(result.contentType).toBe('application/xml; charset=utf-8');
  });

  it('should carry nothing for empty bodies', () => {
    expect(toTransportBody(Body.empty(), knownService('sqs', region))).toEqual({
      payload: undefined,
      contentType: undefined,
    });
  });
});

describe('decodeJsonBody', () => {
  const schema = z.object({ TableNames: z.array(z.string()) });

  it('should decode what Body.json encodes', () => {
    const value = { TableNames: ['jobs', 'events'] };
    expect(decodeJsonBody(bodyToString(Body.json(value)), schema)).toEqual({
      success: true,
      data: value,
    });
  });

  it('should reject invalid JSON', () => {
    const result = decodeJsonBody('{not json', schema);
    expect(result.success).toBe(false);
    expect(result.success ? '' : result.error).toMatch(/^Failed to parse JSON response: /);
  });

  it('should reject the wrong shape', () => {
    const result = decodeJsonBody('{"TableNames":"jobs"}', schema);
    expect(result.success).toBe(false);
    expect(result.success ? '' : result.error).toMatch(/^Response did not match the expected shape: /);
  });
});
