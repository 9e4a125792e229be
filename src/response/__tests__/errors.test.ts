/**
 * Tests for API error decoders
 */

import { describe, it, expect } from 'vitest';
import {
  AwsJsonErrorDecoder,
  AwsXmlErrorDecoder,
  errorDecoderFor,
  isRetryableError,
  normalizeErrorCode,
  noErrorDecoder,
} from '../errors.js';
import { rawResponse } from './helpers.js';

describe('normalizeErrorCode', () => {
  it('should strip the namespace', () => {
    expect(normalizeErrorCode('com.amazonaws.dynamodb.v20120810#ResourceNotFoundException')).toBe(
      'ResourceNotFoundException'
    );
  });

  it('should strip the URI suffix', () => {
    expect(normalizeErrorCode('ValidationException:http://internal.amazon.com/coral/')).toBe(
      'ValidationException'
    );
  });

  it('should keep plain codes', () => {
    expect(normalizeErrorCode('AccessDenied')).toBe('AccessDenied');
  });
});

describe('isRetryableError', () => {
  it('should retry throttling, 429 and 5xx', () => {
    expect(isRetryableError('ThrottlingException', 400)).toBe(true);
    expect(isRetryableError('Whatever', 429)).toBe(true);
    expect(isRetryableError('InternalError', 500)).toBe(true);
  });

  it('should not retry client errors', () => {
    expect(isRetryableError('ValidationException', 400)).toBe(false);
  });
});

describe('AwsJsonErrorDecoder', () => {
  const decoder = new AwsJsonErrorDecoder();

  it('should decode __type and message', () => {
    const response = rawResponse(
      400,
      JSON.stringify({
        __type: 'com.amazonaws.dynamodb.v20120810#ResourceNotFoundException',
        message: 'Requested resource not found',
      }),
      { 'x-amzn-requestid': 'req-1' }
    );

    expect(decoder.decode(response)).toEqual({
      code: 'ResourceNotFoundException',
      message: 'Requested resource not found',
      status: 400,
      requestId: 'req-1',
      retryable: false,
    });
  });

  it('should prefer the error type header', () => {
    const response = rawResponse(400, '{"Message":"Missing field"}', {
      'x-amzn-errortype': 'BadRequestException:http://internal.amazon.com/coral/',
    });

    expect(decoder.decode(response)).toEqual({
      code: 'BadRequestException',
      message: 'Missing field',
      status: 400,
      requestId: undefined,
      retryable: false,
    });
  });

  it('should mark throttling as retryable', () => {
    const response = rawResponse(400, '{"__type":"ThrottlingException","message":"Rate exceeded"}');
    expect(decoder.decode(response)?.retryable).toBe(true);
  });

  it('should fall back to the code for the message', () => {
    const response = rawResponse(400, '{"__type":"AccessDeniedException"}');
    expect(decoder.decode(response)?.message).toBe('AccessDeniedException');
  });

  it('should decline bodies it does not recognise', () => {
    expect(decoder.decode(rawResponse(502, '<html>Bad Gateway</html>'))).toBeUndefined();
    expect(decoder.decode(rawResponse(500, ''))).toBeUndefined();
    expect(decoder.decode(rawResponse(400, '{"unexpected":true}'))).toBeUndefined();
  });

  it('should decline successful responses', () => {
    expect(decoder.decode(rawResponse(200, '{"__type":"ValidationException"}'))).toBeUndefined();
  });
});

describe('AwsXmlErrorDecoder', () => {
  const decoder = new AwsXmlErrorDecoder();

  it('should decode query protocol errors', () => {
    const response = rawResponse(
      403,
      '<ErrorResponse xmlns="https://sts.amazonaws.com/doc/2011-06-15/">' +
        '<Error><Type>Sender</Type><Code>InvalidClientTokenId</Code>' +
        '<Message>The security token included in the request is invalid.</Message></Error>' +
        '<RequestId>req-2</RequestId></ErrorResponse>'
    );

    expect(decoder.decode(response)).toEqual({
      code: 'InvalidClientTokenId',
      message: 'The security token included in the request is invalid.',
      status: 403,
      requestId: 'req-2',
      retryable: false,
    });
  });

  it('should decode EC2 errors', () => {
    const response = rawResponse(
      400,
      '<Response><Errors><Error><Code>InvalidInstanceID.NotFound</Code>' +
        '<Message>Instance not found</Message></Error></Errors>' +
        '<RequestID>req-3</RequestID></Response>'
    );

    expect(decoder.decode(response)).toEqual({
      code: 'InvalidInstanceID.NotFound',
      message: 'Instance not found',
      status: 400,
      requestId: 'req-3',
      retryable: false,
    });
  });

  it('should take the first of several EC2 errors', () => {
    const response = rawResponse(
      400,
      '<Response><Errors>' +
        '<Error><Code>InvalidParameterValue</Code><Message>first</Message></Error>' +
        '<Error><Code>MissingParameter</Code><Message>second</Message></Error>' +
        '</Errors></Response>'
    );

    expect(decoder.decode(response)?.code).toBe('InvalidParameterValue');
  });

  it('should decode REST+XML errors', () => {
    const response = rawResponse(
      404,
      '<?xml version="1.0" encoding="UTF-8"?>\n' +
        '<Error><Code>NoSuchKey</Code><Message>The specified key does not exist.</Message>' +
        '<RequestId>req-4</RequestId></Error>'
    );

    expect(decoder.decode(response)).toEqual({
      code: 'NoSuchKey',
      message: 'The specified key does not exist.',
      status: 404,
      requestId: 'req-4',
      retryable: false,
    });
  });

  it('should mark SlowDown as retryable', () => {
    const response = rawResponse(503, '<Error><Code>SlowDown</Code></Error>');
    expect(decoder.decode(response)).toMatchObject({ code: 'SlowDown', message: 'SlowDown', retryable: true });
  });

  it('should decline malformed or unrelated bodies', () => {
    expect(decoder.decode(rawResponse(500, '<Error><Code>'))).toBeUndefined();
    expect(decoder.decode(rawResponse(503, '<html>Service Unavailable</html>'))).toBeUndefined();
    expect(decoder.decode(rawResponse(500, ''))).toBeUndefined();
  });
});

describe('errorDecoderFor', () => {
  it('should pick the decoder for the protocol family', () => {
    expect(errorDecoderFor('json')).toBeInstanceOf(AwsJsonErrorDecoder);
    expect(errorDecoderFor('rest-json')).toBeInstanceOf(AwsJsonErrorDecoder);
    expect(errorDecoderFor('query')).toBeInstanceOf(AwsXmlErrorDecoder);
    expect(errorDecoderFor('ec2')).toBeInstanceOf(AwsXmlErrorDecoder);
    expect(errorDecoderFor('rest-xml')).toBeInstanceOf(AwsXmlErrorDecoder);
  });
});

describe('noErrorDecoder', () => {
  it('should decline everything', () => {
    expect(noErrorDecoder.decode(rawResponse(500, '{"__type":"InternalError"}'))).toBeUndefined();
  });
});
