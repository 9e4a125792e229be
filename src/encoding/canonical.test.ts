/**
 * Tests for canonical encoding
 */

import { describe, it, expect } from 'vitest';
import {
  uriEncode,
  EncodedQuery,
  encodeQuery,
  renderQuery,
  canonicalQueryString,
} from './canonical.js';

describe('uriEncode', () => {
  it('should leave unreserved characters alone', () => {
    const unreserved = 'ABCXYZabcxyz0189-_.~';
    expect(uriEncode(unreserved)).toBe(unreserved);
  });

  it('should encode spaces as %20', () => {
    expect(uriEncode('hello world')).toBe('hello%20world');
  });

  it('should use uppercase hex', () => {
    expect(uriEncode('a+b*c=d')).toBe('a%2Bb%2Ac%3Dd');
  });

  it('should encode slashes unless asked not to', () => {
    expect(uriEncode('path/to/file')).toBe('path%2Fto%2Ffile');
    expect(uriEncode('path/to/file', false)).toBe('path/to/file');
  });

  it('should encode each UTF-8 byte', () => {
    expect(uriEncode('café')).toBe('caf%C3%A9');
    expect(uriEncode('\u{1F600}')).toBe('%F0%9F%98%80');
  });

  it('should encode lone surrogates as the replacement character', () => {
    expect(uriEncode('\uD800')).toBe('%EF%BF%BD');
  });

  it('should encode a percent sign', () => {
    expect(uriEncode('%20')).toBe('%2520');
  });
});

describe('EncodedQuery', () => {
  it('should encode each name and value once', () => {
    const query = encodeQuery([['key name', 'a&b']]);
    expect(query.entries()).toEqual([['key%20name', 'a%26b']]);
    expect(query.size).toBe(1);
  });

  it('should not re-encode when rendering', () => {
    const query = EncodedQuery.encode([['prefix', '50%']]);
    expect(query.render()).toBe('prefix=50%25');
    expect(query.render()).toBe('prefix=50%25');
  });

  it('should render insertion order by default', () => {
    const query = encodeQuery([['b', '2'], ['a', '1']]);
    expect(renderQuery(query)).toBe('b=2&a=1');
  });

  it('should render empty input as an empty string', () => {
    expect(renderQuery(encodeQuery([]), 'sorted')).toBe('');
  });
});

describe('canonicalQueryString', () => {
  it('should sort by name', () => {
    expect(canonicalQueryString([['foo', 'bar'], ['baz', 'a b']])).toBe('baz=a%20b&foo=bar');
  });

  it('should sort duplicates by value', () => {
    expect(canonicalQueryString([['a', '2'], ['a', '1']])).toBe('a=1&a=2');
  });

  it('should sort by byte order', () => {
    expect(canonicalQueryString([['b', '1'], ['B', '2']])).toBe('B=2&b=1');
  });

  it('should sort the encoded names', () => {
    // '%' (0x25) sorts before '-' (0x2D)
    expect(canonicalQueryString([['a-b', '2'], ['a b', '1']])).toBe('a%20b=1&a-b=2');
  });

  it('should not depend on input order', () => {
    const pairs: Array<readonly [string, string]> = [
      ['Version', '2011-06-15'],
      ['Action', 'AssumeRole'],
      ['RoleSessionName', 'nightly job'],
      ['DurationSeconds', '900'],
    ];

    expect(canonicalQueryString([...pairs].reverse())).toBe(canonicalQueryString(pairs));
    expect(canonicalQueryString(pairs)).toBe(
      'Action=AssumeRole&DurationSeconds=900&RoleSessionName=nightly%20job&Version=2011-06-15'
    );
  });

  it('should accept an empty value', () => {
    expect(canonicalQueryString([['acl', '']])).toBe('acl=');
  });
});
