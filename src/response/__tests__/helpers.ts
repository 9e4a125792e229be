import type { RawResponse } from '../../http/types.js';

export function rawResponse(
  status: number,
  body: string = '',
  headers: Record<string, string> = {}
): RawResponse {
  return { status, headers, body: new TextEncoder().encode(body) };
}
