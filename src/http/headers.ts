/**
 * Helpers for ordered header lists.
 *
 * @module http/headers
 */

import type { HeaderPair } from './types.js';

/**
 * Whether a header with this name is present (case-insensitive).
 */
export function hasHeader(headers: ReadonlyArray<HeaderPair>, name: string): boolean {
  const lower = name.toLowerCase();
  return headers.some(([headerName]) => headerName.toLowerCase() === lower);
}

/**
 * Value of the first header with this name (case-insensitive).
 */
export function findHeader(headers: ReadonlyArray<HeaderPair>, name: string): string | undefined {
  const lower = name.toLowerCase();
  return headers.find(([headerName]) => headerName.toLowerCase() === lower)?.[1];
}

/**
 * Headers without any whose name matches (case-insensitive).
 */
export function withoutHeader(headers: ReadonlyArray<HeaderPair>, name: string): HeaderPair[] {
  const lower = name.toLowerCase();
  return headers.filter(([headerName]) => headerName.toLowerCase() !== lower);
}
