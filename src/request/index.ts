/**
 * @module request
 */

export { ServiceRequest } from './request.js';
export type { ServiceRequestInit } from './request.js';
