/**
 * Protocol family helpers.
 *
 * @module protocol
 */

export {
  jsonContentType,
  acceptFor,
  FORM_CONTENT_TYPE,
  XML_CONTENT_TYPE,
  JSON_CONTENT_TYPE,
} from './content-type.js';
export { targetHeader, queryBody, xmlBody, TARGET_HEADER } from './serialize.js';
