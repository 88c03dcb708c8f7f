/**
 * Request IDs
 */

export { generateRequestId, isValidRequestId, parseRequestId } from './request-id';
