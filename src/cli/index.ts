/**
 * CLI Module
 */

export { parsePort } from './options';
