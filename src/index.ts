/**
 * switchyard
 *
 * Embeddable HTTP request dispatch: path templates, route groups,
 * interceptor chains and single-response dispatch.
 */

export * from './router';
export * from './context';
export * from './http';
export * from './config';
export * from './logging';
export * from './ids';
export * from './shared/errors';
