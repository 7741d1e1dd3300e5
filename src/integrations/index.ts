/**
 * Framework Integrations
 *
 * Re-exports for convenience. Individual imports are recommended
 * for better tree-shaking.
 *
 * @example
 * // Recommended: import from specific integration
 * import { withObserve } from '@tracebatch/sdk/lambda';
 *
 * // Alternative: import from integrations
 * import { lambda, express } from '@tracebatch/sdk/integrations';
 */

export * as lambda from './lambda';
export * as express from './express';
export type { IntegrationOptions } from './types';
