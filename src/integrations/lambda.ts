/**
 * AWS Lambda Integration
 *
 * Wraps Lambda handlers in a trace and flushes before the function exits.
 *
 * @example
 * import { init, withGeneration } from '@tracebatch/sdk';
 * import { withObserve } from '@tracebatch/sdk/lambda';
 *
 * init();
 *
 * export const handler = withObserve(async (event) => {
 *   const text = await withGeneration({ name: 'summarize', model: 'gpt-4o' }, () => summarize(event));
 *   return { statusCode: 200, body: JSON.stringify({ text }) };
 * });
 */

import type { IntegrationOptions } from './types';
import { getClient } from '../core/config';
import { error as logError } from '../core/logger';

// ─────────────────────────────────────────────────────────────
// Types (minimal to avoid requiring @types/aws-lambda)
// ─────────────────────────────────────────────────────────────

/**
 * AWS Lambda Context object
 */
export interface LambdaContext {
  functionName: string;
  functionVersion: string;
  invokedFunctionArn: string;
  memoryLimitInMB: string;
  awsRequestId: string;
  logGroupName: string;
  logStreamName: string;
  getRemainingTimeInMillis(): number;
  [key: string]: unknown;
}

/**
 * Generic AWS Lambda handler type
 *
 * @typeParam TEvent - The event type (e.g., APIGatewayProxyEvent)
 * @typeParam TResult - The result type (e.g., APIGatewayProxyResult)
 */
export type LambdaHandler<TEvent = unknown, TResult = unknown> = (
  event: TEvent,
  context: LambdaContext
) => Promise<TResult>;

// ─────────────────────────────────────────────────────────────
// Wrapper
// ─────────────────────────────────────────────────────────────

/**
 * Wrap an AWS Lambda handler in a trace named after the function
 *
 * Always flushes before returning - Lambda freezes the container
 * immediately after the handler returns. A failed flush is logged,
 * never thrown.
 *
 * @example
 * import type { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
 *
 * export const handler = withObserve<APIGatewayProxyEvent, APIGatewayProxyResult>(
 *   async (event, context) => ({ statusCode: 200, body: 'OK' }),
 *   { name: 'webhook' }
 * );
 */
export function withObserve<TEvent = unknown, TResult = unknown>(
  handler: LambdaHandler<TEvent, TResult>,
  options: IntegrationOptions = {}
): LambdaHandler<TEvent, TResult> {
  return async (event: TEvent, context: LambdaContext): Promise<TResult> => {
    const client = options.client ?? getClient();
    try {
      return await client.trace(
        {
          name: options.name ?? context.functionName,
          input: event,
          metadata: { awsRequestId: context.awsRequestId },
        },
        () => handler(event, context)
      );
    } finally {
      // Always flush - Lambda freezes immediately after return
      await client.flush().catch((err: unknown) => logError('Flush before Lambda exit failed', err));
    }
  };
}
