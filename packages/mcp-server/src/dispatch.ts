import { performance } from 'node:perf_hooks';
import { withScopedClient, type ClientFactory, type IdentitySource } from './context.js';
import { PlatformOperationError, ToolError } from './errors.js';
import type { Logger } from './logger.js';
import type { ToolRegistry } from './registry.js';

export interface InvocationOptions {
  identity: IdentitySource;
  clientFactory: ClientFactory;
  logger: Logger;
}

/**
 * Run one tool call end to end: resolve, validate, acquire the caller's
 * client, run the handler, release the client.
 *
 * Rejects only with a ToolError. Failures from the platform keep their
 * message as the platform worded it.
 */
export async function invokeTool(
  registry: ToolRegistry,
  name: string,
  args: unknown,
  options: InvocationOptions,
): Promise<unknown> {
  const logger = options.logger.child({ tool: name });
  const started = performance.now();
  const elapsed = () => Math.round(performance.now() - started);

  try {
    const run = registry.resolve(name).bind(args);
    const result = await withScopedClient(options.identity, options.clientFactory, (client) =>
      run({ client, logger }),
    );
    logger.info({ durationMs: elapsed() }, 'tool call succeeded');
    return result;
  } catch (err) {
    const failure = err instanceof ToolError ? err : PlatformOperationError.from(err);
    logger.warn(
      { durationMs: elapsed(), kind: failure.kind, err: failure },
      `tool call failed: ${failure.message}`,
    );
    throw failure;
  }
}
