import { fakeBackend } from '../../dss-client/test/fake-fetch.js';
import { createClientFactory, staticIdentity, type IdentitySource } from '../src/context.js';
import { invokeTool } from '../src/dispatch.js';
import { createLoggerWithDestination, type Logger } from '../src/logger.js';
import { buildRegistry } from '../src/tools/index.js';

export { fakeBackend };

export type LogLine = Record<string, unknown>;

/** A logger whose JSON lines are collected in memory. */
export function captureLogs(): { logger: Logger; lines: LogLine[] } {
  const lines: LogLine[] = [];
  const logger = createLoggerWithDestination({
    write(msg: string) {
      lines.push(JSON.parse(msg));
    },
  });
  return { logger, lines };
}

type Routes = Parameters<typeof fakeBackend>[0];

/**
 * The full tool registry wired to an in-process backend, with `call`
 * invoking a tool the way the MCP binding does.
 */
export function harness(routes: Routes, identity: IdentitySource = staticIdentity('test-key')) {
  const backend = fakeBackend(routes);
  const registry = buildRegistry();
  const { logger, lines } = captureLogs();
  const clientFactory = createClientFactory({ dssUrl: 'http://dss.test', pollIntervalMs: 0, fetch: backend.fetch });
  const call = (name: string, args: Record<string, unknown> = {}) =>
    invokeTool(registry, name, args, { identity, clientFactory, logger });
  return { backend, registry, identity, clientFactory, logger, logs: lines, call };
}
