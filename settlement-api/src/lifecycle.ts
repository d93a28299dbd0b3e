/**
 * Stopping the settlement API: refuse new connections, wait for requests in
 * flight (and so for the engine calls they queued), then report the host's
 * totals before exiting.
 */

import { FastifyInstance } from 'fastify';
import { SettlementEngine } from '@swapledger/settlement-core';

export interface ProcessHandle {
  once(signal: NodeJS.Signals, listener: () => void): unknown;
  exit(code?: number): void;
}

export const SHUTDOWN_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

/**
 * Installs the signal handlers and returns the shutdown routine they run.
 * Repeated signals share the first shutdown.
 */
export function installShutdown(
  fastify: FastifyInstance,
  engine: SettlementEngine,
  proc: ProcessHandle = process
): (signal: NodeJS.Signals) => Promise<void> {
  let stopping: Promise<void> | undefined;

  const stop = async (signal: NodeJS.Signals): Promise<void> => {
    fastify.log.info(
      { signal, queued: engine.host.getStats().queued },
      'Settlement API stopping; waiting for in-flight settlement calls'
    );

    let exitCode = 0;
    try {
      await fastify.close();
    } catch (error) {
      fastify.log.error({ err: error }, 'Settlement API did not close cleanly');
      exitCode = 1;
    }

    const { committed, reverted } = engine.host.getStats();
    fastify.log.info({ committed, reverted }, 'Settlement API stopped');
    proc.exit(exitCode);
  };

  const shutdown = (signal: NodeJS.Signals): Promise<void> => {
    if (!stopping) {
      stopping = stop(signal);
    }
    return stopping;
  };

  for (const signal of SHUTDOWN_SIGNALS) {
    proc.once(signal, () => {
      void shutdown(signal);
    });
  }
  return shutdown;
}
