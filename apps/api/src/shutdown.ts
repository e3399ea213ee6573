import type { Logger } from "./logger.js";

/** The parts of a FastifyInstance a shutdown needs. */
export interface ClosableServer {
  log: Logger;
  close(): PromiseLike<unknown>;
}

export interface ShutdownOptions {
  /** Exit with status 1 if the server has not closed after this long. */
  timeoutMs: number;
  signals?: NodeJS.Signals[];
  exit?: (code: number) => void;
}

/**
 * Close `server` on the first of `signals`, then exit. Later signals are
 * ignored while the close is in progress. Returns the handler so callers
 * can trigger a shutdown without a signal.
 */
export function registerShutdown(server: ClosableServer, options: ShutdownOptions) {
  const { timeoutMs, signals = ["SIGTERM", "SIGINT"], exit = (code: number) => process.exit(code) } = options;
  let closing: Promise<void> | null = null;

  const close = async (signal: string): Promise<void> => {
    server.log.info({ signal, timeoutMs }, "Closing server");

    const deadline = setTimeout(() => {
      server.log.warn({ timeoutMs }, "Server did not close in time, exiting");
      exit(1);
    }, timeoutMs);
    deadline.unref();

    let code = 0;
    try {
      await server.close();
    } catch (err) {
      server.log.error({ err }, "Error while closing server");
      code = 1;
    } finally {
      clearTimeout(deadline);
    }
    exit(code);
  };

  const shutdown = (signal: string): Promise<void> => {
    closing ??= close(signal);
    return closing;
  };

  for (const signal of signals) {
    process.once(signal, () => void shutdown(signal));
  }

  return shutdown;
}
