import { logger } from "../logger.js";

function logErr(kind: string, err: unknown): void {
  if (err instanceof Error) {
    logger.error(`${kind}: ${err.message}`, { kind, err, stack: err.stack });
  } else {
    logger.error(`${kind}: ${String(err)}`, { kind, err });
  }
}

/**
 * Log what escapes the request handlers and run `shutdown` once on
 * SIGINT/SIGTERM before exiting.
 */
export function installGlobalErrorHandlers(
  shutdown: () => Promise<void>
): void {
  process.on("uncaughtException", (err: Error) => {
    logErr("uncaughtException", err);
  });

  process.on("unhandledRejection", (reason: unknown) => {
    logErr("unhandledRejection", reason);
  });

  process.on("warning", (w: Error) => {
    logger.warn(`Process warning: ${w.name}: ${w.message}`, { stack: w.stack });
  });

  let stopping = false;
  const signals: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];
  for (const sig of signals) {
    process.on(sig, () => {
      if (stopping) return;
      stopping = true;
      logger.info(`Signal received: ${sig}. Shutting down…`);
      shutdown().then(
        () => process.exit(0),
        (err: unknown) => {
          logErr("shutdown", err);
          process.exit(1);
        }
      );
    });
  }
}
