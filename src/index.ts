import { config } from "./config.js";
import { logger } from "./logger.js";
import { closeDb, initDb } from "./db/sqlite.js";
import { bootstrap, DEFAULT_SEED, readSeedFile } from "./db/seed.js";
import { createQuestionService } from "./services/question.service.js";
import { createApp } from "./http/app.js";
import { installGlobalErrorHandlers } from "./infra/global-errors.js";

async function main(): Promise<void> {
  const db = await initDb(config.DB_FILE);

  // Schema creation failing leaves nothing to serve; main() rejects and we exit.
  const seed = config.SEED_FILE ? readSeedFile(config.SEED_FILE) : DEFAULT_SEED;
  await bootstrap(db, seed);

  const app = createApp(createQuestionService(db));
  const server = app.listen(config.PORT, () => {
    logger.info(`Listening on port ${config.PORT}`);
  });

  installGlobalErrorHandlers(async () => {
    await new Promise<void>((resolve, reject) =>
      server.close((err) => (err ? reject(err) : resolve()))
    );
    await closeDb(db);
  });
}

main().catch((e: unknown) => {
  logger.error("Startup failed", { err: e });
  process.exit(1);
});
