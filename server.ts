import dotenv from "dotenv";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { createDataSource } from "./data-source";
import { logger, setLogLevel } from "./logger";
import { LexiconEditor } from "./services/editor";
import { SqlLexiconStore } from "./services/lexiconStore";

dotenv.config();

const start = async () => {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const store = new SqlLexiconStore(createDataSource(config.db, { logging: config.logLevel === "debug" }));
  await store.initialize();
  logger.info(`Database initialized (${config.db.type})`);

  const options = { validateRelations: config.validateRelations };
  const editor = config.lexicon
    ? await LexiconEditor.open(store, config.lexicon, { ...options, strategy: config.loadStrategy })
    : LexiconEditor.createNew({ ...options, lexiconId: config.newLexiconId });

  const app = createApp(editor, store);
  app.listen(config.port, () => logger.info(`Server on ${config.port}`));
};

start().catch((err) => {
  logger.error("Startup failed", err);
  process.exitCode = 1;
});
