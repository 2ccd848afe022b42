import { isLogLevel, LogLevel } from "./logger";
import { LoadStrategy } from "./services/loader";

export type DatabaseConfig =
  | {
      type: "postgres";
      host: string;
      port: number;
      username: string;
      password: string;
      database: string;
    }
  | {
      type: "better-sqlite3";
      database: string;
    };

export interface EditorConfig {
  port: number;
  db: DatabaseConfig;
  /** Lexicon to open, as `id` or `id:version`. Unset means start a new lexicon. */
  lexicon?: string;
  newLexiconId: string;
  validateRelations: boolean;
  loadStrategy: LoadStrategy;
  logLevel: LogLevel;
}

const LOAD_STRATEGIES: readonly LoadStrategy[] = ["auto", "fast", "fallback"];

const isLoadStrategy = (value: string): value is LoadStrategy =>
  LOAD_STRATEGIES.some((strategy) => strategy === value);

const flag = (value: string | undefined, fallback: boolean) => {
  if (value === undefined || value === "") return fallback;
  return !["0", "false", "no", "off"].includes(value.toLowerCase());
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): EditorConfig => {
  const db: DatabaseConfig =
    env.DB_TYPE === "better-sqlite3"
      ? { type: "better-sqlite3", database: env.DB_PATH || "lexicon.sqlite" }
      : {
          type: "postgres",
          host: env.DB_HOST || "localhost",
          port: parseInt(env.DB_PORT || "5432"),
          username: env.DB_USER || "postgres",
          password: env.DB_PASSWORD || "postgres",
          database: env.DB_NAME || "lexicon_store"
        };

  const strategy = env.LOAD_STRATEGY || "auto";
  if (!isLoadStrategy(strategy)) {
    throw new Error(`LOAD_STRATEGY must be one of ${LOAD_STRATEGIES.join(", ")}, got '${strategy}'`);
  }
  const logLevel = env.LOG_LEVEL || "info";
  if (!isLogLevel(logLevel)) {
    throw new Error(`Unknown LOG_LEVEL '${logLevel}'`);
  }

  return {
    port: parseInt(env.PORT || "3000"),
    db,
    lexicon: env.LEXICON || undefined,
    newLexiconId: env.NEW_LEXICON_ID || "custom-wn",
    validateRelations: flag(env.VALIDATE_RELATIONS, true),
    loadStrategy: strategy,
    logLevel
  };
};
