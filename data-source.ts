import "reflect-metadata";
import { DataSource } from "typeorm";
import { DatabaseConfig } from "./config";
import { StoreMeta } from "./entity/StoreMeta";
import { LexiconRow } from "./entity/LexiconRow";
import { SynsetRow } from "./entity/SynsetRow";
import { DefinitionRow } from "./entity/DefinitionRow";
import { SynsetExampleRow } from "./entity/SynsetExampleRow";
import { SynsetRelationRow } from "./entity/SynsetRelationRow";
import { EntryRow } from "./entity/EntryRow";
import { FormRow } from "./entity/FormRow";
import { SenseRow } from "./entity/SenseRow";
import { SenseExampleRow } from "./entity/SenseExampleRow";
import { CountRow } from "./entity/CountRow";
import { SenseRelationRow } from "./entity/SenseRelationRow";
import { SenseSynsetRelationRow } from "./entity/SenseSynsetRelationRow";

export const STORE_ENTITIES = [
  StoreMeta,
  LexiconRow,
  SynsetRow,
  DefinitionRow,
  SynsetExampleRow,
  SynsetRelationRow,
  EntryRow,
  FormRow,
  SenseRow,
  SenseExampleRow,
  CountRow,
  SenseRelationRow,
  SenseSynsetRelationRow
];

export const createDataSource = (config: DatabaseConfig, options: { synchronize?: boolean; logging?: boolean } = {}) => {
  const common = {
    synchronize: options.synchronize ?? true,
    logging: options.logging ?? false,
    entities: STORE_ENTITIES,
    migrations: [],
    subscribers: []
  };
  if (config.type === "better-sqlite3") {
    return new DataSource({ type: "better-sqlite3", database: config.database, ...common });
  }
  return new DataSource({
    type: "postgres",
    host: config.host,
    port: config.port,
    username: config.username,
    password: config.password,
    database: config.database,
    ...common
  });
};
