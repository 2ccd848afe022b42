export * from "../types";
export * from "../errors";
export { logger, setLogLevel, getLogLevel } from "../logger";
export type { LogLevel } from "../logger";
export { loadConfig } from "../config";
export type { EditorConfig, DatabaseConfig } from "../config";
export { createDataSource, STORE_ENTITIES } from "../data-source";
export * from "./records";
export * from "./vocabulary";
export { LexiconIndex } from "./lexiconIndex";
export { checkRelation, classifyRelation } from "./relationValidator";
export * from "./metadata";
export { parseLexicalResource, serializeLexicalResource, detectLmfVersion } from "./lmf";
export { normalizeResource, resourcesEquivalent, normalizeText } from "./normalize";
export * from "./oracle";
export * from "./lexiconStore";
export * from "./loader";
export * from "./editor";
