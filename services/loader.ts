import { DataSource, EntityManager, QueryFailedError } from "typeorm";
import {
  BackingStoreError,
  isEditorError,
  MissingInterfaceError,
  SchemaMismatchError
} from "../errors";
import { logger } from "../logger";
import {
  Count,
  Definition,
  Example,
  Form,
  ILIDefinition,
  LexicalEntry,
  LexicalResource,
  Pronunciation,
  Relation,
  Sense,
  Synset,
  SyntacticBehaviour,
  Tag
} from "../types";
import { LexiconSource, parseSpecifier, pickLexicon, SCHEMA_VERSION, SCHEMA_VERSION_KEY } from "./lexiconStore";
import { parseLexicalResource } from "./lmf";
import {
  makeCount,
  makeDefinition,
  makeExample,
  makeForm,
  makeILIDefinition,
  makeLemma,
  makeLexicalEntry,
  makeLexicalResource,
  makeLexicon,
  makePronunciation,
  makeRelation,
  makeSense,
  makeSynset,
  makeSyntacticBehaviour,
  makeTag
} from "./records";
import { DEFAULT_VOCABULARY, Vocabulary } from "./vocabulary";

/**
 * auto: bulk queries, falling back to export and reparse when they cannot run.
 * fast: bulk queries only. fallback: export and reparse only.
 */
export type LoadStrategy = "auto" | "fast" | "fallback";

export type LoadPath = "fast" | "fallback";

export interface LoadOptions {
  strategy?: LoadStrategy;
  vocabulary?: Vocabulary;
}

export interface LoadResult {
  resource: LexicalResource;
  path: LoadPath;
  /** Why the fast path was abandoned, when it was. */
  fallbackReason?: string;
}

type RawRow = Record<string, unknown>;

// Raw rows come straight from the driver, so every column is checked on the way in.
// Selections are written as "alias.column AS name" so the query builder passes them through untouched.

const column = (row: RawRow, name: string): unknown => {
  if (!(name in row)) throw new SchemaMismatchError(`Query result has no column '${name}'`);
  return row[name];
};

const text = (row: RawRow, name: string): string => {
  const value = column(row, name);
  if (typeof value !== "string") throw new SchemaMismatchError(`Column '${name}' is not text`);
  return value;
};

const optionalText = (row: RawRow, name: string): string | null => {
  const value = column(row, name);
  if (value === null) return null;
  if (typeof value !== "string") throw new SchemaMismatchError(`Column '${name}' is not text`);
  return value;
};

const integer = (row: RawRow, name: string): number => {
  const value = column(row, name);
  const parsed = typeof value === "string" ? Number(value) : value;
  if (typeof parsed !== "number" || !Number.isInteger(parsed)) {
    throw new SchemaMismatchError(`Column '${name}' is not an integer`);
  }
  return parsed;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((item) => typeof item === "string");

const isStringRecord = (value: unknown): value is Record<string, string> =>
  isRecord(value) && Object.values(value).every((item) => typeof item === "string");

const json = (row: RawRow, name: string): unknown => {
  const value = column(row, name);
  if (value === null || typeof value !== "string") return value;
  try {
    return JSON.parse(value);
  } catch (err) {
    throw new SchemaMismatchError(`Column '${name}' does not hold JSON`, { cause: err });
  }
};

const meta = (row: RawRow): Record<string, string> | null => {
  const value = json(row, "metadata");
  if (value === null || value === undefined) return null;
  if (!isStringRecord(value)) throw new SchemaMismatchError("Column 'metadata' is not a string map");
  return value;
};

const list = (row: RawRow, name: string): unknown[] | null => {
  const value = json(row, name);
  if (value === null || value === undefined) return null;
  if (!Array.isArray(value)) throw new SchemaMismatchError(`Column '${name}' is not a list`);
  return value;
};

const field = (item: Record<string, unknown>, key: string, name: string): string | undefined => {
  const value = item[key];
  if (value === undefined || typeof value === "string") return value;
  throw new SchemaMismatchError(`Column '${name}' has a non-text '${key}'`);
};

const requiredField = (item: Record<string, unknown>, key: string, name: string): string => {
  const value = field(item, key, name);
  if (value === undefined) throw new SchemaMismatchError(`Column '${name}' is missing '${key}'`);
  return value;
};

const records = (row: RawRow, name: string): Record<string, unknown>[] | null =>
  list(row, name)?.map((item) => {
    if (!isRecord(item)) throw new SchemaMismatchError(`Column '${name}' holds a non-object item`);
    return item;
  }) ?? null;

const stringList = (row: RawRow, name: string): string[] | null => {
  const value = list(row, name);
  if (value === null || isStringArray(value)) return value;
  throw new SchemaMismatchError(`Column '${name}' holds a non-text item`);
};

const tags = (row: RawRow, name = "tags"): Tag[] =>
  (records(row, name) ?? []).map((item) => makeTag(requiredField(item, "category", name), requiredField(item, "text", name)));

const flag = (item: Record<string, unknown>, key: string, name: string): boolean | undefined => {
  const value = item[key];
  if (value === undefined || typeof value === "boolean") return value;
  throw new SchemaMismatchError(`Column '${name}' has a non-boolean '${key}'`);
};

const idList = (item: Record<string, unknown>, key: string, name: string): string[] | undefined => {
  const value = item[key];
  if (value === undefined || isStringArray(value)) return value;
  throw new SchemaMismatchError(`Column '${name}' has a malformed '${key}' list`);
};

const pronunciations = (row: RawRow, name: string): Pronunciation[] | null =>
  records(row, name)?.map((item) =>
    makePronunciation(requiredField(item, "text", name), {
      variety: field(item, "variety", name),
      notation: field(item, "notation", name),
      phonemic: flag(item, "phonemic", name),
      audio: field(item, "audio", name)
    })
  ) ?? null;

const behaviours = (row: RawRow, name: string): SyntacticBehaviour[] | null =>
  records(row, name)?.map((item) =>
    makeSyntacticBehaviour(requiredField(item, "subcategorizationFrame", name), {
      id: field(item, "id", name),
      senses: idList(item, "senses", name)
    })
  ) ?? null;

const iliDefinition = (row: RawRow): ILIDefinition | null => {
  const value = json(row, "ili_definition");
  if (value === null || value === undefined) return null;
  if (!isRecord(value)) throw new SchemaMismatchError("Column 'ili_definition' is not an object");
  const definition = requiredField(value, "text", "ili_definition");
  const definitionMeta = value.meta;
  if (definitionMeta === undefined) return makeILIDefinition(definition);
  if (!isStringRecord(definitionMeta)) throw new SchemaMismatchError("Column 'ili_definition' has a malformed 'meta'");
  return makeILIDefinition(definition, definitionMeta);
};

const groupBy = <T>(rows: RawRow[], key: string, build: (row: RawRow) => T): Map<number, T[]> => {
  const groups = new Map<number, T[]>();
  for (const row of rows) {
    const owner = integer(row, key);
    let group = groups.get(owner);
    if (!group) {
      group = [];
      groups.set(owner, group);
    }
    group.push(build(row));
  }
  return groups;
};

const MISSING_SCHEMA = /no such (table|column)|does not exist|undefined (table|column)/i;

const translateQueryError = (err: unknown): unknown => {
  if (isEditorError(err)) return err;
  if (err instanceof QueryFailedError) {
    return MISSING_SCHEMA.test(err.message)
      ? new SchemaMismatchError(`Store schema does not match: ${err.message}`, { cause: err })
      : new BackingStoreError(`Bulk query failed: ${err.message}`, { cause: err });
  }
  return err;
};

/**
 * Reads one lexicon with a fixed number of bulk queries against the physical
 * tables, independent of the lexicon's size.
 */
export const loadFast = async (
  dataSource: DataSource,
  specifier: string,
  vocabulary: Vocabulary = DEFAULT_VOCABULARY
): Promise<LexicalResource> => {
  try {
    return await readBulk(dataSource.manager, specifier, vocabulary);
  } catch (err) {
    throw translateQueryError(err);
  }
};

const readBulk = async (manager: EntityManager, specifier: string, vocabulary: Vocabulary): Promise<LexicalResource> => {
  const schema = await manager
    .createQueryBuilder()
    .select("m.value AS value")
    .from("store_meta", "m")
    .where("m.key = :key", { key: SCHEMA_VERSION_KEY })
    .getRawOne<RawRow>();
  const version = schema ? optionalText(schema, "value") : null;
  if (version !== SCHEMA_VERSION) {
    throw new SchemaMismatchError(`Store schema version is ${version ?? "unknown"}, expected ${SCHEMA_VERSION}`);
  }

  const { id } = parseSpecifier(specifier);
  const lexiconRows = await manager
    .createQueryBuilder()
    .select(["l.row_id AS row_id", "l.id AS id", "l.label AS label", "l.language AS language", "l.email AS email"])
    .addSelect(["l.license AS license", "l.version AS version", "l.url AS url", "l.citation AS citation"])
    .addSelect(["l.lmf_version AS lmf_version", "l.frames AS frames", "l.metadata AS metadata"])
    .from("lexicons", "l")
    .where("l.id = :id", { id })
    .orderBy("l.row_id")
    .getRawMany<RawRow>();
  const lexiconRow = pickLexicon(
    specifier,
    lexiconRows.map((row) => ({ id: text(row, "id"), version: text(row, "version"), row }))
  ).row;
  const lexicon = integer(lexiconRow, "row_id");

  const [synsetRows, definitionRows, synsetExampleRows, synsetRelationRows] = [
    await manager
      .createQueryBuilder()
      .select(["s.row_id AS row_id", "s.id AS id", "s.pos AS pos", "s.ili AS ili", "s.metadata AS metadata"])
      .addSelect(["s.ili_definition AS ili_definition", "s.lexfile AS lexfile", "s.members AS members"])
      .from("synsets", "s")
      .where("s.lexicon_row_id = :lexicon", { lexicon })
      .orderBy("s.row_id")
      .getRawMany<RawRow>(),
    await manager
      .createQueryBuilder()
      .select(["d.synset_row_id AS synset_row_id", "d.definition AS definition", "d.language AS language"])
      .addSelect(["d.source_sense AS source_sense", "d.metadata AS metadata"])
      .from("definitions", "d")
      .innerJoin("synsets", "s", "s.row_id = d.synset_row_id")
      .where("s.lexicon_row_id = :lexicon", { lexicon })
      .orderBy("d.row_id")
      .getRawMany<RawRow>(),
    await manager
      .createQueryBuilder()
      .select(["x.synset_row_id AS synset_row_id", "x.example AS example", "x.language AS language", "x.metadata AS metadata"])
      .from("synset_examples", "x")
      .innerJoin("synsets", "s", "s.row_id = x.synset_row_id")
      .where("s.lexicon_row_id = :lexicon", { lexicon })
      .orderBy("x.row_id")
      .getRawMany<RawRow>(),
    await manager
      .createQueryBuilder()
      .select(["r.source_row_id AS source_row_id", "t.id AS target_id", "r.type AS type", "r.metadata AS metadata"])
      .from("synset_relations", "r")
      .innerJoin("synsets", "s", "s.row_id = r.source_row_id")
      .innerJoin("synsets", "t", "t.row_id = r.target_row_id")
      .where("s.lexicon_row_id = :lexicon", { lexicon })
      .orderBy("r.row_id")
      .getRawMany<RawRow>()
  ];

  const [entryRows, formRows, senseRows] = [
    await manager
      .createQueryBuilder()
      .select(["e.row_id AS row_id", "e.id AS id", "e.lemma AS lemma", "e.pos AS pos", "e.script AS script"])
      .addSelect(["e.lemma_pronunciations AS lemma_pronunciations", "e.lemma_tags AS lemma_tags"])
      .addSelect(["e.syntactic_behaviours AS syntactic_behaviours", "e.metadata AS metadata"])
      .from("entries", "e")
      .where("e.lexicon_row_id = :lexicon", { lexicon })
      .orderBy("e.row_id")
      .getRawMany<RawRow>(),
    await manager
      .createQueryBuilder()
      .select(["f.entry_row_id AS entry_row_id", "f.form AS form", "f.script AS script", "f.tags AS tags"])
      .addSelect("f.pronunciations AS pronunciations")
      .from("forms", "f")
      .innerJoin("entries", "e", "e.row_id = f.entry_row_id")
      .where("e.lexicon_row_id = :lexicon", { lexicon })
      .orderBy("f.row_id")
      .getRawMany<RawRow>(),
    await manager
      .createQueryBuilder()
      .select(["n.row_id AS row_id", "n.id AS id", "n.entry_row_id AS entry_row_id", "y.id AS synset_id"])
      .addSelect(["n.adjposition AS adjposition", "n.subcat AS subcat", "n.metadata AS metadata"])
      .from("senses", "n")
      .innerJoin("synsets", "y", "y.row_id = n.synset_row_id")
      .where("n.lexicon_row_id = :lexicon", { lexicon })
      .orderBy("n.row_id")
      .getRawMany<RawRow>()
  ];

  const [senseRelationRows, senseSynsetRelationRows, senseExampleRows, countRows] = [
    await manager
      .createQueryBuilder()
      .select(["r.source_row_id AS source_row_id", "t.id AS target_id", "r.type AS type", "r.metadata AS metadata"])
      .addSelect("r.position AS position")
      .from("sense_relations", "r")
      .innerJoin("senses", "n", "n.row_id = r.source_row_id")
      .innerJoin("senses", "t", "t.row_id = r.target_row_id")
      .where("n.lexicon_row_id = :lexicon", { lexicon })
      .orderBy("r.row_id")
      .getRawMany<RawRow>(),
    await manager
      .createQueryBuilder()
      .select(["r.source_row_id AS source_row_id", "t.id AS target_id", "r.type AS type", "r.metadata AS metadata"])
      .addSelect("r.position AS position")
      .from("sense_synset_relations", "r")
      .innerJoin("senses", "n", "n.row_id = r.source_row_id")
      .innerJoin("synsets", "t", "t.row_id = r.target_row_id")
      .where("n.lexicon_row_id = :lexicon", { lexicon })
      .orderBy("r.row_id")
      .getRawMany<RawRow>(),
    await manager
      .createQueryBuilder()
      .select(["x.sense_row_id AS sense_row_id", "x.example AS example", "x.language AS language", "x.metadata AS metadata"])
      .from("sense_examples", "x")
      .innerJoin("senses", "n", "n.row_id = x.sense_row_id")
      .where("n.lexicon_row_id = :lexicon", { lexicon })
      .orderBy("x.row_id")
      .getRawMany<RawRow>(),
    await manager
      .createQueryBuilder()
      .select(["c.sense_row_id AS sense_row_id", "c.value AS value", "c.metadata AS metadata"])
      .from("counts", "c")
      .innerJoin("senses", "n", "n.row_id = c.sense_row_id")
      .where("n.lexicon_row_id = :lexicon", { lexicon })
      .orderBy("c.row_id")
      .getRawMany<RawRow>()
  ];

  const relation = (row: RawRow): Relation => makeRelation(text(row, "target_id"), text(row, "type"), meta(row));
  const example = (row: RawRow): Example =>
    makeExample(text(row, "example"), { language: optionalText(row, "language"), meta: meta(row) });

  const definitions = groupBy(definitionRows, "synset_row_id", (row): Definition =>
    makeDefinition(text(row, "definition"), {
      language: optionalText(row, "language"),
      sourceSense: optionalText(row, "source_sense"),
      meta: meta(row)
    })
  );
  const synsetExamples = groupBy(synsetExampleRows, "synset_row_id", example);
  const synsetRelations = groupBy(synsetRelationRows, "source_row_id", relation);
  const synsets: Synset[] = synsetRows.map((row) => {
    const rowId = integer(row, "row_id");
    return makeSynset(text(row, "id"), text(row, "pos"), {
      ili: optionalText(row, "ili"),
      iliDefinition: iliDefinition(row),
      lexfile: optionalText(row, "lexfile"),
      members: stringList(row, "members"),
      definitions: definitions.get(rowId),
      examples: synsetExamples.get(rowId),
      relations: synsetRelations.get(rowId),
      meta: meta(row),
      vocabulary
    });
  });

  const positioned = (row: RawRow) => ({ position: integer(row, "position"), relation: relation(row) });
  const senseRelations = groupBy(senseRelationRows, "source_row_id", positioned);
  const senseSynsetRelations = groupBy(senseSynsetRelationRows, "source_row_id", positioned);
  const senseExamples = groupBy(senseExampleRows, "sense_row_id", example);
  const counts = groupBy(countRows, "sense_row_id", (row): Count => makeCount(integer(row, "value"), meta(row)));
  const senses = groupBy(senseRows, "entry_row_id", (row): Sense => {
    const rowId = integer(row, "row_id");
    return makeSense(text(row, "id"), text(row, "synset_id"), {
      relations: [...(senseRelations.get(rowId) ?? []), ...(senseSynsetRelations.get(rowId) ?? [])]
        .sort((a, b) => a.position - b.position)
        .map((item) => item.relation),
      examples: senseExamples.get(rowId),
      counts: counts.get(rowId),
      adjposition: optionalText(row, "adjposition"),
      subcat: stringList(row, "subcat"),
      meta: meta(row),
      vocabulary
    });
  });
  const forms = groupBy(formRows, "entry_row_id", (row): Form =>
    makeForm(text(row, "form"), {
      script: optionalText(row, "script"),
      tags: tags(row),
      pronunciations: pronunciations(row, "pronunciations")
    })
  );
  const entries: LexicalEntry[] = entryRows.map((row) => {
    const rowId = integer(row, "row_id");
    const lemma = makeLemma(text(row, "lemma"), text(row, "pos"), {
      script: optionalText(row, "script"),
      pronunciations: pronunciations(row, "lemma_pronunciations"),
      tags: tags(row, "lemma_tags"),
      vocabulary
    });
    return makeLexicalEntry(text(row, "id"), lemma, {
      forms: forms.get(rowId),
      senses: senses.get(rowId),
      syntacticBehaviours: behaviours(row, "syntactic_behaviours"),
      meta: meta(row)
    });
  });

  const result = makeLexicon({
    id: text(lexiconRow, "id"),
    label: text(lexiconRow, "label"),
    language: text(lexiconRow, "language"),
    email: text(lexiconRow, "email"),
    license: text(lexiconRow, "license"),
    version: text(lexiconRow, "version"),
    url: optionalText(lexiconRow, "url"),
    citation: optionalText(lexiconRow, "citation"),
    meta: meta(lexiconRow),
    entries,
    synsets,
    frames: behaviours(lexiconRow, "frames")
  });
  return makeLexicalResource([result], text(lexiconRow, "lmf_version"));
};

/** Exports the lexicon through the store's generic interface and reparses it. */
export const loadFallback = async (
  store: LexiconSource,
  specifier: string,
  vocabulary: Vocabulary = DEFAULT_VOCABULARY
): Promise<LexicalResource> => {
  const xml = await store.exportLexicon(specifier);
  return parseLexicalResource(xml, vocabulary);
};

const triggersFallback = (err: unknown): err is SchemaMismatchError | MissingInterfaceError | BackingStoreError =>
  err instanceof SchemaMismatchError || err instanceof MissingInterfaceError || err instanceof BackingStoreError;

/**
 * Loads one lexicon from a store. Under `auto` only a schema mismatch, a
 * missing query interface or a failed bulk query send the load down the
 * fallback path; everything else (an unknown or ambiguous specifier, a
 * malformed record) is raised as is.
 */
export const loadLexicon = async (
  store: LexiconSource,
  specifier: string,
  options: LoadOptions = {}
): Promise<LoadResult> => {
  const strategy = options.strategy ?? "auto";
  const vocabulary = options.vocabulary ?? DEFAULT_VOCABULARY;

  if (strategy === "fallback") {
    return { resource: await loadFallback(store, specifier, vocabulary), path: "fallback" };
  }

  try {
    if (!store.dataSource) throw new MissingInterfaceError("direct query access");
    const started = Date.now();
    const resource = await loadFast(store.dataSource, specifier, vocabulary);
    logger.debug(`Fast load of ${specifier} took ${Date.now() - started}ms`);
    return { resource, path: "fast" };
  } catch (err) {
    if (strategy === "fast" || !triggersFallback(err)) throw err;
    logger.warn(`Fast load of ${specifier} unavailable, using export: ${err.message}`);
    const resource = await loadFallback(store, specifier, vocabulary);
    return { resource, path: "fallback", fallbackReason: err.message };
  }
};
