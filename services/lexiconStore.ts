import { DataSource, EntityManager, QueryFailedError } from "typeorm";
import { CountRow } from "../entity/CountRow";
import { DefinitionRow } from "../entity/DefinitionRow";
import { EntryRow } from "../entity/EntryRow";
import { FormRow } from "../entity/FormRow";
import { LexiconRow } from "../entity/LexiconRow";
import { SenseExampleRow } from "../entity/SenseExampleRow";
import { SenseRelationRow } from "../entity/SenseRelationRow";
import { SenseRow } from "../entity/SenseRow";
import { SenseSynsetRelationRow } from "../entity/SenseSynsetRelationRow";
import { StoreMeta } from "../entity/StoreMeta";
import { SynsetExampleRow } from "../entity/SynsetExampleRow";
import { SynsetRelationRow } from "../entity/SynsetRelationRow";
import { SynsetRow } from "../entity/SynsetRow";
import { AmbiguousMatchError, BackingStoreError, InvalidShapeError, isEditorError, NotFoundError } from "../errors";
import { logger } from "../logger";
import { LexicalEntry, LexicalResource, Lexicon, LexiconMetadata, Relation, Sense, Synset } from "../types";
import { serializeLexicalResource } from "./lmf";
import { validateLexicon } from "./oracle";
import {
  makeCount,
  makeDefinition,
  makeExample,
  makeForm,
  makeLemma,
  makeLexicalEntry,
  makeLexicalResource,
  makeLexicon,
  makeRelation,
  makeSense,
  makeSynset
} from "./records";

export const SCHEMA_VERSION = "2";
export const SCHEMA_VERSION_KEY = "schema_version";

/** Read side of a backing store. */
export interface LexiconSource {
  /** Direct query access; stores without it can only be read through `exportLexicon`. */
  readonly dataSource?: DataSource;
  /** The lexicon as a WN-LMF document. */
  exportLexicon(specifier: string): Promise<string>;
}

/** Write side of a backing store. */
export interface CommitSink {
  commit(resource: LexicalResource): Promise<void>;
}

export interface LexiconSpecifier {
  id: string;
  version?: string;
}

export interface StoredLexicon extends LexiconMetadata {
  lmfVersion: string;
}

/** Parses `id` or `id:version`. */
export const parseSpecifier = (specifier: string): LexiconSpecifier => {
  const separator = specifier.indexOf(":");
  const id = (separator < 0 ? specifier : specifier.slice(0, separator)).trim();
  const version = separator < 0 ? "" : specifier.slice(separator + 1).trim();
  if (!id) {
    throw new InvalidShapeError(`Invalid lexicon specifier: '${specifier}'`, "specifier");
  }
  return version ? { id, version } : { id };
};

/**
 * Picks the one lexicon a specifier names. Without a version, several stored
 * versions of the same id is an error.
 */
export const pickLexicon = <T extends { id: string; version: string }>(specifier: string, rows: T[]): T => {
  const { id, version } = parseSpecifier(specifier);
  const matching = rows.filter((row) => row.id === id && (version === undefined || row.version === version));
  if (matching.length === 0) throw new NotFoundError("lexicon", specifier);
  if (matching.length > 1) {
    const versions = matching.map((row) => `${row.id}:${row.version}`);
    throw new AmbiguousMatchError(
      specifier,
      versions,
      `Lexicon '${specifier}' matches ${versions.length} versions (${versions.join(", ")}); use id:version`
    );
  }
  return matching[0];
};

const wrapStoreError = (err: unknown, action: string): unknown => {
  if (isEditorError(err)) return err;
  if (err instanceof QueryFailedError) {
    return new BackingStoreError(`${action} failed: ${err.message}`, { cause: err });
  }
  return err;
};

const orderByRow = { rowId: "ASC" } as const;

/**
 * Lexicon store on a TypeORM data source. Reading goes record by record
 * through the repositories; the loader's fast path reads the same tables with
 * bulk queries instead.
 */
export class SqlLexiconStore implements LexiconSource, CommitSink {
  constructor(readonly dataSource: DataSource) {}

  async initialize() {
    if (!this.dataSource.isInitialized) await this.dataSource.initialize();
    const repo = this.dataSource.getRepository(StoreMeta);
    await repo.save(repo.create({ key: SCHEMA_VERSION_KEY, value: SCHEMA_VERSION }));
    logger.debug(`Store ready (schema ${SCHEMA_VERSION})`);
  }

  async listLexicons(): Promise<StoredLexicon[]> {
    const rows = await this.dataSource.getRepository(LexiconRow).find({ order: orderByRow });
    return rows.map((row) => {
      const stored: StoredLexicon = {
        id: row.id,
        label: row.label,
        language: row.language,
        email: row.email,
        license: row.license,
        version: row.version,
        lmfVersion: row.lmfVersion
      };
      if (row.url) stored.url = row.url;
      if (row.citation) stored.citation = row.citation;
      return stored;
    });
  }

  async exportLexicon(specifier: string): Promise<string> {
    try {
      const resource = await this.readResource(this.dataSource.manager, specifier);
      return serializeLexicalResource(resource);
    } catch (err) {
      throw wrapStoreError(err, `Export of ${specifier}`);
    }
  }

  /**
   * Writes every lexicon of the resource in one transaction. An `id:version`
   * already in the store is refused, never overwritten.
   */
  async commit(resource: LexicalResource): Promise<void> {
    try {
      await this.dataSource.transaction(async (manager) => {
        for (const lexicon of resource.lexicons) {
          await this.insertLexicon(manager, lexicon, resource.lmfVersion);
        }
      });
    } catch (err) {
      throw wrapStoreError(err, "Commit");
    }
    logger.info(`Committed ${resource.lexicons.map((lexicon) => `${lexicon.id}:${lexicon.version}`).join(", ")}`);
  }

  async removeLexicon(specifier: string): Promise<void> {
    try {
      await this.dataSource.transaction(async (manager) => {
        const row = await this.resolve(manager, specifier);
        await manager.delete(LexiconRow, { rowId: row.rowId });
      });
    } catch (err) {
      throw wrapStoreError(err, `Removal of ${specifier}`);
    }
    logger.info(`Removed ${specifier}`);
  }

  private async resolve(manager: EntityManager, specifier: string): Promise<LexiconRow> {
    const { id } = parseSpecifier(specifier);
    const rows = await manager.find(LexiconRow, { where: { id }, order: orderByRow });
    return pickLexicon(specifier, rows);
  }

  private async readResource(manager: EntityManager, specifier: string): Promise<LexicalResource> {
    const row = await this.resolve(manager, specifier);

    const synsets: Synset[] = [];
    for (const synsetRow of await manager.find(SynsetRow, { where: { lexiconRowId: row.rowId }, order: orderByRow })) {
      const where = { synsetRowId: synsetRow.rowId };
      const definitions = await manager.find(DefinitionRow, { where, order: orderByRow });
      const examples = await manager.find(SynsetExampleRow, { where, order: orderByRow });
      const relations = await manager.find(SynsetRelationRow, {
        where: { sourceRowId: synsetRow.rowId },
        relations: { target: true },
        order: orderByRow
      });
      synsets.push(
        makeSynset(synsetRow.id, synsetRow.pos, {
          ili: synsetRow.ili,
          iliDefinition: synsetRow.iliDefinition,
          lexfile: synsetRow.lexfile,
          members: synsetRow.members,
          meta: synsetRow.metadata,
          definitions: definitions.map((definition) =>
            makeDefinition(definition.definition, {
              language: definition.language,
              sourceSense: definition.sourceSense,
              meta: definition.metadata
            })
          ),
          examples: examples.map((example) =>
            makeExample(example.example, { language: example.language, meta: example.metadata })
          ),
          relations: relations.map((relation) => makeRelation(relation.target.id, relation.type, relation.metadata))
        })
      );
    }

    const entries: LexicalEntry[] = [];
    for (const entryRow of await manager.find(EntryRow, { where: { lexiconRowId: row.rowId }, order: orderByRow })) {
      const forms = await manager.find(FormRow, { where: { entryRowId: entryRow.rowId }, order: orderByRow });
      const senseRows = await manager.find(SenseRow, {
        where: { entryRowId: entryRow.rowId },
        relations: { synset: true },
        order: orderByRow
      });
      const senses: Sense[] = [];
      for (const senseRow of senseRows) {
        senses.push(await this.readSense(manager, senseRow));
      }
      entries.push(
        makeLexicalEntry(
          entryRow.id,
          makeLemma(entryRow.lemma, entryRow.pos, {
            script: entryRow.script,
            pronunciations: entryRow.pronunciations,
            tags: entryRow.tags
          }),
          {
            forms: forms.map((form) =>
              makeForm(form.form, { script: form.script, tags: form.tags, pronunciations: form.pronunciations })
            ),
            senses,
            syntacticBehaviours: entryRow.syntacticBehaviours,
            meta: entryRow.metadata
          }
        )
      );
    }

    const lexicon = makeLexicon({
      id: row.id,
      label: row.label,
      language: row.language,
      email: row.email,
      license: row.license,
      version: row.version,
      url: row.url,
      citation: row.citation,
      meta: row.metadata,
      entries,
      synsets,
      frames: row.frames
    });
    return makeLexicalResource([lexicon], row.lmfVersion);
  }

  private async readSense(manager: EntityManager, senseRow: SenseRow): Promise<Sense> {
    const where = { sourceRowId: senseRow.rowId };
    const toSenses = await manager.find(SenseRelationRow, { where, relations: { target: true }, order: orderByRow });
    const toSynsets = await manager.find(SenseSynsetRelationRow, { where, relations: { target: true }, order: orderByRow });
    const examples = await manager.find(SenseExampleRow, { where: { senseRowId: senseRow.rowId }, order: orderByRow });
    const counts = await manager.find(CountRow, { where: { senseRowId: senseRow.rowId }, order: orderByRow });

    const relations: Relation[] = [...toSenses, ...toSynsets]
      .sort((a, b) => a.position - b.position)
      .map((relation) => makeRelation(relation.target.id, relation.type, relation.metadata));
    return makeSense(senseRow.id, senseRow.synset.id, {
      relations,
      examples: examples.map((example) => makeExample(example.example, { language: example.language, meta: example.metadata })),
      counts: counts.map((count) => makeCount(count.value, count.metadata)),
      adjposition: senseRow.adjposition,
      subcat: senseRow.subcat,
      meta: senseRow.metadata
    });
  }

  private async insertLexicon(manager: EntityManager, lexicon: Lexicon, lmfVersion: string) {
    const label = `${lexicon.id}:${lexicon.version}`;
    const existing = await manager.findOneBy(LexiconRow, { id: lexicon.id, version: lexicon.version });
    if (existing) {
      throw new BackingStoreError(`Lexicon ${label} already exists in the store`);
    }
    // Targets outside this lexicon are resolved against the store below.
    const errors = validateLexicon(lexicon).filter(
      (complaint) => complaint.severity === "error" && complaint.code !== "unresolved-relation-target"
    );
    if (errors.length > 0) {
      throw new BackingStoreError(`Refusing to store ${label}: ${errors.map((complaint) => complaint.message).join("; ")}`);
    }

    const lexiconRow = await manager.save(
      manager.create(LexiconRow, {
        id: lexicon.id,
        label: lexicon.label,
        language: lexicon.language,
        email: lexicon.email,
        license: lexicon.license,
        version: lexicon.version,
        url: lexicon.url ?? null,
        citation: lexicon.citation ?? null,
        lmfVersion,
        frames: lexicon.frames ?? null,
        metadata: lexicon.meta ?? null
      })
    );

    const synsetRowIds = new Map<string, number>();
    for (const synset of lexicon.synsets) {
      const synsetRow = await manager.save(
        manager.create(SynsetRow, {
          id: synset.id,
          lexiconRowId: lexiconRow.rowId,
          pos: synset.partOfSpeech,
          ili: synset.ili || null,
          iliDefinition: synset.iliDefinition ?? null,
          lexfile: synset.lexfile ?? null,
          members: synset.members ?? null,
          metadata: synset.meta ?? null
        })
      );
      synsetRowIds.set(synset.id, synsetRow.rowId);
      await manager.save(
        synset.definitions.map((definition) =>
          manager.create(DefinitionRow, {
            synsetRowId: synsetRow.rowId,
            definition: definition.text,
            language: definition.language ?? null,
            sourceSense: definition.sourceSense ?? null,
            metadata: definition.meta ?? null
          })
        )
      );
      await manager.save(
        synset.examples.map((example) =>
          manager.create(SynsetExampleRow, {
            synsetRowId: synsetRow.rowId,
            example: example.text,
            language: example.language ?? null,
            metadata: example.meta ?? null
          })
        )
      );
    }

    const senseRowIds = new Map<string, number>();
    for (const entry of lexicon.entries) {
      const entryRow = await manager.save(
        manager.create(EntryRow, {
          id: entry.id,
          lexiconRowId: lexiconRow.rowId,
          lemma: entry.lemma.writtenForm,
          pos: entry.lemma.partOfSpeech,
          script: entry.lemma.script ?? null,
          pronunciations: entry.lemma.pronunciations ?? null,
          tags: entry.lemma.tags ?? null,
          syntacticBehaviours: entry.syntacticBehaviours ?? null,
          metadata: entry.meta ?? null
        })
      );
      await manager.save(
        entry.forms.map((form) =>
          manager.create(FormRow, {
            entryRowId: entryRow.rowId,
            form: form.writtenForm,
            script: form.script ?? null,
            pronunciations: form.pronunciations ?? null,
            tags: form.tags
          })
        )
      );
      for (const sense of entry.senses) {
        const synsetRowId = synsetRowIds.get(sense.synset);
        if (synsetRowId === undefined) {
          throw new BackingStoreError(`Sense ${sense.id} points at missing synset ${sense.synset}`);
        }
        const senseRow = await manager.save(
          manager.create(SenseRow, {
            id: sense.id,
            lexiconRowId: lexiconRow.rowId,
            entryRowId: entryRow.rowId,
            synsetRowId,
            adjposition: sense.adjposition ?? null,
            subcat: sense.subcat ?? null,
            metadata: sense.meta ?? null
          })
        );
        senseRowIds.set(sense.id, senseRow.rowId);
        await manager.save(
          sense.examples.map((example) =>
            manager.create(SenseExampleRow, {
              senseRowId: senseRow.rowId,
              example: example.text,
              language: example.language ?? null,
              metadata: example.meta ?? null
            })
          )
        );
        await manager.save(
          sense.counts.map((count) =>
            manager.create(CountRow, { senseRowId: senseRow.rowId, value: count.value, metadata: count.meta ?? null })
          )
        );
      }
    }

    // Outside this lexicon, the most recently stored record with the id wins.
    const latest = { rowId: "DESC" } as const;
    const storedSynset = async (id: string) =>
      synsetRowIds.get(id) ?? (await manager.findOne(SynsetRow, { where: { id }, order: latest }))?.rowId;
    const storedSense = async (id: string) =>
      senseRowIds.get(id) ?? (await manager.findOne(SenseRow, { where: { id }, order: latest }))?.rowId;

    for (const synset of lexicon.synsets) {
      const sourceRowId = synsetRowIds.get(synset.id);
      for (const relation of synset.relations) {
        const targetRowId = await storedSynset(relation.target);
        if (sourceRowId === undefined || targetRowId === undefined) {
          throw new BackingStoreError(`Synset relation ${synset.id} -> ${relation.target} has no target in the store`);
        }
        await manager.save(
          manager.create(SynsetRelationRow, {
            sourceRowId,
            targetRowId,
            type: relation.relType,
            metadata: relation.meta ?? null
          })
        );
      }
    }

    for (const entry of lexicon.entries) {
      for (const sense of entry.senses) {
        const sourceRowId = senseRowIds.get(sense.id);
        if (sourceRowId === undefined) continue;
        for (const [position, relation] of sense.relations.entries()) {
          const fields = { sourceRowId, type: relation.relType, position, metadata: relation.meta ?? null };
          const senseTarget = await storedSense(relation.target);
          if (senseTarget !== undefined) {
            await manager.save(manager.create(SenseRelationRow, { ...fields, targetRowId: senseTarget }));
            continue;
          }
          const synsetTarget = await storedSynset(relation.target);
          if (synsetTarget === undefined) {
            throw new BackingStoreError(`Sense relation ${sense.id} -> ${relation.target} has no target in the store`);
          }
          await manager.save(manager.create(SenseSynsetRelationRow, { ...fields, targetRowId: synsetTarget }));
        }
      }
    }
  }
}
