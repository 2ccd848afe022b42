import { randomUUID } from "crypto";
import { readFile, writeFile } from "fs/promises";
import { AmbiguousMatchError, InvalidShapeError, NotFoundError } from "../errors";
import { logger } from "../logger";
import {
  AdjPosition,
  Count,
  Example,
  Form,
  LexicalEntry,
  LexicalResource,
  Lexicon,
  LexiconMetadata,
  LexiconStats,
  Meta,
  PartOfSpeech,
  Relation,
  RelationResult,
  RemovalReport,
  Sense,
  Synset,
  SyntacticBehaviour,
  ValidationWarning
} from "../types";
import { LexiconIndex } from "./lexiconIndex";
import { CommitSink, LexiconSource } from "./lexiconStore";
import { loadLexicon, LoadStrategy } from "./loader";
import { parseLexicalResource, serializeLexicalResource } from "./lmf";
import { MetadataOverrides, NegotiatedMetadata, negotiateMetadata } from "./metadata";
import { Complaint, hasErrors, validateLexicon } from "./oracle";
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
  makeSynset,
  validateAdjposition,
  validatePos
} from "./records";
import { checkRelation } from "./relationValidator";
import { DEFAULT_VOCABULARY, Vocabulary } from "./vocabulary";

export interface EditorOptions {
  vocabulary?: Vocabulary;
  /** When false, relation types are never checked against the vocabulary. */
  validateRelations?: boolean;
  /** Produces the random part of generated ids. */
  generateId?: () => string;
}

export interface MetadataOptions {
  lexiconId?: string;
  label?: string;
  language?: string;
  email?: string;
  license?: string;
  version?: string;
  url?: string;
  citation?: string;
  /** LMF version to write on export; defaults to the version read. */
  lmfVersion?: string;
}

export type NewLexiconOptions = EditorOptions & MetadataOptions;

export interface OpenOptions extends EditorOptions, MetadataOptions {
  strategy?: LoadStrategy;
}

export interface CreateSynsetInput {
  pos: string;
  definition?: string;
  definitions?: string[];
  examples?: string[];
  words?: string[];
  ili?: string;
  id?: string;
  meta?: Meta;
}

export interface SynsetChanges {
  /** Replaces all definitions with this one. */
  definition?: string;
  /** Replaces all definitions. */
  definitions?: string[];
  addDefinitions?: string[];
  /** Replaces all examples. */
  examples?: string[];
  addExamples?: string[];
  /** '' clears the interlingual identifier. */
  ili?: string;
}

export interface EntryChanges {
  lemma?: string;
  forms?: string[];
  addForms?: string[];
}

export interface SenseChanges {
  adjposition?: string;
  addCounts?: Array<number | string>;
  addExamples?: string[];
}

export interface AddWordOptions {
  pos?: string;
  adjposition?: string;
  count?: number | string;
}

export interface WordAttachment {
  entry: LexicalEntry;
  sense: Sense;
}

export interface RelationOptions {
  /** Defaults to true; false skips the vocabulary check and its warning. */
  validate?: boolean;
  meta?: Meta;
}

export interface CommitOptions {
  /** Run the validation oracle first and refuse a snapshot with errors. */
  validate?: boolean;
}

const toOverrides = (options: MetadataOptions): MetadataOverrides => ({
  id: options.lexiconId,
  label: options.label,
  language: options.language,
  email: options.email,
  license: options.license,
  version: options.version,
  url: options.url,
  citation: options.citation,
  lmfVersion: options.lmfVersion
});

const defaultIdGenerator = () => randomUUID().replace(/-/g, "").slice(0, 8);

const METADATA_FIELDS = ["id", "label", "language", "email", "license", "version", "url", "citation"] as const;

const ADJECTIVAL: ReadonlySet<PartOfSpeech> = new Set<PartOfSpeech>(["a", "s"]);

/** Same part of speech, or both adjectival. */
const compatiblePos = (a: PartOfSpeech, b: PartOfSpeech) => a === b || (ADJECTIVAL.has(a) && ADJECTIVAL.has(b));

// Records leave the editor as copies so callers cannot change them behind the index.
const copy = <T>(value: T): T => structuredClone(value);

/**
 * Editor for the active (first) lexicon of a lexical resource.
 *
 * Every structural change goes through this class so that the records and
 * the lookup index move together. Inputs are checked before anything is
 * touched, so a failed call leaves the lexicon as it was. Records handed
 * out are copies. Not safe for concurrent use: one writer per instance.
 */
export class LexiconEditor {
  private readonly resource: LexicalResource;
  private readonly active: Lexicon;
  private readonly index: LexiconIndex;
  private readonly vocabulary: Vocabulary;
  private readonly validateRelations: boolean;
  private readonly generateId: () => string;

  /** LMF version of the source this editor was loaded from. */
  readonly readLmfVersion: string;

  private constructor(resource: LexicalResource, negotiated: NegotiatedMetadata, options: EditorOptions) {
    const lexicon = resource.lexicons[0];
    if (!lexicon) {
      throw new InvalidShapeError("A lexical resource needs at least one lexicon to edit", "lexicons");
    }
    this.resource = resource;
    this.active = lexicon;
    this.vocabulary = options.vocabulary ?? DEFAULT_VOCABULARY;
    this.validateRelations = options.validateRelations ?? true;
    this.generateId = options.generateId ?? defaultIdGenerator;
    this.readLmfVersion = negotiated.readLmfVersion;

    this.applyMetadata(negotiated.lexicon);
    this.resource.lmfVersion = negotiated.writeLmfVersion;
    this.index = LexiconIndex.of(lexicon);
  }

  static createNew(options: NewLexiconOptions): LexiconEditor {
    const negotiated = negotiateMetadata(undefined, toOverrides(options));
    const resource = makeLexicalResource([makeLexicon(negotiated.lexicon)], negotiated.writeLmfVersion);
    return new LexiconEditor(resource, negotiated, options);
  }

  static fromResource(resource: LexicalResource, options: EditorOptions & MetadataOptions = {}): LexiconEditor {
    const lexicon = resource.lexicons[0];
    const loaded = lexicon
      ? {
          id: lexicon.id,
          label: lexicon.label,
          language: lexicon.language,
          email: lexicon.email,
          license: lexicon.license,
          version: lexicon.version,
          url: lexicon.url,
          citation: lexicon.citation,
          lmfVersion: resource.lmfVersion
        }
      : undefined;
    return new LexiconEditor(resource, negotiateMetadata(loaded, toOverrides(options)), options);
  }

  static async loadFromFile(path: string, options: EditorOptions & MetadataOptions = {}): Promise<LexiconEditor> {
    const xml = await readFile(path, "utf8");
    const resource = parseLexicalResource(xml, options.vocabulary);
    if (resource.lexicons.length === 0) {
      throw new InvalidShapeError(`No lexicons found in file: ${path}`, "lexicons");
    }
    return LexiconEditor.fromResource(resource, options);
  }

  static async open(store: LexiconSource, specifier: string, options: OpenOptions = {}): Promise<LexiconEditor> {
    const result = await loadLexicon(store, specifier, { strategy: options.strategy, vocabulary: options.vocabulary });
    logger.info(`Opened ${specifier} via the ${result.path} path`);
    return LexiconEditor.fromResource(result.resource, options);
  }

  // ---------------------------------------------------------------------------
  // Views

  get lexicon(): Lexicon {
    return copy(this.active);
  }

  get lmfVersion(): string {
    return this.resource.lmfVersion;
  }

  /**
   * Deep copy of the whole resource as it is written out. Entries without
   * senses are left out of the copy; the session keeps them.
   */
  snapshot(): LexicalResource {
    const resource = copy(this.resource);
    for (const lexicon of resource.lexicons) {
      const entries = lexicon.entries.filter((entry) => entry.senses.length > 0);
      if (entries.length < lexicon.entries.length) {
        logger.debug(`Leaving ${lexicon.entries.length - entries.length} entr(y/ies) without senses out of ${lexicon.id}`);
      }
      lexicon.entries = entries;
    }
    return resource;
  }

  stats(): LexiconStats {
    return {
      synsets: this.active.synsets.length,
      entries: this.active.entries.length,
      senses: this.index.senseById.size
    };
  }

  /** Differences between the lookup index and the records; empty when consistent. */
  checkIndexes(): string[] {
    return this.index.check(this.active);
  }

  validate(): Complaint[] {
    return validateLexicon(this.active, this.vocabulary);
  }

  dump(): string {
    return serializeLexicalResource(this.snapshot());
  }

  async export(path: string): Promise<void> {
    await writeFile(path, this.dump(), "utf8");
  }

  async commit(sink: CommitSink, options: CommitOptions = {}): Promise<void> {
    const snapshot = this.snapshot();
    if (options.validate) {
      const complaints = snapshot.lexicons.flatMap((lexicon) => validateLexicon(lexicon, this.vocabulary));
      if (hasErrors(complaints)) {
        const first = complaints.filter((complaint) => complaint.severity === "error").map((complaint) => complaint.message);
        throw new InvalidShapeError(`Refusing to commit ${this.active.id}: ${first.join("; ")}`);
      }
    }
    await sink.commit(snapshot);
  }

  // ---------------------------------------------------------------------------
  // Lexicon metadata

  getMetadata(): LexiconMetadata {
    const { id, label, language, email, license, version, url, citation } = this.active;
    const metadata: LexiconMetadata = { id, label, language, email, license, version };
    if (url) metadata.url = url;
    if (citation) metadata.citation = citation;
    return metadata;
  }

  /**
   * Updates the given fields; omitted fields stay as they are. Changing `id`
   * renames the lexicon, which downstream consumers must treat as a new one.
   */
  updateMetadata(changes: Partial<LexiconMetadata>) {
    const next = this.getMetadata();
    for (const field of METADATA_FIELDS) {
      const value = changes[field];
      if (value !== undefined) next[field] = value;
    }
    // Rebuilding through the constructor rejects empty required fields.
    const checked = makeLexicon(next);
    this.applyMetadata(checked);
  }

  setId(id: string) {
    this.updateMetadata({ id });
  }

  setLabel(label: string) {
    this.updateMetadata({ label });
  }

  setVersion(version: string) {
    this.updateMetadata({ version });
  }

  setEmail(email: string) {
    this.updateMetadata({ email });
  }

  setLicense(license: string) {
    this.updateMetadata({ license });
  }

  setUrl(url: string) {
    this.updateMetadata({ url });
  }

  setCitation(citation: string) {
    this.updateMetadata({ citation });
  }

  setLmfVersion(lmfVersion: string) {
    this.resource.lmfVersion = makeLexicalResource([], lmfVersion).lmfVersion;
  }

  // ---------------------------------------------------------------------------
  // Synsets

  getSynset(id: string): Synset | undefined {
    const synset = this.index.synsetById.get(id);
    return synset && copy(synset);
  }

  createSynset(input: CreateSynsetInput): Synset {
    const pos = validatePos(input.pos, "synset part of speech", this.vocabulary);
    const definitions = [
      ...(input.definition !== undefined ? [input.definition] : []),
      ...(input.definitions ?? [])
    ].map((text) => makeDefinition(text));
    const examples = (input.examples ?? []).map((text) => makeExample(text));
    const lemmas = (input.words ?? []).map((word) => makeLemma(word, pos, { vocabulary: this.vocabulary }));
    const id = input.id ?? this.newId("synset", pos);
    this.assertFreeId(id);
    const synset = makeSynset(id, pos, {
      ili: input.ili,
      definitions,
      examples,
      meta: input.meta,
      vocabulary: this.vocabulary
    });

    this.active.synsets.push(synset);
    this.index.addSynset(synset);
    for (const lemma of lemmas) {
      const entry = this.index.findEntries(lemma.writtenForm, pos)[0] ?? this.insertEntry(this.buildEntry(lemma.writtenForm, pos));
      this.attachSense(entry, synset, {});
    }
    logger.debug(`Created synset ${id} with ${lemmas.length} word(s)`);
    return copy(synset);
  }

  modifySynset(id: string, changes: SynsetChanges): Synset {
    const synset = this.requireSynset(id);
    const replaceDefinitions =
      changes.definition !== undefined
        ? [makeDefinition(changes.definition)]
        : changes.definitions?.map((text) => makeDefinition(text));
    const addDefinitions = (changes.addDefinitions ?? []).map((text) => makeDefinition(text));
    const replaceExamples = changes.examples?.map((text) => makeExample(text));
    const addExamples = (changes.addExamples ?? []).map((text) => makeExample(text));

    if (replaceDefinitions) synset.definitions = replaceDefinitions;
    synset.definitions.push(...addDefinitions);
    if (replaceExamples) synset.examples = replaceExamples;
    synset.examples.push(...addExamples);
    if (changes.ili !== undefined) synset.ili = changes.ili;
    return copy(synset);
  }

  /**
   * Removes a synset, every sense that points at it, every entry left without
   * senses and every relation whose target disappeared.
   */
  removeSynset(id: string): RemovalReport {
    this.requireSynset(id);
    const senses = [...(this.index.sensesBySynset.get(id) ?? [])];
    return this.purge({ synsets: [id], senses });
  }

  // ---------------------------------------------------------------------------
  // Relations

  addSynsetRelation(sourceId: string, targetId: string, relType: string, options: RelationOptions = {}): RelationResult {
    const source = this.requireSynset(sourceId, "source");
    if (!this.index.synsetById.has(targetId)) throw new NotFoundError("synset", targetId, "target");
    const relation = makeRelation(targetId, relType, options.meta);
    const warnings = this.classify("synset", sourceId, targetId, relType, options);

    source.relations.push(relation);
    return { relation: copy(relation), warnings };
  }

  /** The target may be a sense or a synset. */
  addSenseRelation(sourceId: string, targetId: string, relType: string, options: RelationOptions = {}): RelationResult {
    const source = this.requireSense(sourceId, "source");
    if (!this.index.senseById.has(targetId) && !this.index.synsetById.has(targetId)) {
      throw new NotFoundError("sense", targetId, "target");
    }
    const relation = makeRelation(targetId, relType, options.meta);
    const warnings = this.classify("sense", sourceId, targetId, relType, options);

    source.relations.push(relation);
    return { relation: copy(relation), warnings };
  }

  /** Removes matching relations and returns how many went. Omit `relType` to match any type. */
  removeSynsetRelation(sourceId: string, targetId: string, relType?: string): number {
    const source = this.requireSynset(sourceId, "source");
    const before = source.relations.length;
    source.relations = source.relations.filter((relation) => !matches(relation, targetId, relType));
    return before - source.relations.length;
  }

  removeSenseRelation(sourceId: string, targetId: string, relType?: string): number {
    const source = this.requireSense(sourceId, "source");
    const before = source.relations.length;
    source.relations = source.relations.filter((relation) => !matches(relation, targetId, relType));
    return before - source.relations.length;
  }

  // ---------------------------------------------------------------------------
  // Entries

  getEntry(id: string): LexicalEntry | undefined {
    const entry = this.index.entryById.get(id);
    return entry && copy(entry);
  }

  findEntries(lemma: string, pos?: string): LexicalEntry[] {
    const checked = pos === undefined ? undefined : validatePos(pos, "part of speech", this.vocabulary);
    return this.index.findEntries(lemma, checked).map(copy);
  }

  /**
   * Creates an entry with no senses. It stays in the session until it
   * receives a sense or a removal sweeps it, and is left out of snapshots,
   * exports and commits until it has a sense.
   */
  createEntry(lemma: string, pos: string, options: { forms?: string[]; id?: string; meta?: Meta } = {}): LexicalEntry {
    const checkedPos = validatePos(pos, "part of speech", this.vocabulary);
    const entry = this.buildEntry(lemma, checkedPos, options);
    return copy(this.insertEntry(entry));
  }

  modifyEntry(id: string, changes: EntryChanges): LexicalEntry {
    const entry = this.requireEntry(id);
    const lemma =
      changes.lemma !== undefined
        ? makeLemma(changes.lemma, entry.lemma.partOfSpeech, { script: entry.lemma.script, vocabulary: this.vocabulary })
        : undefined;
    const forms = changes.forms?.map((form) => makeForm(form));
    const addForms = (changes.addForms ?? []).map((form) => makeForm(form));

    if (lemma && lemma.writtenForm !== entry.lemma.writtenForm) {
      const previous = entry.lemma.writtenForm;
      entry.lemma = lemma;
      this.index.renameEntry(entry, previous);
    }
    if (forms) entry.forms = forms;
    entry.forms.push(...addForms);
    return copy(entry);
  }

  /** Removes the entry and its senses. The synsets those senses used are kept. */
  removeEntry(id: string): RemovalReport {
    const entry = this.requireEntry(id);
    return this.purge({ entries: [id], senses: entry.senses.map((sense) => sense.id) });
  }

  // ---------------------------------------------------------------------------
  // Senses

  getSense(id: string): Sense | undefined {
    const sense = this.index.senseById.get(id);
    return sense && copy(sense);
  }

  /** The entry that owns a sense. */
  entryOf(senseId: string): LexicalEntry | undefined {
    const entry = this.ownerOf(senseId);
    return entry && copy(entry);
  }

  sensesOf(synsetId: string): Sense[] {
    this.requireSynset(synsetId);
    return this.index.sensesOf(synsetId).map(copy);
  }

  /**
   * Links a word to a synset, reusing an entry with the same lemma when there
   * is one. Without `pos`, only entries whose part of speech suits the synset
   * are candidates (`a` and `s` suit each other), and more than one is an
   * error rather than a guess.
   */
  addWordToSynset(synsetId: string, lemma: string, options: AddWordOptions = {}): WordAttachment {
    const synset = this.requireSynset(synsetId);
    const pos = options.pos === undefined ? undefined : validatePos(options.pos, "part of speech", this.vocabulary);
    makeLemma(lemma, pos ?? synset.partOfSpeech, { vocabulary: this.vocabulary });

    let entry: LexicalEntry | undefined;
    if (pos) {
      entry = this.index.findEntries(lemma, pos)[0];
    } else {
      const candidates = this.index
        .findEntries(lemma)
        .filter((candidate) => compatiblePos(candidate.lemma.partOfSpeech, synset.partOfSpeech));
      if (candidates.length > 1) {
        throw new AmbiguousMatchError(lemma, candidates.map((candidate) => candidate.id));
      }
      entry = candidates[0];
    }

    const entryPos = entry?.lemma.partOfSpeech ?? pos ?? synset.partOfSpeech;
    const adjposition = this.checkAdjposition(options.adjposition, entryPos);
    const counts = options.count === undefined ? [] : [makeCount(options.count)];
    const target = entry ?? this.buildEntry(lemma, entryPos);

    if (!entry) this.insertEntry(target);
    const sense = this.attachSense(target, synset, { adjposition, counts });
    return { entry: copy(target), sense: copy(sense) };
  }

  modifySense(id: string, changes: SenseChanges): Sense {
    const sense = this.requireSense(id);
    const owner = this.ownerOf(id);
    const adjposition =
      changes.adjposition === undefined
        ? undefined
        : this.checkAdjposition(changes.adjposition, owner?.lemma.partOfSpeech ?? "n");
    const counts: Count[] = (changes.addCounts ?? []).map((count) => makeCount(count));
    const examples: Example[] = (changes.addExamples ?? []).map((text) => makeExample(text));

    if (adjposition) sense.adjposition = adjposition;
    sense.counts.push(...counts);
    sense.examples.push(...examples);
    return copy(sense);
  }

  removeSense(id: string): RemovalReport {
    this.requireSense(id);
    return this.purge({ senses: [id] });
  }

  // ---------------------------------------------------------------------------
  // Internals

  private applyMetadata(metadata: LexiconMetadata) {
    const lexicon = this.active;
    lexicon.id = metadata.id;
    lexicon.label = metadata.label;
    lexicon.language = metadata.language;
    lexicon.email = metadata.email;
    lexicon.license = metadata.license;
    lexicon.version = metadata.version;
    if (metadata.url) lexicon.url = metadata.url;
    else delete lexicon.url;
    if (metadata.citation) lexicon.citation = metadata.citation;
    else delete lexicon.citation;
  }

  private classify(
    kind: "synset" | "sense",
    source: string,
    target: string,
    relType: string,
    options: RelationOptions
  ): ValidationWarning[] {
    if (!this.validateRelations || options.validate === false) return [];
    const warning = checkRelation(kind, source, target, relType, this.vocabulary);
    if (!warning) return [];
    logger.warn(warning.message);
    return [warning];
  }

  private checkAdjposition(value: string | undefined, pos: PartOfSpeech): AdjPosition | undefined {
    if (value === undefined || value === "") return undefined;
    const adjposition = validateAdjposition(value, this.vocabulary);
    if (!ADJECTIVAL.has(pos)) {
      throw new InvalidShapeError(`Adjective position '${value}' needs an adjective entry, not '${pos}'`, "adjposition");
    }
    return adjposition;
  }

  private newId(prefix: string, suffix?: string): string {
    const stem = prefix.trim().replace(/\s+/g, "_");
    for (;;) {
      const parts = [this.active.id, stem, this.generateId()];
      if (suffix) parts.push(suffix);
      const id = parts.join("-");
      if (!this.index.has(id)) return id;
    }
  }

  private assertFreeId(id: string) {
    if (this.index.has(id)) {
      throw new InvalidShapeError(`Id already in use: ${id}`, "id");
    }
  }

  private buildEntry(lemma: string, pos: PartOfSpeech, options: { forms?: string[]; id?: string; meta?: Meta } = {}): LexicalEntry {
    const checkedLemma = makeLemma(lemma, pos, { vocabulary: this.vocabulary });
    const forms: Form[] = (options.forms ?? []).map((form) => makeForm(form));
    const id = options.id ?? this.newId(checkedLemma.writtenForm, pos);
    this.assertFreeId(id);
    return makeLexicalEntry(id, checkedLemma, { forms, meta: options.meta });
  }

  private insertEntry(entry: LexicalEntry): LexicalEntry {
    this.active.entries.push(entry);
    this.index.addEntry(entry);
    return entry;
  }

  private attachSense(
    entry: LexicalEntry,
    synset: Synset,
    extra: { adjposition?: AdjPosition; counts?: Count[] }
  ): Sense {
    const existing = entry.senses.find((sense) => sense.synset === synset.id);
    if (existing) return existing;

    let id = `${entry.id}-${synset.id}`;
    for (let n = 2; this.index.has(id); n++) id = `${entry.id}-${synset.id}-${n}`;
    const sense = makeSense(id, synset.id, {
      adjposition: extra.adjposition,
      counts: extra.counts,
      vocabulary: this.vocabulary
    });
    entry.senses.push(sense);
    this.index.addSense(entry.id, sense);
    if (synset.members && !synset.members.includes(entry.id)) synset.members.push(entry.id);
    return sense;
  }

  private purge(targets: { synsets?: string[]; senses?: string[]; entries?: string[] }): RemovalReport {
    const removedSynsets = new Set(targets.synsets ?? []);
    const removedSenses = new Set(targets.senses ?? []);
    const removedEntries = new Set(targets.entries ?? []);

    const owners = new Set<string>();
    for (const senseId of removedSenses) {
      const owner = this.index.senseOwner.get(senseId);
      if (owner !== undefined) owners.add(owner);
      this.index.removeSense(senseId);
    }
    for (const owner of owners) {
      const entry = this.index.entryById.get(owner);
      if (entry) entry.senses = entry.senses.filter((sense) => !removedSenses.has(sense.id));
    }

    if (removedSynsets.size > 0) {
      this.active.synsets = this.active.synsets.filter((synset) => !removedSynsets.has(synset.id));
      for (const id of removedSynsets) this.index.removeSynset(id);
    }

    // Sweep: explicit removals plus every entry now without senses.
    const kept: LexicalEntry[] = [];
    for (const entry of this.active.entries) {
      if (removedEntries.has(entry.id) || entry.senses.length === 0) {
        removedEntries.add(entry.id);
        this.index.removeEntry(entry);
      } else {
        kept.push(entry);
      }
    }
    this.active.entries = kept;

    const gone = (relation: Relation) => removedSynsets.has(relation.target) || removedSenses.has(relation.target);
    let relations = 0;
    for (const synset of this.active.synsets) {
      const before = synset.relations.length;
      synset.relations = synset.relations.filter((relation) => !gone(relation));
      relations += before - synset.relations.length;
    }
    for (const sense of this.index.senseById.values()) {
      const before = sense.relations.length;
      sense.relations = sense.relations.filter((relation) => !gone(relation));
      relations += before - sense.relations.length;
    }

    // Member lists and frames only name what is still there.
    for (const synset of this.active.synsets) {
      if (!synset.members) continue;
      const members = synset.members.filter((entryId) =>
        this.index.entryById.get(entryId)?.senses.some((sense) => sense.synset === synset.id)
      );
      if (members.length > 0) synset.members = members;
      else delete synset.members;
    }
    dropSenses(this.active.frames, removedSenses);
    for (const entry of this.active.entries) dropSenses(entry.syntacticBehaviours, removedSenses);

    const report: RemovalReport = {
      synsets: [...removedSynsets],
      senses: [...removedSenses],
      entries: [...removedEntries],
      relations
    };
    logger.debug(
      `Removed ${report.synsets.length} synset(s), ${report.senses.length} sense(s), ${report.entries.length} entr(y/ies), ${relations} relation(s)`
    );
    return report;
  }

  private ownerOf(senseId: string): LexicalEntry | undefined {
    const owner = this.index.senseOwner.get(senseId);
    return owner === undefined ? undefined : this.index.entryById.get(owner);
  }

  private requireSynset(id: string, role?: string): Synset {
    const synset = this.index.synsetById.get(id);
    if (!synset) throw new NotFoundError("synset", id, role);
    return synset;
  }

  private requireSense(id: string, role?: string): Sense {
    const sense = this.index.senseById.get(id);
    if (!sense) throw new NotFoundError("sense", id, role);
    return sense;
  }

  private requireEntry(id: string): LexicalEntry {
    const entry = this.index.entryById.get(id);
    if (!entry) throw new NotFoundError("entry", id);
    return entry;
  }
}

const matches = (relation: Relation, target: string, relType?: string) =>
  relation.target === target && (relType === undefined || relation.relType === relType);

const dropSenses = (behaviours: SyntacticBehaviour[] | undefined, removed: ReadonlySet<string>) => {
  for (const behaviour of behaviours ?? []) {
    if (!behaviour.senses) continue;
    const senses = behaviour.senses.filter((id) => !removed.has(id));
    if (senses.length > 0) behaviour.senses = senses;
    else delete behaviour.senses;
  }
};
