import { InvalidShapeError } from "../errors";
import {
  AdjPosition,
  Count,
  Definition,
  Example,
  Form,
  ILIDefinition,
  LexicalEntry,
  LexicalResource,
  Lemma,
  Lexicon,
  META_KEYS,
  Meta,
  MetaKey,
  PartOfSpeech,
  Pronunciation,
  Relation,
  Sense,
  Synset,
  SyntacticBehaviour,
  Tag
} from "../types";
import { DEFAULT_VOCABULARY, isAdjPosition, isPartOfSpeech, Vocabulary } from "./vocabulary";

/*
 * Record constructors. Everything that produces records (the editor, the XML
 * codec and both loader paths) goes through these so that a record in memory
 * always has a checked shape.
 */

export const DEFAULT_LMF_VERSION = "1.4";

type MetaInput = Record<string, string | null | undefined>;

const isMetaKey = (key: string): key is MetaKey => META_KEYS.some((known) => known === key);

const requireText = (value: unknown, field: string): string => {
  if (typeof value !== "string" || value.trim() === "") {
    throw new InvalidShapeError(`${field} must be a non-empty string`, field);
  }
  return value;
};

const optionalText = (value: string | null | undefined): string | undefined =>
  value === null || value === undefined || value === "" ? undefined : value;

const nonEmpty = <T>(items: T[] | null | undefined): T[] | undefined =>
  items && items.length > 0 ? items : undefined;

/** Splits a whitespace-separated IDREFS attribute. */
export const splitIdRefs = (value: string | null | undefined): string[] =>
  value ? value.split(/\s+/).filter((id) => id !== "") : [];

export const validatePos = (
  pos: string,
  context = "part of speech",
  vocabulary: Vocabulary = DEFAULT_VOCABULARY
): PartOfSpeech => {
  if (!vocabulary.partsOfSpeech.has(pos) || !isPartOfSpeech(pos)) {
    throw new InvalidShapeError(
      `Invalid ${context}: '${pos}'. Must be one of: ${[...vocabulary.partsOfSpeech].join(", ")}`,
      "partOfSpeech"
    );
  }
  return pos;
};

export const validateCount = (value: number | string): number => {
  const parsed = typeof value === "number" ? value : /^\s*-?\d+\s*$/.test(value) ? parseInt(value, 10) : NaN;
  if (!Number.isInteger(parsed)) {
    throw new InvalidShapeError(`Count must be an integer, got '${value}'`, "count");
  }
  if (parsed < 0) {
    throw new InvalidShapeError(`Count must be non-negative, got ${parsed}`, "count");
  }
  return parsed;
};

export const validateAdjposition = (value: string, vocabulary: Vocabulary = DEFAULT_VOCABULARY): AdjPosition => {
  if (!vocabulary.adjPositions.has(value) || !isAdjPosition(value)) {
    throw new InvalidShapeError(
      `Invalid adjective position: '${value}'. Must be one of: ${[...vocabulary.adjPositions].join(", ")}`,
      "adjposition"
    );
  }
  return value;
};

export const makeMeta = (input?: MetaInput | null): Meta | undefined => {
  if (!input) return undefined;
  const meta: Meta = {};
  let size = 0;
  for (const [key, value] of Object.entries(input)) {
    if (value === undefined || value === null || value === "") continue;
    if (!isMetaKey(key)) {
      throw new InvalidShapeError(`Unknown metadata attribute '${key}'`, "meta");
    }
    meta[key] = value;
    size++;
  }
  return size > 0 ? meta : undefined;
};

export const makeTag = (category: string, text: string): Tag => ({
  category: requireText(category, "tag category"),
  text: requireText(text, "tag text")
});

export const makeDefinition = (
  text: string,
  options: { language?: string | null; sourceSense?: string | null; meta?: MetaInput | null } = {}
): Definition => {
  const definition: Definition = { text: requireText(text, "definition") };
  const language = optionalText(options.language);
  const sourceSense = optionalText(options.sourceSense);
  const meta = makeMeta(options.meta);
  if (language) definition.language = language;
  if (sourceSense) definition.sourceSense = sourceSense;
  if (meta) definition.meta = meta;
  return definition;
};

export const makeExample = (
  text: string,
  options: { language?: string | null; meta?: MetaInput | null } = {}
): Example => {
  const example: Example = { text: requireText(text, "example") };
  const language = optionalText(options.language);
  const meta = makeMeta(options.meta);
  if (language) example.language = language;
  if (meta) example.meta = meta;
  return example;
};

export const makeCount = (value: number | string, meta?: MetaInput | null): Count => {
  const count: Count = { value: validateCount(value) };
  const checked = makeMeta(meta);
  if (checked) count.meta = checked;
  return count;
};

export const makeRelation = (target: string, relType: string, meta?: MetaInput | null): Relation => {
  const relation: Relation = {
    target: requireText(target, "relation target"),
    relType: requireText(relType, "relation type")
  };
  const checked = makeMeta(meta);
  if (checked) relation.meta = checked;
  return relation;
};

export const makePronunciation = (
  text: string,
  options: { variety?: string | null; notation?: string | null; phonemic?: boolean | string | null; audio?: string | null } = {}
): Pronunciation => {
  const phonemic = options.phonemic ?? true;
  if (phonemic !== true && phonemic !== false && phonemic !== "true" && phonemic !== "false") {
    throw new InvalidShapeError(`Pronunciation phonemic must be true or false, got '${phonemic}'`, "phonemic");
  }
  const pronunciation: Pronunciation = {
    text: requireText(text, "pronunciation"),
    phonemic: phonemic === true || phonemic === "true"
  };
  const variety = optionalText(options.variety);
  const notation = optionalText(options.notation);
  const audio = optionalText(options.audio);
  if (variety) pronunciation.variety = variety;
  if (notation) pronunciation.notation = notation;
  if (audio) pronunciation.audio = audio;
  return pronunciation;
};

export const makeSyntacticBehaviour = (
  subcategorizationFrame: string,
  options: { id?: string | null; senses?: string[] } = {}
): SyntacticBehaviour => {
  const behaviour: SyntacticBehaviour = {
    subcategorizationFrame: requireText(subcategorizationFrame, "subcategorization frame")
  };
  const id = optionalText(options.id);
  const senses = nonEmpty(options.senses);
  if (id) behaviour.id = id;
  if (senses) behaviour.senses = senses;
  return behaviour;
};

export const makeILIDefinition = (text: string, meta?: MetaInput | null): ILIDefinition => {
  const definition: ILIDefinition = { text: requireText(text, "ILI definition") };
  const checked = makeMeta(meta);
  if (checked) definition.meta = checked;
  return definition;
};

export const makeForm = (
  writtenForm: string,
  options: { script?: string | null; tags?: Tag[]; pronunciations?: Pronunciation[] | null } = {}
): Form => {
  const form: Form = {
    writtenForm: requireText(writtenForm, "written form"),
    tags: (options.tags ?? []).map((tag) => makeTag(tag.category, tag.text))
  };
  const script = optionalText(options.script);
  const pronunciations = nonEmpty(options.pronunciations);
  if (script) form.script = script;
  if (pronunciations) form.pronunciations = pronunciations;
  return form;
};

export const makeLemma = (
  writtenForm: string,
  pos: string,
  options: {
    script?: string | null;
    pronunciations?: Pronunciation[] | null;
    tags?: Tag[] | null;
    vocabulary?: Vocabulary;
  } = {}
): Lemma => {
  const lemma: Lemma = {
    writtenForm: requireText(writtenForm, "lemma"),
    partOfSpeech: validatePos(pos, "part of speech", options.vocabulary)
  };
  const script = optionalText(options.script);
  const pronunciations = nonEmpty(options.pronunciations);
  const tags = nonEmpty(options.tags)?.map((tag) => makeTag(tag.category, tag.text));
  if (script) lemma.script = script;
  if (pronunciations) lemma.pronunciations = pronunciations;
  if (tags) lemma.tags = tags;
  return lemma;
};

export const makeSense = (
  id: string,
  synset: string,
  options: {
    relations?: Relation[];
    examples?: Example[];
    counts?: Count[];
    adjposition?: string | null;
    subcat?: string[] | null;
    meta?: MetaInput | null;
    vocabulary?: Vocabulary;
  } = {}
): Sense => {
  const sense: Sense = {
    id: requireText(id, "sense id"),
    synset: requireText(synset, "sense synset"),
    relations: options.relations ?? [],
    examples: options.examples ?? [],
    counts: options.counts ?? []
  };
  const adjposition = optionalText(options.adjposition);
  const meta = makeMeta(options.meta);
  const subcat = nonEmpty(options.subcat);
  if (adjposition) sense.adjposition = validateAdjposition(adjposition, options.vocabulary);
  if (subcat) sense.subcat = subcat;
  if (meta) sense.meta = meta;
  return sense;
};

export const makeLexicalEntry = (
  id: string,
  lemma: Lemma,
  options: {
    forms?: Form[];
    senses?: Sense[];
    syntacticBehaviours?: SyntacticBehaviour[] | null;
    meta?: MetaInput | null;
  } = {}
): LexicalEntry => {
  const entry: LexicalEntry = {
    id: requireText(id, "entry id"),
    lemma,
    forms: options.forms ?? [],
    senses: options.senses ?? []
  };
  const syntacticBehaviours = nonEmpty(options.syntacticBehaviours);
  const meta = makeMeta(options.meta);
  if (syntacticBehaviours) entry.syntacticBehaviours = syntacticBehaviours;
  if (meta) entry.meta = meta;
  return entry;
};

export const makeSynset = (
  id: string,
  pos: string,
  options: {
    ili?: string | null;
    definitions?: Definition[];
    iliDefinition?: ILIDefinition | null;
    examples?: Example[];
    relations?: Relation[];
    lexfile?: string | null;
    members?: string[] | null;
    meta?: MetaInput | null;
    vocabulary?: Vocabulary;
  } = {}
): Synset => {
  const synset: Synset = {
    id: requireText(id, "synset id"),
    partOfSpeech: validatePos(pos, "synset part of speech", options.vocabulary),
    ili: options.ili ?? "",
    definitions: options.definitions ?? [],
    examples: options.examples ?? [],
    relations: options.relations ?? []
  };
  const lexfile = optionalText(options.lexfile);
  const members = nonEmpty(options.members);
  const meta = makeMeta(options.meta);
  if (options.iliDefinition) synset.iliDefinition = options.iliDefinition;
  if (lexfile) synset.lexfile = lexfile;
  if (members) synset.members = members;
  if (meta) synset.meta = meta;
  return synset;
};

export interface LexiconFields {
  id: string;
  label: string;
  language: string;
  email: string;
  license: string;
  version: string;
  url?: string | null;
  citation?: string | null;
  meta?: MetaInput | null;
  entries?: LexicalEntry[];
  synsets?: Synset[];
  frames?: SyntacticBehaviour[] | null;
}

export const makeLexicon = (fields: LexiconFields): Lexicon => {
  const lexicon: Lexicon = {
    id: requireText(fields.id, "lexicon id"),
    label: requireText(fields.label, "lexicon label"),
    language: requireText(fields.language, "lexicon language"),
    email: requireText(fields.email, "lexicon email"),
    license: requireText(fields.license, "lexicon license"),
    version: requireText(fields.version, "lexicon version"),
    entries: fields.entries ?? [],
    synsets: fields.synsets ?? []
  };
  const url = optionalText(fields.url);
  const citation = optionalText(fields.citation);
  const frames = nonEmpty(fields.frames);
  const meta = makeMeta(fields.meta);
  if (url) lexicon.url = url;
  if (citation) lexicon.citation = citation;
  if (frames) lexicon.frames = frames;
  if (meta) lexicon.meta = meta;
  return lexicon;
};

export const makeLexicalResource = (lexicons: Lexicon[], lmfVersion: string = DEFAULT_LMF_VERSION): LexicalResource => ({
  lmfVersion: requireText(lmfVersion, "LMF version"),
  lexicons
});
