import { isDeepStrictEqual } from "util";
import {
  Count,
  Definition,
  Example,
  Form,
  ILIDefinition,
  LexicalEntry,
  LexicalResource,
  Lexicon,
  META_KEYS,
  Meta,
  Pronunciation,
  Relation,
  Sense,
  Synset,
  SyntacticBehaviour,
  Tag
} from "../types";

/*
 * Canonical form for comparing two resources: free text is trimmed with inner
 * whitespace runs collapsed, empty optional fields are dropped and metadata
 * keys are put in a fixed order. Child order is left as it is.
 */

export const normalizeText = (text: string) => text.replace(/\s+/g, " ").trim();

const normalizeMeta = (meta: Meta | undefined): Meta | undefined => {
  if (!meta) return undefined;
  const out: Meta = {};
  let size = 0;
  for (const key of META_KEYS) {
    const value = meta[key];
    if (value !== undefined && value !== "") {
      out[key] = value;
      size++;
    }
  }
  return size > 0 ? out : undefined;
};

/** Sets an optional field only when it carries a value. */
const assign = <T, K extends keyof T>(target: T, key: K, value: T[K] | undefined) => {
  if (value === undefined || (typeof value === "string" && value === "")) return;
  target[key] = value;
};

const normalizeRelation = (relation: Relation): Relation => {
  const out: Relation = { target: relation.target, relType: relation.relType };
  assign(out, "meta", normalizeMeta(relation.meta));
  return out;
};

const normalizeExample = (example: Example): Example => {
  const out: Example = { text: normalizeText(example.text) };
  assign(out, "language", example.language);
  assign(out, "meta", normalizeMeta(example.meta));
  return out;
};

const normalizeDefinition = (definition: Definition): Definition => {
  const out: Definition = { text: normalizeText(definition.text) };
  assign(out, "language", definition.language);
  assign(out, "sourceSense", definition.sourceSense);
  assign(out, "meta", normalizeMeta(definition.meta));
  return out;
};

const normalizeCount = (count: Count): Count => {
  const out: Count = { value: count.value };
  assign(out, "meta", normalizeMeta(count.meta));
  return out;
};

/** Empty lists count as absent. */
const list = <T, U>(items: T[] | undefined, map: (item: T) => U): U[] | undefined =>
  items && items.length > 0 ? items.map(map) : undefined;

const normalizeTag = (tag: Tag): Tag => ({ category: tag.category, text: normalizeText(tag.text) });

const normalizePronunciation = (pronunciation: Pronunciation): Pronunciation => {
  const out: Pronunciation = { text: normalizeText(pronunciation.text), phonemic: pronunciation.phonemic };
  assign(out, "variety", pronunciation.variety);
  assign(out, "notation", pronunciation.notation);
  assign(out, "audio", pronunciation.audio);
  return out;
};

const normalizeBehaviour = (behaviour: SyntacticBehaviour): SyntacticBehaviour => {
  const out: SyntacticBehaviour = { subcategorizationFrame: normalizeText(behaviour.subcategorizationFrame) };
  assign(out, "id", behaviour.id);
  assign(out, "senses", list(behaviour.senses, (id) => id));
  return out;
};

const normalizeForm = (form: Form): Form => {
  const out: Form = {
    writtenForm: form.writtenForm,
    tags: form.tags.map(normalizeTag)
  };
  assign(out, "script", form.script);
  assign(out, "pronunciations", list(form.pronunciations, normalizePronunciation));
  return out;
};

const normalizeSense = (sense: Sense): Sense => {
  const out: Sense = {
    id: sense.id,
    synset: sense.synset,
    relations: sense.relations.map(normalizeRelation),
    examples: sense.examples.map(normalizeExample),
    counts: sense.counts.map(normalizeCount)
  };
  assign(out, "adjposition", sense.adjposition);
  assign(out, "subcat", list(sense.subcat, (id) => id));
  assign(out, "meta", normalizeMeta(sense.meta));
  return out;
};

const normalizeEntry = (entry: LexicalEntry): LexicalEntry => {
  const lemma: LexicalEntry["lemma"] = {
    writtenForm: entry.lemma.writtenForm,
    partOfSpeech: entry.lemma.partOfSpeech
  };
  assign(lemma, "script", entry.lemma.script);
  assign(lemma, "pronunciations", list(entry.lemma.pronunciations, normalizePronunciation));
  assign(lemma, "tags", list(entry.lemma.tags, normalizeTag));
  const out: LexicalEntry = {
    id: entry.id,
    lemma,
    forms: entry.forms.map(normalizeForm),
    senses: entry.senses.map(normalizeSense)
  };
  assign(out, "syntacticBehaviours", list(entry.syntacticBehaviours, normalizeBehaviour));
  assign(out, "meta", normalizeMeta(entry.meta));
  return out;
};

const normalizeSynset = (synset: Synset): Synset => {
  const out: Synset = {
    id: synset.id,
    partOfSpeech: synset.partOfSpeech,
    ili: synset.ili,
    definitions: synset.definitions.map(normalizeDefinition),
    examples: synset.examples.map(normalizeExample),
    relations: synset.relations.map(normalizeRelation)
  };
  if (synset.iliDefinition) {
    const iliDefinition: ILIDefinition = { text: normalizeText(synset.iliDefinition.text) };
    assign(iliDefinition, "meta", normalizeMeta(synset.iliDefinition.meta));
    out.iliDefinition = iliDefinition;
  }
  assign(out, "lexfile", synset.lexfile);
  assign(out, "members", list(synset.members, (id) => id));
  assign(out, "meta", normalizeMeta(synset.meta));
  return out;
};

const normalizeLexicon = (lexicon: Lexicon): Lexicon => {
  const out: Lexicon = {
    id: lexicon.id,
    label: normalizeText(lexicon.label),
    language: lexicon.language,
    email: lexicon.email,
    license: lexicon.license,
    version: lexicon.version,
    entries: lexicon.entries.map(normalizeEntry),
    synsets: lexicon.synsets.map(normalizeSynset)
  };
  assign(out, "url", lexicon.url);
  assign(out, "citation", lexicon.citation === undefined ? undefined : normalizeText(lexicon.citation));
  assign(out, "frames", list(lexicon.frames, normalizeBehaviour));
  assign(out, "meta", normalizeMeta(lexicon.meta));
  return out;
};

export const normalizeResource = (resource: LexicalResource): LexicalResource => ({
  lmfVersion: resource.lmfVersion,
  lexicons: resource.lexicons.map(normalizeLexicon)
});

export const resourcesEquivalent = (a: LexicalResource, b: LexicalResource): boolean =>
  isDeepStrictEqual(normalizeResource(a), normalizeResource(b));
