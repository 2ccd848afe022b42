import vocabularyData from "../data/vocabulary.json";
import { AdjPosition, PART_OF_SPEECH_NAMES, PartOfSpeech, RelationKind } from "../types";

export interface VocabularyLists {
  partsOfSpeech: readonly string[];
  adjPositions: readonly string[];
  synsetRelations: readonly string[];
  senseRelations: readonly string[];
}

/** Closed sets the editor checks records against. */
export interface Vocabulary {
  partsOfSpeech: ReadonlySet<string>;
  adjPositions: ReadonlySet<string>;
  synsetRelations: ReadonlySet<string>;
  senseRelations: ReadonlySet<string>;
}

export const createVocabulary = (lists: VocabularyLists, extra: Partial<VocabularyLists> = {}): Vocabulary => ({
  partsOfSpeech: new Set([...lists.partsOfSpeech, ...(extra.partsOfSpeech ?? [])]),
  adjPositions: new Set([...lists.adjPositions, ...(extra.adjPositions ?? [])]),
  synsetRelations: new Set([...lists.synsetRelations, ...(extra.synsetRelations ?? [])]),
  senseRelations: new Set([...lists.senseRelations, ...(extra.senseRelations ?? [])])
});

export const DEFAULT_VOCABULARY: Vocabulary = createVocabulary(vocabularyData);

export const PARTS_OF_SPEECH: readonly string[] = vocabularyData.partsOfSpeech;
export const ADJPOSITIONS: readonly string[] = vocabularyData.adjPositions;
export const SYNSET_RELATIONS: readonly string[] = vocabularyData.synsetRelations;
export const SENSE_RELATIONS: readonly string[] = vocabularyData.senseRelations;

export const isPartOfSpeech = (value: string): value is PartOfSpeech =>
  Object.prototype.hasOwnProperty.call(PART_OF_SPEECH_NAMES, value);

export const isAdjPosition = (value: string): value is AdjPosition =>
  value === "a" || value === "ip" || value === "p";

export const relationTypesFor = (vocabulary: Vocabulary, kind: RelationKind): ReadonlySet<string> =>
  kind === "synset" ? vocabulary.synsetRelations : vocabulary.senseRelations;
