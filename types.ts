
export type PartOfSpeech = 'n' | 'v' | 'a' | 'r' | 's' | 't' | 'c' | 'p' | 'x' | 'u';

export type AdjPosition = 'a' | 'ip' | 'p';

export const PART_OF_SPEECH_NAMES: Record<PartOfSpeech, string> = {
  n: 'noun',
  v: 'verb',
  a: 'adjective',
  r: 'adverb',
  s: 'adjective satellite',
  t: 'phrase',
  c: 'conjunction',
  p: 'adposition',
  x: 'other',
  u: 'unknown'
};

export const META_KEYS = [
  'dc:contributor',
  'dc:coverage',
  'dc:creator',
  'dc:date',
  'dc:description',
  'dc:format',
  'dc:identifier',
  'dc:publisher',
  'dc:relation',
  'dc:rights',
  'dc:source',
  'dc:subject',
  'dc:title',
  'dc:type',
  'status',
  'note',
  'confidenceScore'
] as const;

export type MetaKey = typeof META_KEYS[number];

export type Meta = Partial<Record<MetaKey, string>>;

export interface Tag {
  category: string;
  text: string;
}

export interface Definition {
  text: string;
  language?: string;
  sourceSense?: string;
  meta?: Meta;
}

export interface Example {
  text: string;
  language?: string;
  meta?: Meta;
}

export interface Count {
  value: number;
  meta?: Meta;
}

// Shared by synset relations and sense relations.
export interface Relation {
  target: string;
  relType: string;
  meta?: Meta;
}

export interface Pronunciation {
  text: string;
  variety?: string;
  notation?: string;
  /** False for phonetic transcriptions; WN-LMF assumes phonemic. */
  phonemic: boolean;
  audio?: string;
}

export interface Form {
  writtenForm: string;
  script?: string;
  pronunciations?: Pronunciation[];
  tags: Tag[];
}

export interface Lemma {
  writtenForm: string;
  partOfSpeech: PartOfSpeech;
  script?: string;
  pronunciations?: Pronunciation[];
  tags?: Tag[];
}

/**
 * A subcategorization frame. Under a lexicon it carries an id that senses
 * point at through `subcat`; under an entry (WN-LMF 1.0) it lists the senses.
 */
export interface SyntacticBehaviour {
  id?: string;
  subcategorizationFrame: string;
  senses?: string[];
}

export interface ILIDefinition {
  text: string;
  meta?: Meta;
}

export interface Sense {
  id: string;
  synset: string;
  relations: Relation[];
  examples: Example[];
  counts: Count[];
  adjposition?: AdjPosition;
  /** Ids of the lexicon's syntactic behaviours that apply to this sense. */
  subcat?: string[];
  meta?: Meta;
}

export interface LexicalEntry {
  id: string;
  lemma: Lemma;
  forms: Form[];
  senses: Sense[];
  syntacticBehaviours?: SyntacticBehaviour[];
  meta?: Meta;
}

export interface Synset {
  id: string;
  partOfSpeech: PartOfSpeech;
  /** Interlingual index key, '' when the synset has none. */
  ili: string;
  definitions: Definition[];
  iliDefinition?: ILIDefinition;
  examples: Example[];
  relations: Relation[];
  lexfile?: string;
  /** Ids of the member entries in the order the source gave them, when it gave one. */
  members?: string[];
  meta?: Meta;
}

export interface LexiconMetadata {
  id: string;
  label: string;
  language: string;
  email: string;
  license: string;
  version: string;
  url?: string;
  citation?: string;
}

export interface Lexicon extends LexiconMetadata {
  meta?: Meta;
  entries: LexicalEntry[];
  synsets: Synset[];
  frames?: SyntacticBehaviour[];
}

export interface LexicalResource {
  lmfVersion: string;
  lexicons: Lexicon[];
}

export type RelationKind = 'synset' | 'sense';

export interface ValidationWarning {
  kind: 'unknown-relation-type';
  relationKind: RelationKind;
  source: string;
  target: string;
  relType: string;
  message: string;
}

export interface RelationResult {
  relation: Relation;
  warnings: ValidationWarning[];
}

export interface RemovalReport {
  synsets: string[];
  senses: string[];
  entries: string[];
  relations: number;
}

export interface LexiconStats {
  synsets: number;
  entries: number;
  senses: number;
}
