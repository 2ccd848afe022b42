import { XMLBuilder, XMLParser } from "fast-xml-parser";
import { InvalidShapeError } from "../errors";
import {
  Count,
  Definition,
  Example,
  Form,
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
import {
  DEFAULT_LMF_VERSION,
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
  makeTag,
  splitIdRefs
} from "./records";
import { DEFAULT_VOCABULARY, Vocabulary } from "./vocabulary";

// WN-LMF exchange format: XML in, records out, and back.

const ATTR = "@_";
const TEXT = "#text";
const DC_NAMESPACE = "https://globalwordnet.github.io/schemas/dc/";

const REPEATABLE = new Set([
  "Lexicon",
  "LexicalEntry",
  "Form",
  "Pronunciation",
  "Tag",
  "Sense",
  "SenseRelation",
  "Example",
  "Count",
  "Synset",
  "Definition",
  "SynsetRelation",
  "SyntacticBehaviour"
]);

const parser = new XMLParser({
  ignoreAttributes: false,
  ignoreDeclaration: true,
  attributeNamePrefix: ATTR,
  textNodeName: TEXT,
  parseTagValue: false,
  parseAttributeValue: false,
  isArray: (name: string, _jpath: string, _isLeafNode: boolean, isAttribute: boolean) =>
    !isAttribute && REPEATABLE.has(name)
});

const builder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: ATTR,
  textNodeName: TEXT,
  format: true,
  indentBy: "  ",
  suppressEmptyNode: true
});

export const doctypeFor = (lmfVersion: string) =>
  `<!DOCTYPE LexicalResource SYSTEM "http://globalwordnet.github.io/schemas/WN-LMF-${lmfVersion}.dtd">`;

export const detectLmfVersion = (xml: string): string | undefined => {
  const match = /WN-LMF-(\d+(?:\.\d+)*)\.dtd/.exec(xml);
  return match ? match[1] : undefined;
};

type XmlNode = Record<string, unknown>;

const isNode = (value: unknown): value is XmlNode =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const asNode = (value: unknown, element: string): XmlNode => {
  if (isNode(value)) return value;
  if (typeof value === "string") return { [TEXT]: value };
  throw new InvalidShapeError(`Malformed <${element}> element`, element);
};

const children = (node: XmlNode, name: string): XmlNode[] => {
  const value = node[name];
  if (value === undefined) return [];
  const list = Array.isArray(value) ? value : [value];
  return list.map((item) => asNode(item, name));
};

const attr = (node: XmlNode, name: string): string | undefined => {
  const value = node[ATTR + name];
  return typeof value === "string" ? value : undefined;
};

const requiredAttr = (node: XmlNode, name: string, element: string): string => {
  const value = attr(node, name);
  if (value === undefined) {
    throw new InvalidShapeError(`<${element}> is missing the ${name} attribute`, name);
  }
  return value;
};

const textOf = (node: XmlNode): string => {
  const value = node[TEXT];
  return typeof value === "string" ? value : "";
};

const metaOf = (node: XmlNode): Record<string, string | undefined> => {
  const meta: Record<string, string | undefined> = {};
  for (const key of META_KEYS) meta[key] = attr(node, key);
  return meta;
};

const readRelation = (node: XmlNode, element: string): Relation =>
  makeRelation(requiredAttr(node, "target", element), requiredAttr(node, "relType", element), metaOf(node));

const readExample = (node: XmlNode): Example =>
  makeExample(textOf(node), { language: attr(node, "language"), meta: metaOf(node) });

const readPronunciation = (node: XmlNode): Pronunciation =>
  makePronunciation(textOf(node), {
    variety: attr(node, "variety"),
    notation: attr(node, "notation"),
    phonemic: attr(node, "phonemic"),
    audio: attr(node, "audio")
  });

const readTag = (node: XmlNode): Tag => makeTag(requiredAttr(node, "category", "Tag"), textOf(node));

const readBehaviour = (node: XmlNode): SyntacticBehaviour =>
  makeSyntacticBehaviour(requiredAttr(node, "subcategorizationFrame", "SyntacticBehaviour"), {
    id: attr(node, "id"),
    senses: splitIdRefs(attr(node, "senses"))
  });

const readSense = (node: XmlNode, vocabulary: Vocabulary): Sense =>
  makeSense(requiredAttr(node, "id", "Sense"), requiredAttr(node, "synset", "Sense"), {
    relations: children(node, "SenseRelation").map((relation) => readRelation(relation, "SenseRelation")),
    examples: children(node, "Example").map(readExample),
    counts: children(node, "Count").map((count) => makeCount(textOf(count), metaOf(count))),
    adjposition: attr(node, "adjposition"),
    subcat: splitIdRefs(attr(node, "subcat")),
    meta: metaOf(node),
    vocabulary
  });

const readForm = (node: XmlNode): Form =>
  makeForm(requiredAttr(node, "writtenForm", "Form"), {
    script: attr(node, "script"),
    pronunciations: children(node, "Pronunciation").map(readPronunciation),
    tags: children(node, "Tag").map(readTag)
  });

const readEntry = (node: XmlNode, vocabulary: Vocabulary): LexicalEntry => {
  const id = requiredAttr(node, "id", "LexicalEntry");
  const lemmaNode = children(node, "Lemma")[0];
  if (!lemmaNode) {
    throw new InvalidShapeError(`LexicalEntry ${id} has no Lemma`, "lemma");
  }
  const lemma = makeLemma(
    requiredAttr(lemmaNode, "writtenForm", "Lemma"),
    requiredAttr(lemmaNode, "partOfSpeech", "Lemma"),
    {
      script: attr(lemmaNode, "script"),
      pronunciations: children(lemmaNode, "Pronunciation").map(readPronunciation),
      tags: children(lemmaNode, "Tag").map(readTag),
      vocabulary
    }
  );
  return makeLexicalEntry(id, lemma, {
    forms: children(node, "Form").map(readForm),
    senses: children(node, "Sense").map((sense) => readSense(sense, vocabulary)),
    syntacticBehaviours: children(node, "SyntacticBehaviour").map(readBehaviour),
    meta: metaOf(node)
  });
};

const readSynset = (node: XmlNode, vocabulary: Vocabulary): Synset => {
  const iliDefinition = children(node, "ILIDefinition")[0];
  return makeSynset(requiredAttr(node, "id", "Synset"), requiredAttr(node, "partOfSpeech", "Synset"), {
    ili: attr(node, "ili"),
    definitions: children(node, "Definition").map(
      (definition): Definition =>
        makeDefinition(textOf(definition), {
          language: attr(definition, "language"),
          sourceSense: attr(definition, "sourceSense"),
          meta: metaOf(definition)
        })
    ),
    iliDefinition: iliDefinition ? makeILIDefinition(textOf(iliDefinition), metaOf(iliDefinition)) : undefined,
    relations: children(node, "SynsetRelation").map((relation) => readRelation(relation, "SynsetRelation")),
    examples: children(node, "Example").map(readExample),
    lexfile: attr(node, "lexfile"),
    members: splitIdRefs(attr(node, "members")),
    meta: metaOf(node),
    vocabulary
  });
};

const readLexicon = (node: XmlNode, vocabulary: Vocabulary): Lexicon =>
  makeLexicon({
    id: requiredAttr(node, "id", "Lexicon"),
    label: requiredAttr(node, "label", "Lexicon"),
    language: requiredAttr(node, "language", "Lexicon"),
    email: requiredAttr(node, "email", "Lexicon"),
    license: requiredAttr(node, "license", "Lexicon"),
    version: requiredAttr(node, "version", "Lexicon"),
    url: attr(node, "url"),
    citation: attr(node, "citation"),
    meta: metaOf(node),
    entries: children(node, "LexicalEntry").map((entry) => readEntry(entry, vocabulary)),
    synsets: children(node, "Synset").map((synset) => readSynset(synset, vocabulary)),
    frames: children(node, "SyntacticBehaviour").map(readBehaviour)
  });

export const parseLexicalResource = (xml: string, vocabulary: Vocabulary = DEFAULT_VOCABULARY): LexicalResource => {
  let document: unknown;
  try {
    document = parser.parse(xml);
  } catch (err) {
    throw new InvalidShapeError(`Not a WN-LMF document: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (!isNode(document) || !isNode(document.LexicalResource)) {
    throw new InvalidShapeError("Not a WN-LMF document: missing <LexicalResource>");
  }
  const lexicons = children(document.LexicalResource, "Lexicon").map((lexicon) => readLexicon(lexicon, vocabulary));
  return makeLexicalResource(lexicons, detectLmfVersion(xml) ?? DEFAULT_LMF_VERSION);
};

const withMeta = (node: XmlNode, meta: Meta | undefined): XmlNode => {
  if (meta) {
    for (const key of META_KEYS) {
      const value = meta[key];
      if (value !== undefined) node[ATTR + key] = value;
    }
  }
  return node;
};

const optionalAttrs = (attrs: Record<string, string | undefined>): XmlNode => {
  const node: XmlNode = {};
  for (const [name, value] of Object.entries(attrs)) {
    if (value !== undefined && value !== "") node[ATTR + name] = value;
  }
  return node;
};

const textNode = (text: string, attrs: Record<string, string | undefined>, meta: Meta | undefined): XmlNode =>
  withMeta({ ...optionalAttrs(attrs), [TEXT]: text }, meta);

const writeRelation = (relation: Relation): XmlNode =>
  withMeta(optionalAttrs({ relType: relation.relType, target: relation.target }), relation.meta);

const writeExample = (example: Example): XmlNode => textNode(example.text, { language: example.language }, example.meta);

const writeCount = (count: Count): XmlNode => textNode(String(count.value), {}, count.meta);

const listOf = (node: XmlNode, name: string, items: XmlNode[]) => {
  if (items.length > 0) node[name] = items;
};

const idRefs = (ids: string[] | undefined) => (ids && ids.length > 0 ? ids.join(" ") : undefined);

const writePronunciation = (pronunciation: Pronunciation): XmlNode =>
  textNode(
    pronunciation.text,
    {
      variety: pronunciation.variety,
      notation: pronunciation.notation,
      phonemic: pronunciation.phonemic ? undefined : "false",
      audio: pronunciation.audio
    },
    undefined
  );

const writeTag = (tag: Tag): XmlNode => textNode(tag.text, { category: tag.category }, undefined);

const writeBehaviour = (behaviour: SyntacticBehaviour): XmlNode =>
  optionalAttrs({
    id: behaviour.id,
    subcategorizationFrame: behaviour.subcategorizationFrame,
    senses: idRefs(behaviour.senses)
  });

const writeSense = (sense: Sense): XmlNode => {
  const node = withMeta(
    optionalAttrs({ id: sense.id, synset: sense.synset, adjposition: sense.adjposition, subcat: idRefs(sense.subcat) }),
    sense.meta
  );
  listOf(node, "SenseRelation", sense.relations.map(writeRelation));
  listOf(node, "Example", sense.examples.map(writeExample));
  listOf(node, "Count", sense.counts.map(writeCount));
  return node;
};

const writeEntry = (entry: LexicalEntry): XmlNode => {
  const node = withMeta(optionalAttrs({ id: entry.id }), entry.meta);
  const lemma = optionalAttrs({
    writtenForm: entry.lemma.writtenForm,
    partOfSpeech: entry.lemma.partOfSpeech,
    script: entry.lemma.script
  });
  listOf(lemma, "Pronunciation", (entry.lemma.pronunciations ?? []).map(writePronunciation));
  listOf(lemma, "Tag", (entry.lemma.tags ?? []).map(writeTag));
  node.Lemma = lemma;
  listOf(
    node,
    "Form",
    entry.forms.map((form) => {
      const formNode = optionalAttrs({ writtenForm: form.writtenForm, script: form.script });
      listOf(formNode, "Pronunciation", (form.pronunciations ?? []).map(writePronunciation));
      listOf(formNode, "Tag", form.tags.map(writeTag));
      return formNode;
    })
  );
  listOf(node, "Sense", entry.senses.map(writeSense));
  listOf(node, "SyntacticBehaviour", (entry.syntacticBehaviours ?? []).map(writeBehaviour));
  return node;
};

const writeSynset = (synset: Synset): XmlNode => {
  const node = withMeta(
    optionalAttrs({
      id: synset.id,
      ili: synset.ili,
      partOfSpeech: synset.partOfSpeech,
      lexfile: synset.lexfile,
      members: idRefs(synset.members)
    }),
    synset.meta
  );
  listOf(
    node,
    "Definition",
    synset.definitions.map((definition) =>
      textNode(definition.text, { language: definition.language, sourceSense: definition.sourceSense }, definition.meta)
    )
  );
  if (synset.iliDefinition) {
    node.ILIDefinition = textNode(synset.iliDefinition.text, {}, synset.iliDefinition.meta);
  }
  listOf(node, "SynsetRelation", synset.relations.map(writeRelation));
  listOf(node, "Example", synset.examples.map(writeExample));
  return node;
};

const writeLexicon = (lexicon: Lexicon): XmlNode => {
  const node = withMeta(
    optionalAttrs({
      id: lexicon.id,
      label: lexicon.label,
      language: lexicon.language,
      email: lexicon.email,
      license: lexicon.license,
      version: lexicon.version,
      url: lexicon.url,
      citation: lexicon.citation
    }),
    lexicon.meta
  );
  listOf(node, "LexicalEntry", lexicon.entries.map(writeEntry));
  listOf(node, "Synset", lexicon.synsets.map(writeSynset));
  listOf(node, "SyntacticBehaviour", (lexicon.frames ?? []).map(writeBehaviour));
  return node;
};

export const serializeLexicalResource = (resource: LexicalResource): string => {
  const body: string = builder.build({
    LexicalResource: {
      [`${ATTR}xmlns:dc`]: DC_NAMESPACE,
      Lexicon: resource.lexicons.map(writeLexicon)
    }
  });
  return `<?xml version="1.0" encoding="UTF-8"?>\n${doctypeFor(resource.lmfVersion)}\n${body.trimEnd()}\n`;
};
