import { createDataSource } from "../data-source";
import { LexiconEditor, NewLexiconOptions } from "../services/editor";
import { SqlLexiconStore } from "../services/lexiconStore";

/** Deterministic id parts: 0001, 0002, ... */
export const sequentialIds = () => {
  let next = 0;
  return () => String(++next).padStart(4, "0");
};

export const newEditor = (options: Partial<NewLexiconOptions> = {}) =>
  LexiconEditor.createNew({ lexiconId: "test-wn", generateId: sequentialIds(), ...options });

export const memoryStore = async () => {
  const store = new SqlLexiconStore(createDataSource({ type: "better-sqlite3", database: ":memory:" }));
  await store.initialize();
  return store;
};

export const SAMPLE_XML = `<?xml version="1.0" encoding="UTF-8"?>
<!DOCTYPE LexicalResource SYSTEM "http://globalwordnet.github.io/schemas/WN-LMF-1.1.dtd">
<LexicalResource xmlns:dc="https://globalwordnet.github.io/schemas/dc/">
  <Lexicon id="sample" label="Sample Wordnet" language="en" email="editor@example.com" license="https://example.com/license" version="2.0" url="https://example.com/sample">
    <LexicalEntry id="sample-cat-n">
      <Lemma writtenForm="cat" partOfSpeech="n"/>
      <Form writtenForm="cats">
        <Tag category="number">plural</Tag>
      </Form>
      <Sense id="sample-cat-n-1" synset="sample-s1">
        <SenseRelation relType="derivation" target="sample-catty-a-1"/>
        <Example>The   cat sat.</Example>
        <Count>4</Count>
      </Sense>
    </LexicalEntry>
    <LexicalEntry id="sample-catty-a">
      <Lemma writtenForm="catty" partOfSpeech="a"/>
      <Sense id="sample-catty-a-1" synset="sample-s2" adjposition="p"/>
    </LexicalEntry>
    <Synset id="sample-s1" ili="i46360" partOfSpeech="n" dc:source="test">
      <Definition>a small domesticated feline</Definition>
      <SynsetRelation relType="hypernym" target="sample-s3"/>
    </Synset>
    <Synset id="sample-s2" partOfSpeech="a">
      <Definition language="en">spiteful</Definition>
    </Synset>
    <Synset id="sample-s3" partOfSpeech="n">
      <Definition>an animal</Definition>
      <SynsetRelation relType="hyponym" target="sample-s1"/>
    </Synset>
  </Lexicon>
</LexicalResource>
`;

export const RICH_XML = `<?xml version="1.0" encoding="UTF-8"?>
<!DOCTYPE LexicalResource SYSTEM "http://globalwordnet.github.io/schemas/WN-LMF-1.4.dtd">
<LexicalResource xmlns:dc="https://globalwordnet.github.io/schemas/dc/">
  <Lexicon id="rich" label="Rich Wordnet" language="en" email="editor@example.com" license="https://example.com/license" version="1.0">
    <LexicalEntry id="rich-read-v">
      <Lemma writtenForm="read" partOfSpeech="v">
        <Pronunciation variety="GB">riːd</Pronunciation>
        <Pronunciation notation="respelling" phonemic="false">reed</Pronunciation>
        <Tag category="register">neutral</Tag>
      </Lemma>
      <Form writtenForm="reads">
        <Pronunciation>riːdz</Pronunciation>
        <Tag category="person">third</Tag>
      </Form>
      <Sense id="rich-read-v-1" synset="rich-s1" subcat="rich-frame-1 rich-frame-2"/>
      <SyntacticBehaviour subcategorizationFrame="Somebody ----s something" senses="rich-read-v-1"/>
    </LexicalEntry>
    <Synset id="rich-s1" ili="i12345" partOfSpeech="v" lexfile="verb.cognition" members="rich-read-v">
      <Definition>interpret something written</Definition>
      <ILIDefinition>look at and understand written text</ILIDefinition>
    </Synset>
    <SyntacticBehaviour id="rich-frame-1" subcategorizationFrame="Somebody ----s"/>
    <SyntacticBehaviour id="rich-frame-2" subcategorizationFrame="Somebody ----s something"/>
  </Lexicon>
</LexicalResource>
`;
