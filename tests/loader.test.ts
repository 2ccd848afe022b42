import { DataSource } from "typeorm";
import { StoreMeta } from "../entity/StoreMeta";
import { AmbiguousMatchError, MissingInterfaceError, NotFoundError, SchemaMismatchError } from "../errors";
import { LexiconEditor } from "../services/editor";
import { LexiconSource, SqlLexiconStore } from "../services/lexiconStore";
import { loadLexicon } from "../services/loader";
import { parseLexicalResource } from "../services/lmf";
import { resourcesEquivalent } from "../services/normalize";
import { LexicalResource } from "../types";
import { memoryStore, newEditor, RICH_XML, SAMPLE_XML } from "./helpers";

const emptyLexicon = () => newEditor({ lexiconId: "empty-wn" }).snapshot();

const singleEntryLexicon = () => {
  const editor = newEditor({ lexiconId: "single-wn" });
  editor.createSynset({ pos: "n", definition: "an object", words: ["thing"] });
  return editor.snapshot();
};

const multiRelationLexicon = () => parseLexicalResource(SAMPLE_XML);

const richLexicon = () => parseLexicalResource(RICH_XML);

describe("loadLexicon", () => {
  let store: SqlLexiconStore;

  beforeEach(async () => {
    store = await memoryStore();
  });

  afterEach(async () => {
    await store.dataSource.destroy();
  });

  const cases: Array<{ name: string; build: () => LexicalResource; specifier: string }> = [
    { name: "an empty lexicon", build: emptyLexicon, specifier: "empty-wn" },
    { name: "a single-entry lexicon", build: singleEntryLexicon, specifier: "single-wn" },
    { name: "a multi-relation lexicon", build: multiRelationLexicon, specifier: "sample" },
    { name: "a lexicon with pronunciations and frames", build: richLexicon, specifier: "rich" }
  ];

  describe.each(cases)("with $name", ({ build, specifier }) => {
    it("reads the same lexicon on both paths", async () => {
      const original = build();
      await store.commit(original);

      const fast = await loadLexicon(store, specifier);
      const fallback = await loadLexicon(store, specifier, { strategy: "fallback" });

      expect(fast.path).toBe("fast");
      expect(fallback.path).toBe("fallback");
      expect(resourcesEquivalent(fast.resource, fallback.resource)).toBe(true);
      expect(resourcesEquivalent(fast.resource, original)).toBe(true);
    });

    it("issues a fixed number of queries", async () => {
      await store.commit(build());
      const queries = jest.spyOn(store.dataSource.manager, "createQueryBuilder");

      await loadLexicon(store, specifier, { strategy: "fast" });
      expect(queries).toHaveBeenCalledTimes(13);
    });
  });

  it("keeps relations and their order", async () => {
    await store.commit(multiRelationLexicon());
    const { resource } = await loadLexicon(store, "sample");
    const [lexicon] = resource.lexicons;

    expect(resource.lmfVersion).toBe("1.1");
    expect(lexicon.synsets.map((synset) => synset.relations)).toEqual([
      [{ target: "sample-s3", relType: "hypernym" }],
      [],
      [{ target: "sample-s1", relType: "hyponym" }]
    ]);
    expect(lexicon.entries[0].senses[0].relations).toEqual([{ target: "sample-catty-a-1", relType: "derivation" }]);
    expect(lexicon.entries[0].forms).toEqual([{ writtenForm: "cats", tags: [{ category: "number", text: "plural" }] }]);
    expect(lexicon.synsets[0].meta).toEqual({ "dc:source": "test" });
  });

  it("keeps sense relations to senses and synsets in the order they were added", async () => {
    const editor = newEditor({ lexiconId: "mixed" });
    const dog = editor.createSynset({ pos: "n", words: ["dog"] });
    const animal = editor.createSynset({ pos: "n", words: ["animal"] });
    const [dogSense] = editor.sensesOf(dog.id);
    const [animalSense] = editor.sensesOf(animal.id);
    editor.addSenseRelation(dogSense.id, animal.id, "domain_topic");
    editor.addSenseRelation(dogSense.id, animalSense.id, "other");
    editor.addSenseRelation(dogSense.id, animal.id, "domain_region");
    await editor.commit(store);

    const expected = [
      { target: animal.id, relType: "domain_topic" },
      { target: animalSense.id, relType: "other" },
      { target: animal.id, relType: "domain_region" }
    ];
    const fast = await loadLexicon(store, "mixed", { strategy: "fast" });
    const fallback = await loadLexicon(store, "mixed", { strategy: "fallback" });
    expect(fast.resource.lexicons[0].entries[0].senses[0].relations).toEqual(expected);
    expect(fallback.resource.lexicons[0].entries[0].senses[0].relations).toEqual(expected);
  });

  it("keeps pronunciations, frames and ILI definitions on the fast path", async () => {
    await store.commit(richLexicon());
    const { resource, path } = await loadLexicon(store, "rich", { strategy: "fast" });
    const [lexicon] = resource.lexicons;

    expect(path).toBe("fast");
    expect(lexicon.entries[0].lemma.pronunciations).toEqual([
      { text: "riːd", variety: "GB", phonemic: true },
      { text: "reed", notation: "respelling", phonemic: false }
    ]);
    expect(lexicon.entries[0].lemma.tags).toEqual([{ category: "register", text: "neutral" }]);
    expect(lexicon.entries[0].forms[0].pronunciations).toEqual([{ text: "riːdz", phonemic: true }]);
    expect(lexicon.entries[0].senses[0].subcat).toEqual(["rich-frame-1", "rich-frame-2"]);
    expect(lexicon.entries[0].syntacticBehaviours).toEqual([
      { subcategorizationFrame: "Somebody ----s something", senses: ["rich-read-v-1"] }
    ]);
    expect(lexicon.synsets[0].iliDefinition).toEqual({ text: "look at and understand written text" });
    expect(lexicon.synsets[0].lexfile).toBe("verb.cognition");
    expect(lexicon.synsets[0].members).toEqual(["rich-read-v"]);
    expect(lexicon.frames).toEqual([
      { id: "rich-frame-1", subcategorizationFrame: "Somebody ----s" },
      { id: "rich-frame-2", subcategorizationFrame: "Somebody ----s something" }
    ]);
  });

  describe("fallback", () => {
    it("is used when the store offers no query access", async () => {
      const exportOnly: LexiconSource = { exportLexicon: async () => SAMPLE_XML };

      const result = await loadLexicon(exportOnly, "sample");

      expect(result.path).toBe("fallback");
      expect(result.fallbackReason).toBe("Backing store does not provide direct query access");
      await expect(loadLexicon(exportOnly, "sample", { strategy: "fast" })).rejects.toThrow(MissingInterfaceError);
    });

    it("is used when the schema version differs", async () => {
      await store.commit(multiRelationLexicon());
      await store.dataSource.getRepository(StoreMeta).save({ key: "schema_version", value: "1" });

      const result = await loadLexicon(store, "sample");

      expect(result.path).toBe("fallback");
      expect(result.fallbackReason).toBe("Store schema version is 1, expected 2");
      await expect(loadLexicon(store, "sample", { strategy: "fast" })).rejects.toThrow(SchemaMismatchError);
    });

    it("is used when the tables are missing", async () => {
      await store.commit(multiRelationLexicon());
      const bare = new DataSource({ type: "better-sqlite3", database: ":memory:", entities: [] });
      await bare.initialize();
      const mismatched: LexiconSource = {
        dataSource: bare,
        exportLexicon: (specifier) => store.exportLexicon(specifier)
      };

      try {
        const result = await loadLexicon(mismatched, "sample");
        expect(result.path).toBe("fallback");
        expect(result.fallbackReason).toMatch(/^Store schema does not match: .*no such table: store_meta/);
        expect(resourcesEquivalent(result.resource, multiRelationLexicon())).toBe(true);
      } finally {
        await bare.destroy();
      }
    });
  });

  describe("errors that do not trigger the fallback", () => {
    it("propagates an unknown lexicon", async () => {
      const exportLexicon = jest.spyOn(store, "exportLexicon");

      await expect(loadLexicon(store, "missing")).rejects.toThrow(new NotFoundError("lexicon", "missing"));
      expect(exportLexicon).not.toHaveBeenCalled();
    });

    it("propagates an ambiguous specifier and resolves a versioned one", async () => {
      const editor = newEditor({ lexiconId: "multi" });
      await editor.commit(store);
      editor.setVersion("2.0");
      await editor.commit(store);

      await expect(loadLexicon(store, "multi")).rejects.toThrow(AmbiguousMatchError);
      const { resource } = await loadLexicon(store, "multi:2.0");
      expect(resource.lexicons[0].version).toBe("2.0");
    });
  });

  it("opens an editor through the store", async () => {
    await store.commit(singleEntryLexicon());

    const editor = await LexiconEditor.open(store, "single-wn:1.0");

    expect(editor.stats()).toEqual({ synsets: 1, entries: 1, senses: 1 });
    expect(editor.findEntries("thing")).toHaveLength(1);
    expect(editor.checkIndexes()).toEqual([]);
  });
});
