import { SynsetRow } from "../entity/SynsetRow";
import { AmbiguousMatchError, BackingStoreError, InvalidShapeError, NotFoundError } from "../errors";
import { parseSpecifier, pickLexicon, SqlLexiconStore } from "../services/lexiconStore";
import { loadLexicon } from "../services/loader";
import { parseLexicalResource } from "../services/lmf";
import {
  makeLemma,
  makeLexicalEntry,
  makeLexicalResource,
  makeLexicon,
  makeRelation,
  makeSynset
} from "../services/records";
import { memoryStore, newEditor, SAMPLE_XML } from "./helpers";

const lexiconFields = (id: string) => ({
  id,
  label: id,
  language: "en",
  email: "test@example.com",
  license: "test-license",
  version: "1"
});

describe("lexicon specifiers", () => {
  it("splits id and version", () => {
    expect(parseSpecifier("oewn")).toEqual({ id: "oewn" });
    expect(parseSpecifier("oewn:2024")).toEqual({ id: "oewn", version: "2024" });
    expect(parseSpecifier("oewn:")).toEqual({ id: "oewn" });
    expect(() => parseSpecifier(":2024")).toThrow(InvalidShapeError);
  });

  it("picks exactly one lexicon", () => {
    const rows = [
      { id: "a", version: "1" },
      { id: "a", version: "2" },
      { id: "b", version: "1" }
    ];
    expect(pickLexicon("b", rows)).toBe(rows[2]);
    expect(pickLexicon("a:2", rows)).toBe(rows[1]);
    expect(() => pickLexicon("a", rows)).toThrow(
      new AmbiguousMatchError("a", [], "Lexicon 'a' matches 2 versions (a:1, a:2); use id:version")
    );
    expect(() => pickLexicon("a:3", rows)).toThrow(new NotFoundError("lexicon", "a:3"));
  });
});

describe("SqlLexiconStore", () => {
  let store: SqlLexiconStore;

  beforeEach(async () => {
    store = await memoryStore();
  });

  afterEach(async () => {
    await store.dataSource.destroy();
  });

  it("lists what it holds", async () => {
    await store.commit(parseLexicalResource(SAMPLE_XML));
    expect(await store.listLexicons()).toEqual([
      {
        id: "sample",
        label: "Sample Wordnet",
        language: "en",
        email: "editor@example.com",
        license: "https://example.com/license",
        version: "2.0",
        url: "https://example.com/sample",
        lmfVersion: "1.1"
      }
    ]);
  });

  it("exports a document the codec reads back", async () => {
    await store.commit(parseLexicalResource(SAMPLE_XML));
    const xml = await store.exportLexicon("sample:2.0");

    expect(xml).toContain('<Lexicon id="sample" label="Sample Wordnet"');
    expect(parseLexicalResource(xml).lexicons[0].entries).toHaveLength(2);
  });

  it("refuses an id and version it already holds", async () => {
    const resource = parseLexicalResource(SAMPLE_XML);
    await store.commit(resource);

    await expect(store.commit(resource)).rejects.toThrow(
      new BackingStoreError("Lexicon sample:2.0 already exists in the store")
    );
    expect(await store.listLexicons()).toHaveLength(1);
  });

  it("refuses a lexicon with structural errors", async () => {
    const lexicon = makeLexicon({
      ...lexiconFields("orphans"),
      entries: [makeLexicalEntry("orphans-bare-n", makeLemma("bare", "n"))]
    });

    await expect(store.commit(makeLexicalResource([lexicon]))).rejects.toThrow(
      new BackingStoreError("Refusing to store orphans:1: Entry orphans-bare-n has no senses")
    );
    expect(await store.listLexicons()).toEqual([]);
  });

  it("takes an editor session that holds an entry without senses", async () => {
    const editor = newEditor();
    editor.createSynset({ pos: "n", words: ["dog"] });
    editor.createEntry("later", "n");

    await editor.commit(store);

    const { resource } = await loadLexicon(store, "test-wn");
    expect(resource.lexicons[0].entries.map((entry) => entry.id)).toEqual(["test-wn-dog-0002-n"]);
  });

  it("rolls back when a relation target cannot be found", async () => {
    const lexicon = makeLexicon({
      ...lexiconFields("dangling"),
      synsets: [makeSynset("dangling-s1", "n", { relations: [makeRelation("elsewhere-s1", "hypernym")] })]
    });

    await expect(store.commit(makeLexicalResource([lexicon]))).rejects.toThrow(
      "Synset relation dangling-s1 -> elsewhere-s1 has no target in the store"
    );
    expect(await store.listLexicons()).toEqual([]);
    expect(await store.dataSource.getRepository(SynsetRow).count()).toBe(0);
  });

  it("resolves relation targets in other stored lexicons", async () => {
    const base = makeLexicon({ ...lexiconFields("base"), synsets: [makeSynset("base-s1", "n")] });
    const extension = makeLexicon({
      ...lexiconFields("ext"),
      synsets: [makeSynset("ext-s1", "n", { relations: [makeRelation("base-s1", "hypernym")] })]
    });
    await store.commit(makeLexicalResource([base]));
    await store.commit(makeLexicalResource([extension]));

    const { resource, path } = await loadLexicon(store, "ext");
    expect(path).toBe("fast");
    expect(resource.lexicons[0].synsets[0].relations).toEqual([{ target: "base-s1", relType: "hypernym" }]);
  });

  it("resolves a target held by several stored versions to the latest one", async () => {
    const base = (version: string) =>
      makeLexicon({ ...lexiconFields("base"), version, synsets: [makeSynset("base-s1", "n")] });
    const extension = makeLexicon({
      ...lexiconFields("ext"),
      synsets: [makeSynset("ext-s1", "n", { relations: [makeRelation("base-s1", "hypernym")] })]
    });
    await store.commit(makeLexicalResource([base("1")]));
    await store.commit(makeLexicalResource([base("2")]));
    await store.commit(makeLexicalResource([extension]));

    await store.removeLexicon("base:1");
    const kept = await loadLexicon(store, "ext");
    expect(kept.resource.lexicons[0].synsets[0].relations).toEqual([{ target: "base-s1", relType: "hypernym" }]);

    await store.removeLexicon("base:2");
    const dropped = await loadLexicon(store, "ext");
    expect(dropped.resource.lexicons[0].synsets[0].relations).toEqual([]);
  });

  it("removes a lexicon with all its records", async () => {
    await store.commit(parseLexicalResource(SAMPLE_XML));
    await store.removeLexicon("sample");

    expect(await store.listLexicons()).toEqual([]);
    expect(await store.dataSource.getRepository(SynsetRow).count()).toBe(0);
    await expect(store.exportLexicon("sample")).rejects.toThrow(NotFoundError);
  });
});
