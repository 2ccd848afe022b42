import { Server } from "http";
import { createApp } from "../app";
import { LexiconEditor } from "../services/editor";
import { SqlLexiconStore } from "../services/lexiconStore";
import { parseLexicalResource } from "../services/lmf";
import { memoryStore, newEditor } from "./helpers";

interface Running {
  server: Server;
  base: string;
}

const serve = (editor: LexiconEditor, store?: SqlLexiconStore): Promise<Running> =>
  new Promise((resolve) => {
    const server = createApp(editor, store).listen(0, "127.0.0.1", () => {
      const address = server.address();
      const port = typeof address === "object" && address !== null ? address.port : 0;
      resolve({ server, base: `http://127.0.0.1:${port}` });
    });
  });

const stop = (server: Server) =>
  new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));

const send = (base: string, method: string, path: string, body?: unknown) =>
  fetch(`${base}${path}`, {
    method,
    headers: body === undefined ? undefined : { "Content-Type": "application/json" },
    body: body === undefined ? undefined : JSON.stringify(body)
  });

describe("HTTP API", () => {
  let editor: LexiconEditor;
  let running: Running;

  beforeEach(async () => {
    editor = newEditor();
    running = await serve(editor);
  });

  afterEach(async () => {
    await stop(running.server);
  });

  it("creates a synset with its words", async () => {
    const created = await send(running.base, "POST", "/api/synsets", {
      pos: "n",
      definition: "a domestic animal",
      words: ["dog"]
    });
    expect(created.status).toBe(201);
    expect(await created.json()).toEqual({
      id: "test-wn-synset-0001-n",
      partOfSpeech: "n",
      ili: "",
      definitions: [{ text: "a domestic animal" }],
      examples: [],
      relations: []
    });

    const fetched = await send(running.base, "GET", "/api/synsets/test-wn-synset-0001-n");
    expect(await fetched.json()).toMatchObject({ senses: [{ id: "test-wn-dog-0002-n-test-wn-synset-0001-n" }] });

    const lexicon = await send(running.base, "GET", "/api/lexicon");
    expect(await lexicon.json()).toMatchObject({ lmfVersion: "1.4", stats: { synsets: 1, entries: 1, senses: 1 } });
  });

  it("exports the session as WN-LMF", async () => {
    editor.createSynset({ pos: "n", definition: "a domestic animal", words: ["dog"] });

    const response = await send(running.base, "GET", "/api/export");

    expect(response.headers.get("content-type")).toBe("application/xml; charset=utf-8");
    expect(await response.text()).toContain('<Lemma writtenForm="dog" partOfSpeech="n"/>');
  });

  it("updates lexicon metadata", async () => {
    const response = await send(running.base, "PATCH", "/api/lexicon", { label: "Test Wordnet", version: "2.0" });

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({ id: "test-wn", label: "Test Wordnet", version: "2.0" });
    expect(editor.getMetadata().version).toBe("2.0");
  });

  it("answers 404 for unknown records", async () => {
    const response = await send(running.base, "DELETE", "/api/synsets/missing");

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: "synset not found: missing", kind: "NotFound" });
  });

  it("answers 400 for malformed input", async () => {
    const response = await send(running.base, "POST", "/api/synsets", { pos: "q" });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      error: "Invalid synset part of speech: 'q'. Must be one of: n, v, a, r, s, t, c, p, x, u",
      kind: "InvalidShape"
    });
  });

  it("answers 409 when a lemma is ambiguous", async () => {
    editor.createEntry("bank", "n");
    editor.createEntry("bank", "n");
    const synset = editor.createSynset({ pos: "n", definition: "a slope beside water" });

    const response = await send(running.base, "POST", `/api/synsets/${synset.id}/words`, { lemma: "bank" });

    expect(response.status).toBe(409);
    expect(await response.json()).toEqual({
      error: "Lemma 'bank' matches 2 entries (test-wn-bank-0001-n, test-wn-bank-0002-n); pass a part of speech",
      kind: "AmbiguousMatch"
    });
  });

  it("answers 501 for store routes without a store", async () => {
    const response = await send(running.base, "POST", "/api/commit");

    expect(response.status).toBe(501);
    expect(await response.json()).toEqual({
      error: "Backing store does not provide persistent storage to this session",
      kind: "MissingInterface"
    });
  });

  it("reports relation warnings", async () => {
    const a = editor.createSynset({ pos: "n", definition: "first" });
    const b = editor.createSynset({ pos: "n", definition: "second" });

    const response = await send(running.base, "POST", `/api/synsets/${a.id}/relations`, {
      target: b.id,
      relType: "made_up"
    });

    expect(response.status).toBe(201);
    expect(await response.json()).toEqual({
      relation: { target: b.id, relType: "made_up" },
      warnings: [
        {
          kind: "unknown-relation-type",
          relationKind: "synset",
          source: a.id,
          target: b.id,
          relType: "made_up",
          message: `Unknown synset relation type 'made_up' (${a.id} -> ${b.id})`
        }
      ]
    });
  });
});

describe("HTTP API with a store", () => {
  let store: SqlLexiconStore;
  let editor: LexiconEditor;
  let running: Running;

  beforeEach(async () => {
    store = await memoryStore();
    editor = newEditor();
    running = await serve(editor, store);
  });

  afterEach(async () => {
    await stop(running.server);
    await store.dataSource.destroy();
  });

  it("commits the session and lists it", async () => {
    editor.createSynset({ pos: "n", definition: "a domestic animal", words: ["dog"] });

    const committed = await send(running.base, "POST", "/api/commit");
    expect(committed.status).toBe(200);
    expect(await committed.json()).toEqual({ success: true });

    const listed = await send(running.base, "GET", "/api/store/lexicons");
    expect(await listed.json()).toEqual([expect.objectContaining({ id: "test-wn", version: "1.0", lmfVersion: "1.4" })]);

    const again = await send(running.base, "POST", "/api/commit");
    expect(again.status).toBe(502);
    expect(await again.json()).toEqual({
      error: "Lexicon test-wn:1.0 already exists in the store",
      kind: "BackingStore"
    });
  });

  it("commits a session that still holds an entry without senses", async () => {
    editor.createSynset({ pos: "n", definition: "a domestic animal", words: ["dog"] });
    editor.createEntry("later", "n");

    const response = await send(running.base, "POST", "/api/commit");

    expect(response.status).toBe(200);
    const stored = parseLexicalResource(await store.exportLexicon("test-wn"));
    expect(stored.lexicons[0].entries.map((entry) => entry.id)).toEqual(["test-wn-dog-0002-n"]);
    expect(editor.stats().entries).toBe(2);
  });
});
