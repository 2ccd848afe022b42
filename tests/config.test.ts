import { loadConfig } from "../config";
import { checkRelation } from "../services/relationValidator";
import { createVocabulary, DEFAULT_VOCABULARY, PARTS_OF_SPEECH, SENSE_RELATIONS, SYNSET_RELATIONS } from "../services/vocabulary";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({})).toEqual({
      port: 3000,
      db: {
        type: "postgres",
        host: "localhost",
        port: 5432,
        username: "postgres",
        password: "postgres",
        database: "lexicon_store"
      },
      lexicon: undefined,
      newLexiconId: "custom-wn",
      validateRelations: true,
      loadStrategy: "auto",
      logLevel: "info"
    });
  });

  it("reads the environment", () => {
    const config = loadConfig({
      PORT: "8080",
      DB_TYPE: "better-sqlite3",
      DB_PATH: ":memory:",
      LEXICON: "test-wn:1.0",
      VALIDATE_RELATIONS: "off",
      LOAD_STRATEGY: "fallback",
      LOG_LEVEL: "debug"
    });

    expect(config.port).toBe(8080);
    expect(config.db).toEqual({ type: "better-sqlite3", database: ":memory:" });
    expect(config.lexicon).toBe("test-wn:1.0");
    expect(config.validateRelations).toBe(false);
    expect(config.loadStrategy).toBe("fallback");
    expect(config.logLevel).toBe("debug");
  });

  it("rejects unknown strategies and levels", () => {
    expect(() => loadConfig({ LOAD_STRATEGY: "eager" })).toThrow(
      "LOAD_STRATEGY must be one of auto, fast, fallback, got 'eager'"
    );
    expect(() => loadConfig({ LOG_LEVEL: "loud" })).toThrow("Unknown LOG_LEVEL 'loud'");
  });
});

describe("vocabulary", () => {
  it("carries the WN-LMF closed sets", () => {
    expect(PARTS_OF_SPEECH).toEqual(["n", "v", "a", "r", "s", "t", "c", "p", "x", "u"]);
    expect(SYNSET_RELATIONS).toContain("hypernym");
    expect(SENSE_RELATIONS).toContain("derivation");
    expect(SENSE_RELATIONS).not.toContain("hypernym");
  });

  it("accepts extra relation types", () => {
    const vocabulary = createVocabulary(
      {
        partsOfSpeech: PARTS_OF_SPEECH,
        adjPositions: ["a", "ip", "p"],
        synsetRelations: SYNSET_RELATIONS,
        senseRelations: SENSE_RELATIONS
      },
      { synsetRelations: ["made_up"] }
    );

    expect(checkRelation("synset", "s1", "s2", "made_up", vocabulary)).toBeUndefined();
    expect(checkRelation("synset", "s1", "s2", "made_up", DEFAULT_VOCABULARY)).toEqual({
      kind: "unknown-relation-type",
      relationKind: "synset",
      source: "s1",
      target: "s2",
      relType: "made_up",
      message: "Unknown synset relation type 'made_up' (s1 -> s2)"
    });
    expect(checkRelation("sense", "a-1", "b-1", "hypernym", DEFAULT_VOCABULARY)?.kind).toBe("unknown-relation-type");
  });
});
