import { InvalidShapeError } from "../errors";
import {
  makeCount,
  makeLexicon,
  makeMeta,
  makeSense,
  makeSynset,
  validateCount,
  validatePos
} from "../services/records";
import { createVocabulary, DEFAULT_VOCABULARY, PARTS_OF_SPEECH } from "../services/vocabulary";

describe("records", () => {
  describe("validatePos", () => {
    it("accepts every part of speech in the vocabulary", () => {
      for (const pos of PARTS_OF_SPEECH) expect(validatePos(pos)).toBe(pos);
    });

    it("names the context in its error", () => {
      expect(() => validatePos("z", "lemma part of speech")).toThrow(
        "Invalid lemma part of speech: 'z'. Must be one of: n, v, a, r, s, t, c, p, x, u"
      );
    });

    it("checks against a narrowed vocabulary", () => {
      const nounsOnly = createVocabulary({ ...vocabularyLists(), partsOfSpeech: ["n"] });
      expect(() => validatePos("v", "part of speech", nounsOnly)).toThrow("Must be one of: n");
    });
  });

  describe("validateCount", () => {
    it("parses integer strings", () => {
      expect(validateCount("100")).toBe(100);
      expect(validateCount(" 3 ")).toBe(3);
      expect(validateCount(0)).toBe(0);
    });

    it("rejects fractions, words and negatives", () => {
      expect(() => validateCount("1.5")).toThrow("Count must be an integer, got '1.5'");
      expect(() => validateCount("many")).toThrow("Count must be an integer, got 'many'");
      expect(() => validateCount(2.5)).toThrow(InvalidShapeError);
      expect(() => validateCount("-5")).toThrow("Count must be non-negative, got -5");
    });
  });

  describe("makeMeta", () => {
    it("keeps known keys and drops empty values", () => {
      expect(makeMeta({ "dc:source": "test", note: "", status: undefined })).toEqual({ "dc:source": "test" });
      expect(makeMeta({ note: "" })).toBeUndefined();
    });

    it("rejects unknown keys", () => {
      expect(() => makeMeta({ colour: "red" })).toThrow("Unknown metadata attribute 'colour'");
    });
  });

  it("builds records with only the fields that carry values", () => {
    expect(makeSynset("s1", "n")).toEqual({
      id: "s1",
      partOfSpeech: "n",
      ili: "",
      definitions: [],
      examples: [],
      relations: []
    });
    expect(makeSense("s1-sense", "s1", { adjposition: "", meta: { note: "checked" } })).toEqual({
      id: "s1-sense",
      synset: "s1",
      relations: [],
      examples: [],
      counts: [],
      meta: { note: "checked" }
    });
    expect(makeCount("4", { "dc:source": "corpus" })).toEqual({ value: 4, meta: { "dc:source": "corpus" } });
  });

  it("requires every mandatory lexicon field", () => {
    expect(() =>
      makeLexicon({ id: "x", label: "X", language: "en", email: "", license: "l", version: "1" })
    ).toThrow("lexicon email must be a non-empty string");
  });

  it("rejects an empty synset id", () => {
    expect(() => makeSynset("", "n")).toThrow("synset id must be a non-empty string");
  });
});

const vocabularyLists = () => ({
  partsOfSpeech: [...DEFAULT_VOCABULARY.partsOfSpeech],
  adjPositions: [...DEFAULT_VOCABULARY.adjPositions],
  synsetRelations: [...DEFAULT_VOCABULARY.synsetRelations],
  senseRelations: [...DEFAULT_VOCABULARY.senseRelations]
});
