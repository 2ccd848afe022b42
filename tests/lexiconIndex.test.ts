import { InvalidShapeError } from "../errors";
import { LexiconIndex } from "../services/lexiconIndex";
import { makeLemma, makeLexicalEntry, makeLexicon, makeSense, makeSynset } from "../services/records";

const lexicon = () => {
  const s1 = makeSynset("s1", "n");
  const s2 = makeSynset("s2", "v");
  const bank = makeLexicalEntry("bank-n", makeLemma("bank", "n"), { senses: [makeSense("bank-n-s1", "s1")] });
  const bankVerb = makeLexicalEntry("bank-v", makeLemma("bank", "v"), { senses: [makeSense("bank-v-s2", "s2")] });
  return makeLexicon({
    id: "idx",
    label: "Index test",
    language: "en",
    email: "test@example.com",
    license: "test-license",
    version: "1",
    synsets: [s1, s2],
    entries: [bank, bankVerb]
  });
};

describe("LexiconIndex", () => {
  it("maps every record after a rebuild", () => {
    const index = LexiconIndex.of(lexicon());

    expect([...index.entryById.keys()]).toEqual(["bank-n", "bank-v"]);
    expect([...(index.entriesByLemma.get("bank") ?? [])]).toEqual(["bank-n", "bank-v"]);
    expect(index.senseOwner.get("bank-v-s2")).toBe("bank-v");
    expect(index.sensesOf("s1").map((sense) => sense.id)).toEqual(["bank-n-s1"]);
    expect(index.findEntries("bank", "v").map((entry) => entry.id)).toEqual(["bank-v"]);
    expect(index.has("s2")).toBe(true);
    expect(index.has("s3")).toBe(false);
  });

  it("rejects duplicate ids", () => {
    const data = lexicon();
    data.synsets.push(makeSynset("s1", "n"));
    expect(() => LexiconIndex.of(data)).toThrow(new InvalidShapeError("Duplicate synset id: s1"));
  });

  it("reports tables that drifted from the records", () => {
    const data = lexicon();
    const index = LexiconIndex.of(data);
    expect(index.check(data)).toEqual([]);

    data.entries.pop();
    expect(index.check(data)).toEqual([
      "entryById has stale key bank-v",
      "senseById has stale key bank-v-s2",
      "senseOwner has stale key bank-v-s2",
      "entriesByLemma holds a stale value for bank",
      "sensesBySynset has stale key s2"
    ]);
  });

  it("keeps tables in step with incremental changes", () => {
    const data = lexicon();
    const index = LexiconIndex.of(data);
    const [bank] = data.entries;

    const previous = bank.lemma.writtenForm;
    bank.lemma = makeLemma("shore", "n");
    index.renameEntry(bank, previous);
    expect(index.check(data)).toEqual([]);

    index.removeSense("bank-n-s1");
    bank.senses = [];
    expect(index.sensesOf("s1")).toEqual([]);
    expect(index.check(data)).toEqual([]);
  });
});
