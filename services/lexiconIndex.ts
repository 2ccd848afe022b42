import { InvalidShapeError } from "../errors";
import { LexicalEntry, Lexicon, PartOfSpeech, Sense, Synset } from "../types";

/**
 * Lookup tables derived from a lexicon's records.
 *
 * The index never owns records; it maps ids onto the objects held by the
 * lexicon. `rebuild` recomputes every table, the add/remove methods keep
 * them in step with one structural change at a time.
 */
export class LexiconIndex {
  readonly entryById = new Map<string, LexicalEntry>();
  readonly entriesByLemma = new Map<string, Set<string>>();
  readonly senseById = new Map<string, Sense>();
  readonly synsetById = new Map<string, Synset>();
  /** sense id -> id of the entry that owns it */
  readonly senseOwner = new Map<string, string>();
  /** synset id -> ids of the senses that point at it, in insertion order */
  readonly sensesBySynset = new Map<string, Set<string>>();

  static of(lexicon: Lexicon): LexiconIndex {
    const index = new LexiconIndex();
    index.rebuild(lexicon);
    return index;
  }

  rebuild(lexicon: Lexicon) {
    this.entryById.clear();
    this.entriesByLemma.clear();
    this.senseById.clear();
    this.synsetById.clear();
    this.senseOwner.clear();
    this.sensesBySynset.clear();

    for (const synset of lexicon.synsets) this.addSynset(synset);
    for (const entry of lexicon.entries) this.addEntry(entry);
  }

  has(id: string): boolean {
    return this.entryById.has(id) || this.senseById.has(id) || this.synsetById.has(id);
  }

  addSynset(synset: Synset) {
    if (this.synsetById.has(synset.id)) {
      throw new InvalidShapeError(`Duplicate synset id: ${synset.id}`, "id");
    }
    this.synsetById.set(synset.id, synset);
  }

  removeSynset(id: string) {
    this.synsetById.delete(id);
    this.sensesBySynset.delete(id);
  }

  addEntry(entry: LexicalEntry) {
    if (this.entryById.has(entry.id)) {
      throw new InvalidShapeError(`Duplicate entry id: ${entry.id}`, "id");
    }
    this.entryById.set(entry.id, entry);
    this.linkLemma(entry.lemma.writtenForm, entry.id);
    for (const sense of entry.senses) this.addSense(entry.id, sense);
  }

  removeEntry(entry: LexicalEntry) {
    for (const sense of entry.senses) this.removeSense(sense.id);
    this.entryById.delete(entry.id);
    this.unlinkLemma(entry.lemma.writtenForm, entry.id);
  }

  /** Moves an entry to a new lemma key, keeping its place in the entry table. */
  renameEntry(entry: LexicalEntry, previousLemma: string) {
    this.unlinkLemma(previousLemma, entry.id);
    this.linkLemma(entry.lemma.writtenForm, entry.id);
  }

  addSense(entryId: string, sense: Sense) {
    if (this.senseById.has(sense.id)) {
      throw new InvalidShapeError(`Duplicate sense id: ${sense.id}`, "id");
    }
    this.senseById.set(sense.id, sense);
    this.senseOwner.set(sense.id, entryId);
    let members = this.sensesBySynset.get(sense.synset);
    if (!members) {
      members = new Set();
      this.sensesBySynset.set(sense.synset, members);
    }
    members.add(sense.id);
  }

  removeSense(id: string) {
    const sense = this.senseById.get(id);
    if (!sense) return;
    this.senseById.delete(id);
    this.senseOwner.delete(id);
    const members = this.sensesBySynset.get(sense.synset);
    if (members) {
      members.delete(id);
      if (members.size === 0) this.sensesBySynset.delete(sense.synset);
    }
  }

  findEntries(lemma: string, pos?: PartOfSpeech): LexicalEntry[] {
    const ids = this.entriesByLemma.get(lemma);
    if (!ids) return [];
    const entries: LexicalEntry[] = [];
    for (const id of ids) {
      const entry = this.entryById.get(id);
      if (entry && (!pos || entry.lemma.partOfSpeech === pos)) entries.push(entry);
    }
    return entries;
  }

  sensesOf(synsetId: string): Sense[] {
    const ids = this.sensesBySynset.get(synsetId);
    if (!ids) return [];
    const senses: Sense[] = [];
    for (const id of ids) {
      const sense = this.senseById.get(id);
      if (sense) senses.push(sense);
    }
    return senses;
  }

  /**
   * Lists every disagreement between the tables and the lexicon's records.
   * An empty result means the index is exact.
   */
  check(lexicon: Lexicon): string[] {
    const problems: string[] = [];
    const expected = LexiconIndex.of(lexicon);

    const compareKeys = <V>(name: string, actual: Map<string, V>, wanted: Map<string, V>, sameValue?: (a: V, b: V) => boolean) => {
      for (const [key, value] of wanted) {
        const have = actual.get(key);
        if (have === undefined) problems.push(`${name} is missing ${key}`);
        else if (sameValue && !sameValue(have, value)) problems.push(`${name} holds a stale value for ${key}`);
      }
      for (const key of actual.keys()) {
        if (!wanted.has(key)) problems.push(`${name} has stale key ${key}`);
      }
    };
    const sameRecord = <V>(a: V, b: V) => a === b;
    const sameMembers = (a: Set<string>, b: Set<string>) =>
      a.size === b.size && [...b].every((id) => a.has(id));

    compareKeys("entryById", this.entryById, expected.entryById, sameRecord);
    compareKeys("senseById", this.senseById, expected.senseById, sameRecord);
    compareKeys("synsetById", this.synsetById, expected.synsetById, sameRecord);
    compareKeys("senseOwner", this.senseOwner, expected.senseOwner, sameRecord);
    compareKeys("entriesByLemma", this.entriesByLemma, expected.entriesByLemma, sameMembers);
    compareKeys("sensesBySynset", this.sensesBySynset, expected.sensesBySynset, sameMembers);

    return problems;
  }

  private linkLemma(lemma: string, entryId: string) {
    let ids = this.entriesByLemma.get(lemma);
    if (!ids) {
      ids = new Set();
      this.entriesByLemma.set(lemma, ids);
    }
    ids.add(entryId);
  }

  private unlinkLemma(lemma: string, entryId: string) {
    const ids = this.entriesByLemma.get(lemma);
    if (!ids) return;
    ids.delete(entryId);
    if (ids.size === 0) this.entriesByLemma.delete(lemma);
  }
}
