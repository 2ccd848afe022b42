import { Lexicon } from "../types";
import { DEFAULT_VOCABULARY, Vocabulary } from "./vocabulary";

export type ComplaintSeverity = "error" | "warning";

export type ComplaintCode =
  | "duplicate-id"
  | "dangling-sense-synset"
  | "unresolved-relation-target"
  | "entry-without-senses"
  | "unknown-relation-type"
  | "pos-mismatch"
  | "self-relation";

export interface Complaint {
  severity: ComplaintSeverity;
  code: ComplaintCode;
  id: string;
  message: string;
}

const compatiblePos = (entryPos: string, synsetPos: string) =>
  entryPos === synsetPos || (entryPos === "a" && synsetPos === "s") || (entryPos === "s" && synsetPos === "a");

/**
 * Structural review of a lexicon snapshot. Advisory: nothing here mutates
 * the lexicon, and only "error" complaints describe states the editor is
 * meant to prevent.
 */
export const validateLexicon = (lexicon: Lexicon, vocabulary: Vocabulary = DEFAULT_VOCABULARY): Complaint[] => {
  const complaints: Complaint[] = [];
  const complain = (severity: ComplaintSeverity, code: ComplaintCode, id: string, message: string) => {
    complaints.push({ severity, code, id, message });
  };

  const seen = new Set<string>();
  const claim = (id: string) => {
    if (seen.has(id)) complain("error", "duplicate-id", id, `Id ${id} is used by more than one record`);
    seen.add(id);
  };

  const synsetPos = new Map<string, string>();
  for (const synset of lexicon.synsets) {
    claim(synset.id);
    synsetPos.set(synset.id, synset.partOfSpeech);
  }
  const senseIds = new Set<string>();
  for (const entry of lexicon.entries) {
    claim(entry.id);
    for (const sense of entry.senses) {
      claim(sense.id);
      senseIds.add(sense.id);
    }
  }

  for (const entry of lexicon.entries) {
    if (entry.senses.length === 0) {
      complain("error", "entry-without-senses", entry.id, `Entry ${entry.id} has no senses`);
    }
    for (const sense of entry.senses) {
      const pos = synsetPos.get(sense.synset);
      if (pos === undefined) {
        complain("error", "dangling-sense-synset", sense.id, `Sense ${sense.id} points at missing synset ${sense.synset}`);
      } else if (!compatiblePos(entry.lemma.partOfSpeech, pos)) {
        complain(
          "warning",
          "pos-mismatch",
          sense.id,
          `Sense ${sense.id} links a '${entry.lemma.partOfSpeech}' entry to a '${pos}' synset`
        );
      }
      for (const relation of sense.relations) {
        if (!senseIds.has(relation.target) && !synsetPos.has(relation.target)) {
          complain("error", "unresolved-relation-target", sense.id, `Sense relation ${sense.id} -> ${relation.target} has no target`);
        }
        if (relation.target === sense.id) {
          complain("warning", "self-relation", sense.id, `Sense ${sense.id} relates to itself (${relation.relType})`);
        }
        if (!vocabulary.senseRelations.has(relation.relType)) {
          complain("warning", "unknown-relation-type", sense.id, `Unknown sense relation type '${relation.relType}'`);
        }
      }
    }
  }

  for (const synset of lexicon.synsets) {
    for (const relation of synset.relations) {
      if (!synsetPos.has(relation.target)) {
        complain("error", "unresolved-relation-target", synset.id, `Synset relation ${synset.id} -> ${relation.target} has no target`);
      }
      if (relation.target === synset.id) {
        complain("warning", "self-relation", synset.id, `Synset ${synset.id} relates to itself (${relation.relType})`);
      }
      if (!vocabulary.synsetRelations.has(relation.relType)) {
        complain("warning", "unknown-relation-type", synset.id, `Unknown synset relation type '${relation.relType}'`);
      }
    }
  }

  return complaints;
};

export const hasErrors = (complaints: Complaint[]) => complaints.some((complaint) => complaint.severity === "error");
