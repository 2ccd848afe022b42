import { RelationKind, ValidationWarning } from "../types";
import { relationTypesFor, Vocabulary } from "./vocabulary";

export type RelationOutcome = "known" | "unknown";

export const classifyRelation = (relType: string, vocabulary: ReadonlySet<string>): RelationOutcome =>
  vocabulary.has(relType) ? "known" : "unknown";

// Classifies only; the caller attaches the relation either way.
export const checkRelation = (
  relationKind: RelationKind,
  source: string,
  target: string,
  relType: string,
  vocabulary: Vocabulary
): ValidationWarning | undefined => {
  if (classifyRelation(relType, relationTypesFor(vocabulary, relationKind)) === "known") return undefined;
  return {
    kind: "unknown-relation-type",
    relationKind,
    source,
    target,
    relType,
    message: `Unknown ${relationKind} relation type '${relType}' (${source} -> ${target})`
  };
};
