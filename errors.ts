
export type ErrorKind =
  | "NotFound"
  | "InvalidShape"
  | "AmbiguousMatch"
  | "SchemaMismatch"
  | "MissingInterface"
  | "BackingStore";

export type RecordKind = "lexicon" | "entry" | "sense" | "synset";

export abstract class EditorError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class NotFoundError extends EditorError {
  readonly kind = "NotFound";

  constructor(readonly recordKind: RecordKind, readonly id: string, role?: string) {
    super(`${role ? `${role} ` : ""}${recordKind} not found: ${id}`);
  }
}

export class InvalidShapeError extends EditorError {
  readonly kind = "InvalidShape";

  constructor(message: string, readonly field?: string) {
    super(message);
  }
}

export class AmbiguousMatchError extends EditorError {
  readonly kind = "AmbiguousMatch";

  constructor(readonly lemma: string, readonly candidates: string[], message?: string) {
    super(message ?? `Lemma '${lemma}' matches ${candidates.length} entries (${candidates.join(", ")}); pass a part of speech`);
  }
}

/** The store's physical schema differs from what the bulk queries expect. */
export class SchemaMismatchError extends EditorError {
  readonly kind = "SchemaMismatch";
}

/** The store lacks a capability the caller needs, e.g. direct query access. */
export class MissingInterfaceError extends EditorError {
  readonly kind = "MissingInterface";

  constructor(readonly capability: string) {
    super(`Backing store does not provide ${capability}`);
  }
}

export class BackingStoreError extends EditorError {
  readonly kind = "BackingStore";
}

export const isEditorError = (err: unknown): err is EditorError => err instanceof EditorError;
