import { InvalidShapeError } from "../errors";
import { LexiconMetadata } from "../types";
import { DEFAULT_LMF_VERSION } from "./records";

export type MetadataField = keyof LexiconMetadata;

export type MetadataSource = "override" | "loaded" | "default";

export interface MetadataOverrides extends Partial<LexiconMetadata> {
  /** LMF version to write on export. */
  lmfVersion?: string;
}

export interface LoadedMetadata extends Partial<LexiconMetadata> {
  /** LMF version the source was read with. */
  lmfVersion?: string;
}

export interface MetadataDefaults {
  language: string;
  email: string;
  license: string;
  version: string;
  lmfVersion: string;
}

export const DEFAULT_METADATA: MetadataDefaults = {
  language: "en",
  email: "user@example.com",
  license: "https://creativecommons.org/licenses/by/4.0/",
  version: "1.0",
  lmfVersion: DEFAULT_LMF_VERSION
};

export interface NegotiatedMetadata {
  lexicon: LexiconMetadata;
  readLmfVersion: string;
  writeLmfVersion: string;
  sources: Record<MetadataField | "lmfVersion", MetadataSource>;
}

const FIELDS: MetadataField[] = ["id", "label", "language", "email", "license", "version", "url", "citation"];

const present = (value: string | undefined): value is string => value !== undefined && value !== "";

/**
 * Resolves each metadata field independently: an explicit override wins over
 * the value read from the source, which wins over the built-in default.
 *
 * The LMF version seen on input and the one to write are kept apart; the
 * write version follows the read version unless overridden.
 */
export const negotiateMetadata = (
  loaded: LoadedMetadata | undefined,
  overrides: MetadataOverrides = {},
  defaults: MetadataDefaults = DEFAULT_METADATA
): NegotiatedMetadata => {
  const sources: Partial<Record<MetadataField | "lmfVersion", MetadataSource>> = {};
  const fallback: Partial<LexiconMetadata> = {
    language: defaults.language,
    email: defaults.email,
    license: defaults.license,
    version: defaults.version
  };

  const resolved: Partial<LexiconMetadata> = {};
  for (const field of FIELDS) {
    const override = overrides[field];
    const fromSource = loaded?.[field];
    if (present(override)) {
      resolved[field] = override;
      sources[field] = "override";
    } else if (present(fromSource)) {
      resolved[field] = fromSource;
      sources[field] = "loaded";
    } else if (field === "label" && present(resolved.id)) {
      resolved.label = resolved.id;
      sources.label = "default";
    } else {
      const value = fallback[field];
      if (present(value)) resolved[field] = value;
      sources[field] = "default";
    }
  }

  const loadedLmfVersion = loaded?.lmfVersion;
  const overrideLmfVersion = overrides.lmfVersion;
  const readLmfVersion = present(loadedLmfVersion) ? loadedLmfVersion : defaults.lmfVersion;
  const writeLmfVersion = present(overrideLmfVersion) ? overrideLmfVersion : readLmfVersion;
  sources.lmfVersion = present(overrideLmfVersion) ? "override" : present(loadedLmfVersion) ? "loaded" : "default";

  const { id, label, language, email, license, version, url, citation } = resolved;
  if (!present(id)) {
    throw new InvalidShapeError("lexiconId is required when creating a new lexicon", "id");
  }
  if (!present(label) || !present(language) || !present(email) || !present(license) || !present(version)) {
    throw new InvalidShapeError(`Incomplete metadata for lexicon ${id}`, "metadata");
  }

  const lexicon: LexiconMetadata = { id, label, language, email, license, version };
  if (present(url)) lexicon.url = url;
  if (present(citation)) lexicon.citation = citation;

  return {
    lexicon,
    readLmfVersion,
    writeLmfVersion,
    sources: {
      id: sources.id ?? "default",
      label: sources.label ?? "default",
      language: sources.language ?? "default",
      email: sources.email ?? "default",
      license: sources.license ?? "default",
      version: sources.version ?? "default",
      url: sources.url ?? "default",
      citation: sources.citation ?? "default",
      lmfVersion: sources.lmfVersion ?? "default"
    }
  };
};
