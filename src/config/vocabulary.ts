import { readFile } from "node:fs/promises";
import Ajv2020, { type SchemaObject } from "ajv/dist/2020";
import { load } from "js-yaml";
import { DEFAULT_VOCABULARY, mergeVocabulary } from "../match/vocabulary";
import { KNOWN_ARCH_KINDS, KNOWN_OS_KINDS, KnownArchKind, KnownOsKind, Vocabulary, VocabularyExtension } from "../types";
import { ArchpickError } from "../util/errors";
import { vocabularyPath, vocabularyYamlPath } from "../util/paths";

export interface VocabularyFileV1 {
  version: "v1";
  os?: Partial<Record<KnownOsKind, string[]>>;
  os_suffixes?: Partial<Record<KnownOsKind, string[]>>;
  arch?: Partial<Record<KnownArchKind, string[]>>;
  auxiliary_suffixes?: string[];
}

const ajv = new Ajv2020({ allErrors: true, strict: false });

const aliasList = {
  type: "array",
  items: { type: "string", minLength: 1 }
};

const vocabularyFileSchema: SchemaObject = {
  $schema: "https://json-schema.org/draft/2020-12/schema",
  type: "object",
  additionalProperties: false,
  required: ["version"],
  properties: {
    version: { const: "v1" },
    os: kindTableSchema(KNOWN_OS_KINDS),
    os_suffixes: kindTableSchema(KNOWN_OS_KINDS),
    arch: kindTableSchema(KNOWN_ARCH_KINDS),
    auxiliary_suffixes: aliasList
  }
};

const validateVocabularyFile = ajv.compile<VocabularyFileV1>(vocabularyFileSchema);

/**
 * Resolves the vocabulary for a run. An explicit path must exist; without
 * one, ~/.archpick/vocabulary.json or else ~/.archpick/vocabulary.yaml is
 * used when present.
 */
export async function loadVocabulary(explicitPath?: string): Promise<Vocabulary> {
  if (explicitPath !== undefined) {
    return parseVocabularyFile(explicitPath);
  }

  for (const filePath of [vocabularyPath(), vocabularyYamlPath()]) {
    const raw = await readVocabularyFile(filePath, true);
    if (raw !== null) {
      return buildVocabulary(parseVocabulary(parseVocabularyText(raw, filePath)));
    }
  }
  return DEFAULT_VOCABULARY;
}

export async function parseVocabularyFile(filePath: string): Promise<Vocabulary> {
  const raw = await readVocabularyFile(filePath, false);
  return buildVocabulary(parseVocabulary(parseVocabularyText(raw, filePath)));
}

export function parseVocabulary(raw: unknown): VocabularyExtension {
  if (!validateVocabularyFile(raw)) {
    const messages = (validateVocabularyFile.errors ?? [])
      .map((e) => `${e.instancePath || "/"} ${e.message}`.trim())
      .join("; ");
    throw invalidVocabulary(messages);
  }

  return {
    os: raw.os,
    osSuffixes: raw.os_suffixes,
    arch: raw.arch,
    auxiliarySuffixes: raw.auxiliary_suffixes
  };
}

/** Merges `extension` onto the defaults and rejects aliases claimed by two kinds. */
export function buildVocabulary(extension: VocabularyExtension): Vocabulary {
  const vocabulary = mergeVocabulary(DEFAULT_VOCABULARY, extension);

  const owners = new Map<string, string>();
  const claim = (alias: string, owner: string): void => {
    const existing = owners.get(alias);
    if (existing !== undefined && existing !== owner) {
      throw invalidVocabulary(`alias '${alias}' is listed under both ${existing} and ${owner}`);
    }
    owners.set(alias, owner);
  };

  for (const kind of KNOWN_OS_KINDS) {
    for (const alias of vocabulary.os[kind]) {
      claim(alias, `os.${kind}`);
    }
  }
  for (const kind of KNOWN_ARCH_KINDS) {
    for (const alias of vocabulary.arch[kind]) {
      claim(alias, `arch.${kind}`);
    }
  }

  return vocabulary;
}

function kindTableSchema(kinds: readonly string[]): SchemaObject {
  return {
    type: "object",
    additionalProperties: false,
    properties: Object.fromEntries(kinds.map((kind) => [kind, aliasList]))
  };
}

function readVocabularyFile(filePath: string, allowMissing: true): Promise<string | null>;
function readVocabularyFile(filePath: string, allowMissing: false): Promise<string>;
async function readVocabularyFile(filePath: string, allowMissing: boolean): Promise<string | null> {
  try {
    return await readFile(filePath, "utf8");
  } catch (error) {
    const nodeError = error as NodeJS.ErrnoException;
    if (allowMissing && nodeError.code === "ENOENT") {
      return null;
    }
    throw invalidVocabulary(`failed to read ${filePath}: ${(error as Error).message}`);
  }
}

function parseVocabularyText(raw: string, filePath: string): unknown {
  if (/\.ya?ml$/i.test(filePath)) {
    try {
      return load(raw);
    } catch (error) {
      throw invalidVocabulary(`failed to parse YAML: ${(error as Error).message}`);
    }
  }

  try {
    return JSON.parse(raw) as unknown;
  } catch (error) {
    throw invalidVocabulary(`failed to parse JSON: ${(error as Error).message}`);
  }
}

function invalidVocabulary(message: string): ArchpickError {
  return new ArchpickError(`invalid vocabulary: ${message}`);
}
