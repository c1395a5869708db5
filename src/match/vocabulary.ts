import { KnownArchKind, KnownOsKind, Vocabulary, VocabularyExtension } from "../types";

// Every canonical kind name must stay listed as its own alias so that a
// PlatformIdentity normalizes to the same tokens as a candidate naming it.
export const DEFAULT_VOCABULARY: Vocabulary = {
  os: {
    windows: ["windows", "win32", "win64"],
    macos: ["macos", "macosx", "darwin", "osx"],
    linux: ["linux"],
    freebsd: ["freebsd"]
  },
  osSuffixes: {
    windows: [".exe", ".msi"],
    macos: [],
    linux: [],
    freebsd: []
  },
  arch: {
    x64: ["x64", "x86_64", "amd64"],
    arm64: ["arm64", "aarch64", "armv8"],
    armhf: ["armhf", "armv7", "armv7l", "armv7hl", "arm"],
    x86: ["x86", "i386", "i686", "386"]
  },
  auxiliarySuffixes: [
    ".debug",
    ".dwarf",
    ".pdb",
    ".dll",
    ".dsym",
    ".sha256",
    ".sha256sum",
    ".sha512",
    ".sha",
    ".md5",
    ".checksum",
    ".asc",
    ".sig",
    ".sbom",
    ".txt"
  ]
};

/**
 * Adds the extension's entries to `base`. Aliases are lowercased and trimmed;
 * entries already present are not repeated and base entries are never removed.
 */
export function mergeVocabulary(base: Vocabulary, extension: VocabularyExtension): Vocabulary {
  return {
    os: osTable((kind) => mergeList(base.os[kind], extension.os?.[kind])),
    osSuffixes: osTable((kind) => mergeList(base.osSuffixes[kind], extension.osSuffixes?.[kind])),
    arch: archTable((kind) => mergeList(base.arch[kind], extension.arch?.[kind])),
    auxiliarySuffixes: mergeList(base.auxiliarySuffixes, extension.auxiliarySuffixes)
  };
}

export function osTable(pick: (kind: KnownOsKind) => string[]): Record<KnownOsKind, string[]> {
  return {
    windows: pick("windows"),
    macos: pick("macos"),
    linux: pick("linux"),
    freebsd: pick("freebsd")
  };
}

export function archTable(pick: (kind: KnownArchKind) => string[]): Record<KnownArchKind, string[]> {
  return {
    x64: pick("x64"),
    arm64: pick("arm64"),
    armhf: pick("armhf"),
    x86: pick("x86")
  };
}

function mergeList(base: string[], extra: string[] | undefined): string[] {
  const out: string[] = [];
  for (const raw of [...base, ...(extra ?? [])]) {
    const alias = raw.trim().toLowerCase();
    if (alias && !out.includes(alias)) {
      out.push(alias);
    }
  }
  return out;
}
