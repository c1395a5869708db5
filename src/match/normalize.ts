import {
  KNOWN_ARCH_KINDS,
  KNOWN_OS_KINDS,
  KnownArchKind,
  KnownOsKind,
  PlatformIdentity,
  TokenSet,
  Vocabulary
} from "../types";

type CompiledAlias =
  | { text: string; kind: "os"; token: KnownOsKind }
  | { text: string; kind: "arch"; token: KnownArchKind };

export interface CompiledVocabulary {
  /** Substring aliases, longest first. */
  aliases: CompiledAlias[];
  osSuffixes: Array<{ text: string; token: KnownOsKind }>;
  auxiliarySuffixes: string[];
}

export interface PlatformTokens {
  os?: KnownOsKind;
  arch?: KnownArchKind;
}

export function compileVocabulary(vocabulary: Vocabulary): CompiledVocabulary {
  const aliases: CompiledAlias[] = [];
  const seen = new Set<string>();

  for (const token of KNOWN_OS_KINDS) {
    for (const text of cleanAliases(vocabulary.os[token])) {
      if (!seen.has(text)) {
        seen.add(text);
        aliases.push({ text, kind: "os", token });
      }
    }
  }
  for (const token of KNOWN_ARCH_KINDS) {
    for (const text of cleanAliases(vocabulary.arch[token])) {
      if (!seen.has(text)) {
        seen.add(text);
        aliases.push({ text, kind: "arch", token });
      }
    }
  }

  aliases.sort((a, b) => b.text.length - a.text.length || compareCodeUnits(a.text, b.text));

  const osSuffixes: CompiledVocabulary["osSuffixes"] = [];
  for (const token of KNOWN_OS_KINDS) {
    for (const text of cleanAliases(vocabulary.osSuffixes[token])) {
      osSuffixes.push({ text, token });
    }
  }

  return {
    aliases,
    osSuffixes,
    auxiliarySuffixes: cleanAliases(vocabulary.auxiliarySuffixes)
  };
}

/**
 * Finds every canonical token named in `name`.
 *
 * Aliases are tried longest first and each occurrence claims its character
 * range, so a shorter alias inside an already claimed range is ignored
 * ("x86_64" does not also count as "x86", "arm64" not as "arm").
 *
 * An occurrence only yields a token at a word boundary: no letter or digit
 * before it, no letter after it, and not part of a dotted version number.
 * "charm" carries no arch and "1.386.0" is not x86. An occurrence that fails
 * the boundary still claims its range.
 */
export function extractTokens(name: string, compiled: CompiledVocabulary): TokenSet {
  const lowered = name.toLowerCase();
  const os = new Set<KnownOsKind>();
  const arch = new Set<KnownArchKind>();
  const claimed: Array<[number, number]> = [];

  for (const alias of compiled.aliases) {
    let from = 0;
    for (;;) {
      const start = lowered.indexOf(alias.text, from);
      if (start === -1) {
        break;
      }
      const end = start + alias.text.length;
      from = start + 1;

      if (claimed.some(([claimedStart, claimedEnd]) => start < claimedEnd && claimedStart < end)) {
        continue;
      }
      claimed.push([start, end]);
      if (!atTokenBoundary(lowered, start, end)) {
        continue;
      }

      if (alias.kind === "os") {
        os.add(alias.token);
      } else {
        arch.add(alias.token);
      }
    }
  }

  for (const suffix of compiled.osSuffixes) {
    if (lowered.endsWith(suffix.text)) {
      os.add(suffix.token);
    }
  }

  const auxiliary = compiled.auxiliarySuffixes.some((suffix) => lowered.endsWith(suffix));

  return { os, arch, auxiliary };
}

/** Normalizes the identity's canonical names through the same alias tables as candidates. */
export function platformTokens(identity: PlatformIdentity, compiled: CompiledVocabulary): PlatformTokens {
  const out: PlatformTokens = {};
  if (identity.os !== "unknown") {
    out.os = firstOf(extractTokens(identity.os, compiled).os);
  }
  if (identity.arch !== "unknown") {
    out.arch = firstOf(extractTokens(identity.arch, compiled).arch);
  }
  return out;
}

export function compareCodeUnits(a: string, b: string): number {
  if (a < b) {
    return -1;
  }
  if (a > b) {
    return 1;
  }
  return 0;
}

function atTokenBoundary(text: string, start: number, end: number): boolean {
  const before = text.charAt(start - 1);
  const after = text.charAt(end);
  if (/[a-z0-9]/.test(before) || /[a-z]/.test(after)) {
    return false;
  }
  if (before === "." && /[0-9]/.test(text.charAt(start - 2))) {
    return false;
  }
  return !(after === "." && /[0-9]/.test(text.charAt(end + 1)));
}

function firstOf<T>(values: ReadonlySet<T>): T | undefined {
  for (const value of values) {
    return value;
  }
  return undefined;
}

function cleanAliases(values: readonly string[]): string[] {
  return values.map((value) => value.trim().toLowerCase()).filter((value) => value.length > 0);
}
