import { compileVocabulary, extractTokens } from "../match/normalize";
import { DEFAULT_VOCABULARY } from "../match/vocabulary";
import { ArchKind, OsKind, PlatformIdentity, Vocabulary } from "../types";
import { ArchpickError } from "./errors";

const NODE_OS: Record<string, OsKind> = {
  win32: "windows",
  darwin: "macos",
  linux: "linux",
  // Android binaries are published under linux names.
  android: "linux",
  freebsd: "freebsd"
};

const NODE_ARCH: Record<string, ArchKind> = {
  x64: "x64",
  arm64: "arm64",
  arm: "armhf",
  ia32: "x86"
};

export function detectHostPlatform(): PlatformIdentity {
  return platformFromNode(process.platform, process.arch);
}

export function platformFromNode(platform: string, arch: string): PlatformIdentity {
  return {
    os: NODE_OS[platform] ?? "unknown",
    arch: NODE_ARCH[arch] ?? "unknown"
  };
}

export function formatPlatform(identity: PlatformIdentity): string {
  return `${identity.os}/${identity.arch}`;
}

/**
 * Parses an `os/arch` override such as `darwin/aarch64`. Either side may use
 * any alias the vocabulary knows.
 */
export function parsePlatform(text: string, vocabulary: Vocabulary = DEFAULT_VOCABULARY): PlatformIdentity {
  const trimmed = text.trim();
  const parts = trimmed.split("/");
  if (parts.length !== 2) {
    throw new ArchpickError(`platform must be in <os>/<arch> form, got '${trimmed}'`);
  }

  return {
    os: parseOs(parts[0], vocabulary),
    arch: parseArch(parts[1], vocabulary)
  };
}

export function parseOs(text: string, vocabulary: Vocabulary = DEFAULT_VOCABULARY): OsKind {
  const tokens = extractTokens(text.trim(), compileVocabulary(vocabulary));
  const [os, ...rest] = [...tokens.os];
  if (os === undefined || rest.length > 0 || tokens.arch.size > 0) {
    throw new ArchpickError(`unrecognized os '${text.trim()}'`);
  }
  return os;
}

export function parseArch(text: string, vocabulary: Vocabulary = DEFAULT_VOCABULARY): ArchKind {
  const tokens = extractTokens(text.trim(), compileVocabulary(vocabulary));
  const [arch, ...rest] = [...tokens.arch];
  if (arch === undefined || rest.length > 0 || tokens.os.size > 0) {
    throw new ArchpickError(`unrecognized arch '${text.trim()}'`);
  }
  return arch;
}
