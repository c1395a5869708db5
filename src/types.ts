export type KnownOsKind = "windows" | "macos" | "linux" | "freebsd";
export type OsKind = KnownOsKind | "unknown";

export type KnownArchKind = "x64" | "arm64" | "armhf" | "x86";
export type ArchKind = KnownArchKind | "unknown";

export interface PlatformIdentity {
  readonly os: OsKind;
  readonly arch: ArchKind;
}

export interface TokenSet {
  os: ReadonlySet<KnownOsKind>;
  arch: ReadonlySet<KnownArchKind>;
  auxiliary: boolean;
}

export interface ScoredCandidate {
  name: string;
  score: number;
  auxiliary: boolean;
  tokens: TokenSet;
}

export interface Vocabulary {
  os: Record<KnownOsKind, string[]>;
  osSuffixes: Record<KnownOsKind, string[]>;
  arch: Record<KnownArchKind, string[]>;
  auxiliarySuffixes: string[];
}

export interface VocabularyExtension {
  os?: Partial<Record<KnownOsKind, string[]>>;
  osSuffixes?: Partial<Record<KnownOsKind, string[]>>;
  arch?: Partial<Record<KnownArchKind, string[]>>;
  auxiliarySuffixes?: string[];
}

export interface SelectOptions {
  /** Explicit target; the host platform is detected when omitted. */
  platform?: PlatformIdentity;
  /** Extra aliases merged onto the built-in tables. */
  vocabulary?: VocabularyExtension;
}

export type CandidateVerdict = "match" | "os_mismatch" | "arch_mismatch" | "no_tokens";

export interface CandidateExplanation {
  name: string;
  os: KnownOsKind[];
  arch: KnownArchKind[];
  auxiliary: boolean;
  verdict: CandidateVerdict;
}

export interface SelectionExplanation {
  platform: PlatformIdentity;
  selected: string[];
  candidates: CandidateExplanation[];
}

export const KNOWN_OS_KINDS: readonly KnownOsKind[] = ["windows", "macos", "linux", "freebsd"];
export const KNOWN_ARCH_KINDS: readonly KnownArchKind[] = ["x64", "arm64", "armhf", "x86"];
