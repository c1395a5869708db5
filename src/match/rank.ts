import { CandidateVerdict, PlatformIdentity, ScoredCandidate, TokenSet } from "../types";
import { CompiledVocabulary, PlatformTokens, compareCodeUnits, extractTokens, platformTokens } from "./normalize";

export const PRIMARY_SCORE = 1;
export const AUXILIARY_SCORE = 0;

export interface AnnotatedCandidate extends ScoredCandidate {
  verdict: CandidateVerdict;
}

export function scoreCandidates(
  candidates: readonly string[],
  identity: PlatformIdentity,
  compiled: CompiledVocabulary
): AnnotatedCandidate[] {
  const target = platformTokens(identity, compiled);

  return candidates.map((name) => {
    const tokens = extractTokens(name, compiled);
    return {
      name,
      score: tokens.auxiliary ? AUXILIARY_SCORE : PRIMARY_SCORE,
      auxiliary: tokens.auxiliary,
      tokens,
      verdict: judge(tokens, target)
    };
  });
}

/**
 * Returns the candidates built for `identity`, best first. A candidate must
 * carry both the target OS token and the target arch token; partial matches
 * are dropped rather than ranked low.
 */
export function rankCandidates(
  candidates: readonly string[],
  identity: PlatformIdentity,
  compiled: CompiledVocabulary
): ScoredCandidate[] {
  return scoreCandidates(candidates, identity, compiled)
    .filter((candidate) => candidate.verdict === "match")
    .sort(compareScored);
}

/** Score descending, then shorter name, then code-unit order. */
export function compareScored(a: ScoredCandidate, b: ScoredCandidate): number {
  return b.score - a.score || a.name.length - b.name.length || compareCodeUnits(a.name, b.name);
}

function judge(tokens: TokenSet, target: PlatformTokens): CandidateVerdict {
  if (tokens.os.size === 0 && tokens.arch.size === 0) {
    return "no_tokens";
  }
  if (target.os === undefined || !tokens.os.has(target.os)) {
    return "os_mismatch";
  }
  if (target.arch === undefined || !tokens.arch.has(target.arch)) {
    return "arch_mismatch";
  }
  return "match";
}
