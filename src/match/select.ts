import { PlatformIdentity, SelectOptions, SelectionExplanation } from "../types";
import { detectHostPlatform } from "../util/platform";
import { CompiledVocabulary, compileVocabulary } from "./normalize";
import { compareScored, rankCandidates, scoreCandidates } from "./rank";
import { DEFAULT_VOCABULARY, mergeVocabulary } from "./vocabulary";

const defaultCompiled = compileVocabulary(DEFAULT_VOCABULARY);

/**
 * Picks the candidate names built for the target platform, best match first.
 *
 * The host platform is detected once per call unless `options.platform` is
 * given. An empty array means no compatible candidate; it is not an error.
 * The input array is left untouched.
 */
export function select(candidates: readonly string[], options: SelectOptions = {}): string[] {
  const identity = resolveIdentity(options);
  return rankCandidates(candidates, identity, resolveCompiled(options)).map((candidate) => candidate.name);
}

export function explainSelection(candidates: readonly string[], options: SelectOptions = {}): SelectionExplanation {
  const identity = resolveIdentity(options);
  const compiled = resolveCompiled(options);

  const scored = scoreCandidates(candidates, identity, compiled);

  return {
    platform: identity,
    selected: scored
      .filter((candidate) => candidate.verdict === "match")
      .sort(compareScored)
      .map((candidate) => candidate.name),
    candidates: scored.map((candidate) => ({
      name: candidate.name,
      os: [...candidate.tokens.os],
      arch: [...candidate.tokens.arch],
      auxiliary: candidate.auxiliary,
      verdict: candidate.verdict
    }))
  };
}

function resolveIdentity(options: SelectOptions): PlatformIdentity {
  return options.platform ?? detectHostPlatform();
}

function resolveCompiled(options: SelectOptions): CompiledVocabulary {
  if (!options.vocabulary) {
    return defaultCompiled;
  }
  return compileVocabulary(mergeVocabulary(DEFAULT_VOCABULARY, options.vocabulary));
}
