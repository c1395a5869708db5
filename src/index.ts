export { select, explainSelection } from "./match/select";
export { rankCandidates, scoreCandidates, compareScored } from "./match/rank";
export { compileVocabulary, extractTokens, platformTokens } from "./match/normalize";
export type { CompiledVocabulary, PlatformTokens } from "./match/normalize";
export { DEFAULT_VOCABULARY, mergeVocabulary } from "./match/vocabulary";
export { filterByMarkers, matchesMarkers, preferMarkers } from "./match/markers";
export type { MarkerCombination, MarkerPosition, MarkerQuery } from "./match/markers";
export { detectHostPlatform, formatPlatform, parseArch, parseOs, parsePlatform, platformFromNode } from "./util/platform";
export { loadVocabulary, parseVocabulary, parseVocabularyFile } from "./config/vocabulary";
export { ArchpickError } from "./util/errors";
export * from "./types";
