export type MarkerPosition = "anywhere" | "start" | "end";
export type MarkerCombination = "any" | "all";

export interface MarkerQuery {
  markers: readonly string[];
  position?: MarkerPosition;
  combination?: MarkerCombination;
  caseSensitive?: boolean;
}

export function filterByMarkers(candidates: readonly string[], query: MarkerQuery): string[] {
  const test = compileQuery(query);
  return candidates.filter(test);
}

/**
 * Moves the candidates that satisfy `query` to the front. Order within each
 * group is kept.
 */
export function preferMarkers(candidates: readonly string[], query: MarkerQuery): string[] {
  const test = compileQuery(query);
  const preferred: string[] = [];
  const rest: string[] = [];
  for (const candidate of candidates) {
    (test(candidate) ? preferred : rest).push(candidate);
  }
  return [...preferred, ...rest];
}

export function matchesMarkers(candidate: string, query: MarkerQuery): boolean {
  return compileQuery(query)(candidate);
}

function compileQuery(query: MarkerQuery): (candidate: string) => boolean {
  const caseSensitive = query.caseSensitive ?? false;
  const fold = (value: string): string => (caseSensitive ? value : value.toLowerCase());
  const markers = query.markers.map(fold);
  const position = query.position ?? "anywhere";
  const combination = query.combination ?? "any";

  return (candidate) => {
    const subject = fold(candidate);
    const hit = (marker: string): boolean => matchAt(subject, marker, position);
    return combination === "all" ? markers.every(hit) : markers.some(hit);
  };
}

function matchAt(subject: string, marker: string, position: MarkerPosition): boolean {
  switch (position) {
    case "start":
      return subject.startsWith(marker);
    case "end":
      return subject.endsWith(marker);
    case "anywhere":
      return subject.includes(marker);
  }
}
