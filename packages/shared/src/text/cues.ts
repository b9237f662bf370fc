/**
 * Lexical Cue Matching
 *
 * Cues match on word boundaries, case-insensitively, with an optional plural "s".
 */

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function compileCues(cues: readonly string[]): RegExp[] {
  return cues.map((cue) => new RegExp(`\\b${escapeRegExp(cue)}s?\\b`, 'gi'));
}

export function countCueMatches(text: string, patterns: readonly RegExp[]): number {
  let hits = 0;
  for (const pattern of patterns) {
    hits += text.match(pattern)?.length ?? 0;
  }
  return hits;
}

export function hasCue(text: string, patterns: readonly RegExp[]): boolean {
  return countCueMatches(text, patterns) > 0;
}
