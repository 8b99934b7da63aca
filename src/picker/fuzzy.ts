import type { Peer } from "../peers/types.js";

export type FuzzyMatch = {
  matches: boolean;
  /** Higher is better. Only comparable between matches of the same query. */
  score: number;
  /** Indices into the text of each matched query character. */
  positions: number[];
};

export type FuzzyResult<T> = {
  item: T;
  score: number;
  positions: number[];
};

const SCORE_CHAR = 16;
const BONUS_CONSECUTIVE = 24;
const BONUS_WORD_START = 12;
const PENALTY_GAP = 1;
const PENALTY_LEADING = 2;
const MAX_LEADING_PENALTY = 128;

const NO_MATCH: FuzzyMatch = { matches: false, score: 0, positions: [] };
const SEPARATORS = new Set(["-", "_", ".", " ", "/", ":", "@"]);

function isLower(ch: string): boolean {
  return ch >= "a" && ch <= "z";
}

function isUpper(ch: string): boolean {
  return ch >= "A" && ch <= "Z";
}

function isDigit(ch: string): boolean {
  return ch >= "0" && ch <= "9";
}

/** Start of the text, after a separator, at a camelCase hump or where digits begin. */
export function isWordStart(text: string, index: number): boolean {
  if (index === 0) {
    return true;
  }
  const prev = text.charAt(index - 1);
  const cur = text.charAt(index);
  if (SEPARATORS.has(prev)) {
    return true;
  }
  if (isLower(prev) && isUpper(cur)) {
    return true;
  }
  return (isLower(prev) || isUpper(prev)) && isDigit(cur);
}

function charScore(text: string, index: number): number {
  return SCORE_CHAR + (isWordStart(text, index) ? BONUS_WORD_START : 0);
}

function leadingPenalty(first: number): number {
  return Math.min(first * PENALTY_LEADING, MAX_LEADING_PENALTY);
}

function linkScore(prev: number, pos: number): number {
  const gap = pos - prev - 1;
  return gap === 0 ? BONUS_CONSECUTIVE : -gap * PENALTY_GAP;
}

/**
 * Case-insensitive subsequence match scored on its best alignment. Every way
 * of placing the query in the text is considered, so a contiguous run later
 * in the text beats a scattered match earlier on. On equal scores the
 * earliest placement wins.
 */
export function fuzzyMatch(query: string, text: string): FuzzyMatch {
  if (query.length === 0) {
    return { matches: true, score: 0, positions: [] };
  }
  const q = query.toLowerCase();
  const t = text.toLowerCase();
  if (q.length > t.length) {
    return NO_MATCH;
  }

  // best[i][j]: top score with query[i] matched at text[j]; from[i][j] is the
  // text position of query[i - 1] on that alignment.
  const best: Array<Array<number | undefined>> = [];
  const from: number[][] = [];
  for (let i = 0; i < q.length; i++) {
    const row = new Array<number | undefined>(t.length).fill(undefined);
    const links = new Array<number>(t.length).fill(-1);
    const prevRow = best[i - 1];
    for (let j = i; j < t.length; j++) {
      if (t.charAt(j) !== q.charAt(i)) {
        continue;
      }
      if (!prevRow) {
        row[j] = charScore(text, j) - leadingPenalty(j);
        continue;
      }
      let top: number | undefined;
      for (let k = i - 1; k < j; k++) {
        const prev = prevRow[k];
        if (prev === undefined) {
          continue;
        }
        const candidate = prev + linkScore(k, j);
        if (top === undefined || candidate > top) {
          top = candidate;
          links[j] = k;
        }
      }
      if (top !== undefined) {
        row[j] = top + charScore(text, j);
      }
    }
    best.push(row);
    from.push(links);
  }

  const last = best[q.length - 1] ?? [];
  let end = -1;
  let score = 0;
  last.forEach((value, j) => {
    if (value !== undefined && (end === -1 || value > score)) {
      end = j;
      score = value;
    }
  });
  if (end === -1) {
    return NO_MATCH;
  }
  const positions: number[] = [];
  for (let i = q.length - 1, pos = end; i >= 0; i--) {
    positions.unshift(pos);
    pos = from[i]?.[pos] ?? -1;
  }
  return { matches: true, score, positions };
}

/**
 * Keep the items whose text matches `query`, best first. Equal scores keep
 * their input order; an empty query returns every item in input order.
 */
export function fuzzyFilter<T>(
  items: readonly T[],
  query: string,
  getText: (item: T) => string,
): FuzzyResult<T>[] {
  const results: Array<FuzzyResult<T> & { index: number }> = [];
  items.forEach((item, index) => {
    const match = fuzzyMatch(query, getText(item));
    if (match.matches) {
      results.push({ item, score: match.score, positions: match.positions, index });
    }
  });
  results.sort((a, b) => b.score - a.score || a.index - b.index);
  return results.map(({ item, score, positions }) => ({ item, score, positions }));
}

export function matchPeers(query: string, peers: readonly Peer[]): FuzzyResult<Peer>[] {
  return fuzzyFilter(peers, query, (peer) => peer.hostname);
}
