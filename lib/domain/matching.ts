// Fuzzy name resolution for spoken references ("the oil filters", "Sharma job").
// Names are compared on normalized words: lowercase, punctuation dropped, whitespace collapsed.

export const MATCH_SCORES = {
  exact: 1,
  singularExact: 0.9,
  containment: 0.6,
} as const;

export function normalizeName(value: string) {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, " ")
    .trim()
    .replace(/\s+/g, " ");
}

export function singularizeWord(word: string) {
  if (word.length <= 3) return word;
  if (word.endsWith("ies")) return `${word.slice(0, -3)}y`;
  if (/(sses|shes|ches|xes|zes)$/.test(word)) return word.slice(0, -2);
  if (/(ss|us|is)$/.test(word)) return word;
  if (word.endsWith("s")) return word.slice(0, -1);
  return word;
}

function singularWords(value: string) {
  const normalized = normalizeName(value);
  return normalized ? normalized.split(" ").map(singularizeWord) : [];
}

// Distinct words worth sending to a storage-side substring prefilter. Each spoken word
// is kept next to its singular form: "battery" is not a substring of "Batteries".
export function searchTokens(hint: string) {
  const normalized = normalizeName(hint);
  const words = normalized ? normalized.split(" ") : [];
  const tokens = words.flatMap((word) => [word, singularizeWord(word)]);
  return Array.from(new Set(tokens.filter((word) => word.length >= 2)));
}

function containsSequence(haystack: string[], needle: string[]) {
  if (!needle.length || needle.length > haystack.length) {
    return false;
  }
  for (let start = 0; start + needle.length <= haystack.length; start += 1) {
    if (needle.every((word, offset) => haystack[start + offset] === word)) {
      return true;
    }
  }
  return false;
}

export function scoreNameMatch(hint: string, name: string | null | undefined) {
  if (!name) return 0;
  const normalizedHint = normalizeName(hint);
  const normalizedName = normalizeName(name);
  if (!normalizedHint || !normalizedName) return 0;
  if (normalizedHint === normalizedName) return MATCH_SCORES.exact;

  const hintWords = singularWords(hint);
  const nameWords = singularWords(name);
  if (hintWords.join(" ") === nameWords.join(" ")) return MATCH_SCORES.singularExact;

  if (containsSequence(nameWords, hintWords) || containsSequence(hintWords, nameWords)) {
    return MATCH_SCORES.containment;
  }
  return 0;
}

export type MatchCandidate<T> = {
  entity: T;
  score: number;
};

export type BestMatch<T> = {
  match: T | null;
  score: number;
  tiedWith: number;
};

type Matchable = { id: string; updated_at: string };

function updatedAtMs(entity: Matchable) {
  const parsed = Date.parse(entity.updated_at);
  return Number.isNaN(parsed) ? 0 : parsed;
}

/**
 * Picks the entity whose best name scores highest against `hint`.
 * Ties go to the most recently updated entity, then to the smallest id, so the choice never depends on
 * the order storage returned rows in.
 */
export function pickBestMatch<T extends Matchable>(
  hint: string,
  entities: T[],
  namesOf: (entity: T) => (string | null | undefined)[],
): BestMatch<T> {
  const scored: MatchCandidate<T>[] = entities
    .map((entity) => ({
      entity,
      score: Math.max(0, ...namesOf(entity).map((name) => scoreNameMatch(hint, name))),
    }))
    .filter((candidate) => candidate.score > 0);

  if (!scored.length) {
    return { match: null, score: 0, tiedWith: 0 };
  }

  scored.sort((a, b) => {
    if (b.score !== a.score) return b.score - a.score;
    const recency = updatedAtMs(b.entity) - updatedAtMs(a.entity);
    if (recency !== 0) return recency;
    return a.entity.id < b.entity.id ? -1 : a.entity.id > b.entity.id ? 1 : 0;
  });

  const best = scored[0];
  const tiedWith = scored.filter((candidate) => candidate.score === best.score).length - 1;
  return { match: best.entity, score: best.score, tiedWith };
}
