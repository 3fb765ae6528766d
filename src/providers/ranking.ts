import { InvalidProviderError } from "../errors.js";
import type { Preferences, Provider, ScoredProvider } from "./types.js";

export type RankingWeights = {
  rating: number;
  availability: number;
  distance: number;
};

// Rating dominates, then availability, then proximity. Sums to 1 so scores stay in [0, 1].
export const RANKING_WEIGHTS: Readonly<RankingWeights> = Object.freeze({
  rating: 0.6,
  availability: 0.25,
  distance: 0.15
});

// Scores are compared rounded to this many decimal places.
export const SCORE_DECIMALS = 9;

const scoreKey = (score: number) => Math.round(score * 10 ** SCORE_DECIMALS);

const MAX_RATING = 5;

function validate(p: Provider) {
  const id = String(p.id);
  if (typeof p.rating !== "number" || !Number.isFinite(p.rating)) {
    throw new InvalidProviderError(id, "rating", "is missing");
  }
  if (p.rating < 0 || p.rating > MAX_RATING) {
    throw new InvalidProviderError(id, "rating", `must be within [0, ${MAX_RATING}], got ${p.rating}`);
  }
  if (typeof p.distanceMiles !== "number" || !Number.isFinite(p.distanceMiles)) {
    throw new InvalidProviderError(id, "distanceMiles", "is missing");
  }
  if (p.distanceMiles < 0) {
    throw new InvalidProviderError(id, "distanceMiles", `must be >= 0, got ${p.distanceMiles}`);
  }
  if (typeof p.availability !== "number" || !Number.isFinite(p.availability)) {
    throw new InvalidProviderError(id, "availability", "is missing");
  }
  if (p.availability < 0 || p.availability > 1) {
    throw new InvalidProviderError(id, "availability", `must be within [0, 1], got ${p.availability}`);
  }
}

type Normalizer = (value: number) => number;

/** Min-max normaliser over the pool; a factor every provider shares contributes 1.0. */
function normalizer(values: number[], invert: boolean): Normalizer {
  const min = Math.min(...values);
  const max = Math.max(...values);
  const span = max - min;
  if (span === 0) return () => 1;
  return invert ? (v) => (max - v) / span : (v) => (v - min) / span;
}

export function compareScored(a: ScoredProvider, b: ScoredProvider): number {
  const ka = scoreKey(a.score);
  const kb = scoreKey(b.score);
  if (ka !== kb) return kb - ka;
  if (a.distanceMiles !== b.distanceMiles) return a.distanceMiles - b.distanceMiles;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * Orders providers by a weighted score of rating, availability and (inverted) distance.
 * Scores equal at SCORE_DECIMALS places fall back to the closer provider, then the lower id.
 *
 * @throws InvalidProviderError when any provider has a missing or out-of-range factor.
 */
export function rank(
  providers: readonly Provider[],
  weights: Readonly<RankingWeights> = RANKING_WEIGHTS
): ScoredProvider[] {
  if (providers.length === 0) return [];
  providers.forEach(validate);

  const rating = normalizer(providers.map((p) => p.rating), false);
  const availability = normalizer(providers.map((p) => p.availability), false);
  const distance = normalizer(providers.map((p) => p.distanceMiles), true);

  return providers
    .map((p) => ({
      ...p,
      score:
        weights.rating * rating(p.rating) +
        weights.availability * availability(p.availability) +
        weights.distance * distance(p.distanceMiles),
      rank: 0
    }))
    .sort(compareScored)
    .map((p, i) => Object.freeze({ ...p, rank: i + 1 }));
}

/** Drops providers outside the user's rating floor or travel radius. */
export function filterByPreferences(
  providers: readonly Provider[],
  prefs: Pick<Preferences, "minRating" | "maxDistance">
): Provider[] {
  return providers.filter((p) => p.rating >= prefs.minRating && p.distanceMiles <= prefs.maxDistance);
}

export function topK(ranked: readonly ScoredProvider[], k: number): ScoredProvider[] {
  return ranked.slice(0, Math.max(0, k));
}
