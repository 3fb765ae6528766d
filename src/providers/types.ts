export type Coordinates = { lat: number; lng: number };

export type Provider = {
  id: string;
  name: string;
  phone: string;
  distanceMiles: number;
  /** Star rating, 0–5. */
  rating: number;
  /** Share of requested slots the provider can usually offer, 0–1. */
  availability: number;
  specialty: string;
  coordinates?: Coordinates;
};

export type ScoredProvider = Provider & {
  score: number;
  /** 1-based position in the ranked list. */
  rank: number;
};

export type Preferences = {
  maxDistance: number;
  minRating: number;
  preferredTime: string;
};
