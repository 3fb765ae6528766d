import { readFile } from "node:fs/promises";
import { z } from "zod";
import pino from "pino";
import { env } from "../env.js";
import type { Preferences, Provider } from "./types.js";

const log = pino({ level: env.LOG_LEVEL });

// Directory entries are snake_case; older files use `distance` / `availability`.
const providerEntrySchema = z
  .object({
    id: z.union([z.string().min(1), z.number()]).transform(String),
    name: z.string().min(1),
    phone: z.string().min(1),
    distance_miles: z.number().optional(),
    distance: z.number().optional(),
    rating: z.number(),
    availability_score: z.number().optional(),
    availability: z.number().optional(),
    specialty: z.string().default(""),
    coordinates: z.object({ lat: z.number(), lng: z.number() }).optional()
  })
  .transform((p, ctx): Provider => {
    const distanceMiles = p.distance_miles ?? p.distance;
    const availability = p.availability_score ?? p.availability;
    if (distanceMiles === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `provider ${p.id}: distance_miles is required` });
      return z.NEVER;
    }
    if (availability === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `provider ${p.id}: availability_score is required` });
      return z.NEVER;
    }
    return {
      id: p.id,
      name: p.name,
      phone: p.phone,
      distanceMiles,
      rating: p.rating,
      availability,
      specialty: p.specialty,
      ...(p.coordinates ? { coordinates: p.coordinates } : {})
    };
  });

const directorySchema = z.union([
  z.array(providerEntrySchema),
  z.object({ providers: z.array(providerEntrySchema) }).transform((d) => d.providers)
]);

const preferencesFileSchema = z
  .object({
    max_distance: z.number().optional(),
    min_rating: z.number().optional(),
    preferred_time: z.string().optional()
  })
  .passthrough();

export const DEFAULT_PREFERENCES: Readonly<Preferences> = Object.freeze({
  maxDistance: 5.0,
  minRating: 4.0,
  preferredTime: "morning"
});

export class DirectoryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DirectoryError";
  }
}

export interface ProviderDirectory {
  /** Current snapshot of the directory; read fresh on each call. */
  load(): Promise<Provider[]>;
}

export function parseDirectory(raw: unknown): Provider[] {
  const parsed = directorySchema.safeParse(raw);
  if (!parsed.success) {
    throw new DirectoryError(`providers file invalid: ${parsed.error.issues.map((i) => i.message).join("; ")}`);
  }
  return parsed.data;
}

export function createFileDirectory(path: string): ProviderDirectory {
  return {
    async load() {
      let text: string;
      try {
        text = await readFile(path, "utf8");
      } catch {
        throw new DirectoryError(`providers file not found: ${path}`);
      }
      let raw: unknown;
      try {
        raw = JSON.parse(text);
      } catch (err) {
        throw new DirectoryError(`providers file invalid: ${err instanceof Error ? err.message : String(err)}`);
      }
      return parseDirectory(raw);
    }
  };
}

/** Reads the preferences file, falling back to defaults when it is missing or unreadable. */
export async function loadPreferences(path: string): Promise<Preferences> {
  try {
    const parsed = preferencesFileSchema.safeParse(JSON.parse(await readFile(path, "utf8")));
    if (!parsed.success) return { ...DEFAULT_PREFERENCES };
    return {
      maxDistance: parsed.data.max_distance ?? DEFAULT_PREFERENCES.maxDistance,
      minRating: parsed.data.min_rating ?? DEFAULT_PREFERENCES.minRating,
      preferredTime: parsed.data.preferred_time ?? DEFAULT_PREFERENCES.preferredTime
    };
  } catch (err) {
    log.debug({ path, err }, "user preferences unavailable, using defaults");
    return { ...DEFAULT_PREFERENCES };
  }
}
