import fetch from "node-fetch";
import { z } from "zod";
import pino from "pino";
import { env } from "../env.js";

const log = pino({ level: env.LOG_LEVEL });

const slotsSchema = z
  .object({
    free_slots: z.array(z.string()).optional(),
    slots: z.array(z.string()).optional(),
    available_slots: z.array(z.string()).optional()
  })
  .passthrough();

export interface AvailabilityChecker {
  /** The user's free windows, or `[preferredTime]` when they cannot be looked up. */
  freeSlots(preferredTime: string): Promise<string[]>;
}

export function createAvailabilityChecker(url: string | undefined, timeoutMs = 10_000): AvailabilityChecker {
  return {
    async freeSlots(preferredTime: string) {
      const fallback = [preferredTime];
      if (!url) return fallback;

      const controller = new AbortController();
      const timer = setTimeout(() => controller.abort(), timeoutMs);
      try {
        const resp = await fetch(url, {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify({ preferred_time: preferredTime }),
          signal: controller.signal
        });
        if (!resp.ok) return fallback;
        const text = await resp.text();
        if (!text) return fallback;
        const parsed = slotsSchema.safeParse(JSON.parse(text));
        if (!parsed.success) return fallback;
        const slots = [parsed.data.free_slots, parsed.data.slots, parsed.data.available_slots].find(
          (s) => s !== undefined && s.length > 0
        );
        return slots ?? fallback;
      } catch (err) {
        log.warn({ err }, "availability lookup failed, using preferred time");
        return fallback;
      } finally {
        clearTimeout(timer);
      }
    }
  };
}
