import { errorMessage } from "../errors.js";
import type { Env } from "../env.js";
import type { Booking, SinkName, SinkOutcome } from "../bookings/types.js";
import type { BookingSink, SinkResult } from "./types.js";
import { createGoogleCalendarSink } from "./googleCalendar.js";
import { createWebhookSink } from "./webhook.js";

export type BookingSinks = Record<SinkName, BookingSink | null>;

export type ForwardOutcome = Record<SinkName, SinkOutcome>;

export function createSinks(
  cfg: Pick<
    Env,
    | "BOOKING_WEBHOOK_URL"
    | "WEBHOOK_TIMEOUT_MS"
    | "GOOGLE_SERVICE_ACCOUNT_JSON_PATH"
    | "GOOGLE_CALENDAR_ID"
    | "CALENDAR_TIMEZONE"
    | "CALENDAR_EVENT_MINUTES"
  >
): BookingSinks {
  return {
    calendar: cfg.GOOGLE_SERVICE_ACCOUNT_JSON_PATH
      ? createGoogleCalendarSink({
          serviceAccountJsonPath: cfg.GOOGLE_SERVICE_ACCOUNT_JSON_PATH,
          calendarId: cfg.GOOGLE_CALENDAR_ID,
          timeZone: cfg.CALENDAR_TIMEZONE,
          eventMinutes: cfg.CALENDAR_EVENT_MINUTES
        })
      : null,
    webhook: cfg.BOOKING_WEBHOOK_URL
      ? createWebhookSink({ url: cfg.BOOKING_WEBHOOK_URL, timeoutMs: cfg.WEBHOOK_TIMEOUT_MS })
      : null
  };
}

function toOutcome(result: SinkResult): SinkOutcome {
  return result.ok ? { status: "success", ...(result.ref ? { ref: result.ref } : {}) } : { status: "failed", reason: result.error };
}

async function attempt(sink: BookingSink | null, booking: Booking): Promise<SinkOutcome> {
  if (!sink) return { status: "not_configured" };
  try {
    return toOutcome(await sink.deliver(booking));
  } catch (e) {
    return { status: "failed", reason: errorMessage(e) };
  }
}

/**
 * Hands the booking to every sink at once, one attempt each. Never rejects; `onOutcome`
 * fires per sink as soon as that sink settles.
 */
export async function forwardBooking(
  sinks: BookingSinks,
  booking: Booking,
  onOutcome?: (sink: SinkName, outcome: SinkOutcome) => void
): Promise<ForwardOutcome> {
  const run = async (name: SinkName) => {
    const outcome = await attempt(sinks[name], booking);
    onOutcome?.(name, outcome);
    return outcome;
  };
  const [calendar, webhook] = await Promise.all([run("calendar"), run("webhook")]);
  return { calendar, webhook };
}
