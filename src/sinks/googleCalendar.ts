import { readFile } from "node:fs/promises";
import fetch from "node-fetch";
import { GoogleAuth } from "google-auth-library";
import { z } from "zod";
import { errorMessage } from "../errors.js";
import type { Booking } from "../bookings/types.js";
import type { BookingSink, SinkResult } from "./types.js";

export type CalendarSinkConfig = {
  serviceAccountJsonPath: string;
  calendarId: string;
  timeZone: string;
  eventMinutes: number;
};

export type CalendarEventRequest = {
  summary: string;
  description: string;
  start: { dateTime: string; timeZone: string };
  end: { dateTime: string; timeZone: string };
};

const insertedEventSchema = z.object({ id: z.string().optional(), htmlLink: z.string().optional() });

function pad(n: number) {
  return String(n).padStart(2, "0");
}

/** Wall-clock arithmetic on a naive `YYYY-MM-DD` + `HH:MM[:SS]`; the zone travels separately. */
export function addMinutes(date: string, time: string, minutes: number): string {
  const [y, mo, d] = date.split("-").map(Number);
  const [h, mi, s = 0] = time.split(":").map(Number);
  const t = new Date(Date.UTC(y, mo - 1, d, h, mi + minutes, s));
  return (
    `${t.getUTCFullYear()}-${pad(t.getUTCMonth() + 1)}-${pad(t.getUTCDate())}` +
    `T${pad(t.getUTCHours())}:${pad(t.getUTCMinutes())}:${pad(t.getUTCSeconds())}`
  );
}

export function buildCalendarEvent(booking: Booking, cfg: Pick<CalendarSinkConfig, "timeZone" | "eventMinutes">): CalendarEventRequest {
  const description = [
    `Booked with ${booking.providerName} by phone.`,
    booking.requesterPhone ? `Requester: ${booking.requesterPhone}` : null,
    `Booking: ${booking.id}`
  ]
    .filter((line): line is string => line !== null)
    .join("\n");

  return {
    summary: booking.title ?? `Appointment with ${booking.providerName}`,
    description,
    start: { dateTime: addMinutes(booking.date, booking.time, 0), timeZone: cfg.timeZone },
    end: { dateTime: addMinutes(booking.date, booking.time, cfg.eventMinutes), timeZone: cfg.timeZone }
  };
}

/** Writes each booking into a Google Calendar through a service account. */
export function createGoogleCalendarSink(cfg: CalendarSinkConfig): BookingSink {
  const destination = `calendar:${cfg.calendarId}`;
  return {
    destination,
    async deliver(booking: Booking): Promise<SinkResult> {
      try {
        // Surface a missing key file before the auth library's less specific error.
        await readFile(cfg.serviceAccountJsonPath, "utf8");

        const auth = new GoogleAuth({
          keyFile: cfg.serviceAccountJsonPath,
          scopes: ["https://www.googleapis.com/auth/calendar.events"]
        });
        const token = await auth.getAccessToken();
        if (!token) {
          return { ok: false, destination, error: "Failed to obtain Google access token" };
        }

        const url = `https://www.googleapis.com/calendar/v3/calendars/${encodeURIComponent(cfg.calendarId)}/events`;
        const resp = await fetch(url, {
          method: "POST",
          headers: {
            Authorization: `Bearer ${token}`,
            "Content-Type": "application/json"
          },
          body: JSON.stringify(buildCalendarEvent(booking, cfg))
        });

        if (!resp.ok) {
          const text = await resp.text();
          return { ok: false, destination, error: `HTTP ${resp.status}: ${text}` };
        }
        const event = insertedEventSchema.safeParse(await resp.json());
        return { ok: true, destination, ref: event.success ? event.data.htmlLink ?? event.data.id : undefined };
      } catch (e) {
        return { ok: false, destination, error: errorMessage(e) };
      }
    }
  };
}
