import { randomUUID } from "node:crypto";
import { z } from "zod";
import pino from "pino";
import { env } from "../env.js";
import type { OutreachDispatcher } from "../calls/dispatcher.js";
import { forwardBooking, type BookingSinks } from "../sinks/index.js";
import type { TelemetryStore } from "./telemetry.js";
import type { Booking, ConsolidationResult, SinkName, SinkOutcome } from "./types.js";

const log = pino({ level: env.LOG_LEVEL });

function isCalendarDate(value: string): boolean {
  const m = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (!m) return false;
  const [y, mo, d] = [Number(m[1]), Number(m[2]), Number(m[3])];
  const t = new Date(Date.UTC(y, mo - 1, d));
  return t.getUTCFullYear() === y && t.getUTCMonth() === mo - 1 && t.getUTCDate() === d;
}

const trimmed = z
  .string()
  .nullish()
  .transform((v) => (v && v.trim() ? v.trim() : null));

export const confirmationSchema = z.object({
  session_id: trimmed,
  conversation_id: trimmed,
  provider_name: z
    .string({ required_error: "provider_name is required", invalid_type_error: "provider_name must be a string" })
    .trim()
    .min(1, "provider_name is required"),
  date: z
    .string({ required_error: "date is required", invalid_type_error: "date must be a string" })
    .trim()
    .refine(isCalendarDate, "date must be a calendar date in YYYY-MM-DD form"),
  time: z
    .string({ required_error: "time is required", invalid_type_error: "time must be a string" })
    .trim()
    .regex(/^([01]\d|2[0-3]):[0-5]\d(:[0-5]\d)?$/, "time must be HH:MM in 24-hour form"),
  title: trimmed,
  requester_phone: trimmed
});

/** The parts of the dispatcher the consolidator needs to correlate and confirm sessions. */
export type SessionLedger = Pick<OutreachDispatcher, "resolve" | "markConfirmed" | "get">;

export type ConsolidatorCallbacks = {
  /** Fires when a booking is accepted and again as each sink outcome lands. */
  onBookingUpdate?: (booking: Booking) => void;
};

export type ConsolidatorOptions = {
  store: TelemetryStore;
  sessions: SessionLedger;
  sinks: BookingSinks;
  callbacks?: ConsolidatorCallbacks;
  now?: () => Date;
};

export class BookingConsolidator {
  private store: TelemetryStore;
  private sessions: SessionLedger;
  private sinks: BookingSinks;
  private callbacks: ConsolidatorCallbacks;
  private now: () => Date;
  // Correlated bookings outlive their telemetry slot so late duplicates still resolve.
  private bySession = new Map<string, Booking>();
  private inflight = new Set<Promise<void>>();

  constructor(opts: ConsolidatorOptions) {
    this.store = opts.store;
    this.sessions = opts.sessions;
    this.sinks = opts.sinks;
    this.callbacks = opts.callbacks ?? {};
    this.now = opts.now ?? (() => new Date());
  }

  /**
   * Validates, dedupes and records one confirmation. Runs to completion without yielding, so
   * the "already confirmed?" check and the confirm are a single step on the event loop.
   * Forwarding starts afterwards and is not awaited.
   */
  onConfirmation(event: unknown): ConsolidationResult {
    const parsed = confirmationSchema.safeParse(event ?? {});
    if (!parsed.success) {
      const reason = parsed.error.issues.map((i) => i.message).join("; ");
      log.warn({ reason }, "confirmation rejected");
      return { status: "malformed", reason };
    }
    const e = parsed.data;
    const refs = [e.session_id, e.conversation_id].filter((r): r is string => r !== null);
    const sessionRef = refs[0] ?? null;
    const sessionId = this.correlate(refs);

    if (sessionId) {
      const existing = this.existingFor(sessionId);
      if (existing) {
        log.info({ sessionId, bookingId: existing.id }, "duplicate confirmation");
        return { status: "duplicate", booking: existing };
      }
    }

    const booking: Booking = {
      id: randomUUID(),
      sessionId,
      sessionRef,
      providerName: e.provider_name,
      date: e.date,
      time: e.time,
      title: e.title,
      requesterPhone: e.requester_phone,
      receivedAt: this.now().toISOString(),
      calendar: { status: "pending" },
      webhook: { status: "pending" }
    };
    Object.freeze(booking);

    if (sessionId) {
      const claim = this.sessions.markConfirmed(sessionId, booking.id);
      const existing = claim && !claim.created ? this.existingFor(sessionId) : null;
      if (existing) return { status: "duplicate", booking: existing };
      this.bySession.set(sessionId, booking);
    }

    const evicted = this.store.append(booking);
    if (evicted.length) log.debug({ evicted: evicted.map((b) => b.id) }, "telemetry evicted oldest");
    log.info(
      { bookingId: booking.id, sessionId, provider: booking.providerName, date: booking.date, time: booking.time },
      "booking accepted"
    );
    this.callbacks.onBookingUpdate?.(booking);
    this.startForward(booking);
    return { status: "accepted", booking };
  }

  history(): readonly Booking[] {
    return this.store.snapshot();
  }

  /** Resolves once every forward started so far has settled. */
  async whenIdle(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.all([...this.inflight]);
    }
  }

  /** Drops the dedup record of a session the dispatcher no longer tracks. */
  forget(sessionId: string) {
    this.bySession.delete(sessionId);
  }

  // First reference that resolves wins; a source may send a placeholder in one field.
  private correlate(refs: readonly string[]): string | null {
    for (const ref of refs) {
      const id = this.sessions.resolve(ref);
      if (id) return id;
    }
    return null;
  }

  private existingFor(sessionId: string): Booking | null {
    const bookingId = this.sessions.get(sessionId)?.bookingId;
    if (!bookingId) return null;
    return this.store.get(bookingId) ?? this.bySession.get(sessionId) ?? null;
  }

  private startForward(booking: Booking) {
    const task: Promise<void> = forwardBooking(this.sinks, booking, (sink, outcome) =>
      this.applyOutcome(booking, sink, outcome)
    )
      .then((outcome) => {
        log.info({ bookingId: booking.id, calendar: outcome.calendar, webhook: outcome.webhook }, "booking forwarded");
      })
      .catch((err) => log.warn({ bookingId: booking.id, err }, "booking forward failed"))
      .finally(() => {
        this.inflight.delete(task);
      });
    this.inflight.add(task);
  }

  private applyOutcome(booking: Booking, sink: SinkName, outcome: SinkOutcome) {
    if (outcome.status === "failed") {
      log.warn({ bookingId: booking.id, sink, reason: outcome.reason }, "sink delivery failed");
    }
    const updated = this.store.recordOutcome(booking.id, sink, outcome);
    if (!updated) return;
    if (updated.sessionId && this.bySession.has(updated.sessionId)) this.bySession.set(updated.sessionId, updated);
    this.callbacks.onBookingUpdate?.(updated);
  }
}
