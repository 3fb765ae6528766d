import type { Booking, SinkName, SinkOutcome } from "./types.js";

export const TELEMETRY_CAPACITY = 20;

/**
 * Bounded booking history, newest-last. Entries are frozen and replaced wholesale when a
 * sink outcome lands, so a snapshot taken by a reader never changes under it.
 */
export class TelemetryStore {
  private entries: Booking[] = [];
  readonly capacity: number;

  constructor(capacity = TELEMETRY_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`telemetry capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  /** Appends and returns the bookings evicted to stay within capacity (oldest first). */
  append(booking: Booking): Booking[] {
    this.entries = [...this.entries, Object.freeze({ ...booking })];
    const overflow = this.entries.length - this.capacity;
    if (overflow <= 0) return [];
    const evicted = this.entries.slice(0, overflow);
    this.entries = this.entries.slice(overflow);
    return evicted;
  }

  get(bookingId: string): Booking | null {
    return this.entries.find((b) => b.id === bookingId) ?? null;
  }

  /**
   * Sets a sink outcome once. Returns the updated booking, or null when the booking has been
   * evicted or the outcome was already recorded.
   */
  recordOutcome(bookingId: string, sink: SinkName, outcome: SinkOutcome): Booking | null {
    const idx = this.entries.findIndex((b) => b.id === bookingId);
    if (idx < 0) return null;
    const current = this.entries[idx];
    if (current[sink].status !== "pending") return null;
    const updated: Booking = Object.freeze(
      sink === "calendar" ? { ...current, calendar: outcome } : { ...current, webhook: outcome }
    );
    this.entries = this.entries.map((b, i) => (i === idx ? updated : b));
    return updated;
  }

  snapshot(): readonly Booking[] {
    return Object.freeze([...this.entries]);
  }

  get size() {
    return this.entries.length;
  }
}
