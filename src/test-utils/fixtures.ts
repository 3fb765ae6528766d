import type { Booking } from "../bookings/types.js";
import type { CallPlacer, CallTarget, PlacementResult } from "../calls/types.js";
import type { Provider } from "../providers/types.js";
import type { BookingSink, SinkResult } from "../sinks/types.js";

export function makeProvider(overrides: Partial<Provider> & Pick<Provider, "id">): Provider {
  return {
    name: `Provider ${overrides.id}`,
    phone: `+1555000${overrides.id.padStart(4, "0")}`,
    distanceMiles: 1,
    rating: 4.5,
    availability: 0.5,
    specialty: "general",
    ...overrides
  };
}

export function makeBooking(overrides: Partial<Booking> = {}): Booking {
  return {
    id: "booking-1",
    sessionId: null,
    sessionRef: null,
    providerName: "Provider One",
    date: "2025-02-10",
    time: "14:00",
    title: null,
    requesterPhone: null,
    receivedAt: "2025-02-01T09:00:00.000Z",
    calendar: { status: "pending" },
    webhook: { status: "pending" },
    ...overrides
  };
}

/**
 * Placer that acknowledges every call with refs derived from the dialled number, except
 * numbers listed in `refuse`, which fail with the given reason.
 */
export function fakePlacer(refuse: Record<string, string> = {}): CallPlacer & { calls: CallTarget[] } {
  const calls: CallTarget[] = [];
  return {
    calls,
    async startCall(target: CallTarget): Promise<PlacementResult> {
      calls.push(target);
      const reason = refuse[target.phone];
      if (reason) return { ok: false, error: reason };
      return { ok: true, ref: { conversationId: `conv-${target.phone}`, callSid: `CA-${target.phone}` } };
    }
  };
}

/** Placer whose acknowledgements are held until `release()` is called. */
export function gatedPlacer(): CallPlacer & { release: () => void } {
  let open: () => void = () => {};
  const gate = new Promise<void>((resolve) => {
    open = resolve;
  });
  const inner = fakePlacer();
  return {
    release: () => open(),
    async startCall(target: CallTarget) {
      await gate;
      return inner.startCall(target);
    }
  };
}

export function fakeSink(destination: string, result: (b: Booking) => Promise<SinkResult>): BookingSink & { delivered: Booking[] } {
  const delivered: Booking[] = [];
  return {
    destination,
    delivered,
    async deliver(booking: Booking) {
      delivered.push(booking);
      return result(booking);
    }
  };
}
