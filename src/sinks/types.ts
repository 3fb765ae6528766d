import type { Booking } from "../bookings/types.js";

export type SinkResult =
  | { ok: true; destination: string; ref?: string }
  | { ok: false; destination: string; error: string };

export interface BookingSink {
  destination: string;
  deliver(booking: Booking): Promise<SinkResult>;
}
