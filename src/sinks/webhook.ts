import fetch from "node-fetch";
import { errorMessage } from "../errors.js";
import type { Booking } from "../bookings/types.js";
import type { BookingSink, SinkResult } from "./types.js";

export type WebhookSinkConfig = {
  url: string;
  timeoutMs: number;
};

export function bookingPayload(booking: Booking) {
  return {
    booking_id: booking.id,
    session_id: booking.sessionId,
    provider_name: booking.providerName,
    date: booking.date,
    time: booking.time,
    title: booking.title,
    requester_phone: booking.requesterPhone,
    received_at: booking.receivedAt
  };
}

export function createWebhookSink(cfg: WebhookSinkConfig): BookingSink {
  const destination = `webhook:${new URL(cfg.url).host}`;
  return {
    destination,
    async deliver(booking: Booking): Promise<SinkResult> {
      const controller = new AbortController();
      const timer = setTimeout(() => controller.abort(), cfg.timeoutMs);
      try {
        const resp = await fetch(cfg.url, {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify(bookingPayload(booking)),
          signal: controller.signal
        });
        if (!resp.ok) {
          const text = await resp.text();
          return { ok: false, destination, error: `HTTP ${resp.status}: ${text}` };
        }
        return { ok: true, destination };
      } catch (e) {
        if (controller.signal.aborted) {
          return { ok: false, destination, error: `timed out after ${cfg.timeoutMs}ms` };
        }
        return { ok: false, destination, error: errorMessage(e) };
      } finally {
        clearTimeout(timer);
      }
    }
  };
}
