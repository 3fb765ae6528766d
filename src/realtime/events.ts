import type http from "node:http";
import WebSocket, { WebSocketServer } from "ws";
import pino from "pino";
import { env } from "../env.js";
import type { Booking } from "../bookings/types.js";
import type { CallSessionHandle } from "../calls/types.js";

const log = pino({ level: env.LOG_LEVEL });

export type OutreachEvent =
  | { type: "session"; session: CallSessionHandle }
  | { type: "booking"; booking: Booking };

export type EventHub = {
  publish: (event: OutreachEvent) => void;
  close: () => Promise<void>;
};

/**
 * Pushes session and booking updates to every dashboard connected on `/events`.
 * New connections receive a `hello` with the current snapshot from `initial`.
 */
export function createEventHub(
  server: http.Server,
  initial: () => { sessions: readonly CallSessionHandle[]; bookings: readonly Booking[] }
): EventHub {
  const wss = new WebSocketServer({ server, path: "/events" });

  wss.on("connection", (ws) => {
    log.info({ clients: wss.clients.size }, "events client connected");
    ws.send(JSON.stringify({ type: "hello", ...initial() }));
    ws.on("error", (err) => log.warn({ err }, "events client error"));
  });

  return {
    publish(event) {
      const msg = JSON.stringify(event);
      for (const client of wss.clients) {
        if (client.readyState === WebSocket.OPEN) client.send(msg);
      }
    },
    close() {
      return new Promise((resolve, reject) => {
        for (const client of wss.clients) client.terminate();
        wss.close((err) => (err ? reject(err) : resolve()));
      });
    }
  };
}
