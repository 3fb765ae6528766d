import type { ScoredProvider } from "../providers/types.js";

export type CallMode = "solo" | "swarm";

export type CallState = "queued" | "dialing" | "in-progress" | "confirmed" | "completed" | "failed";

export const TERMINAL_STATES: ReadonlySet<CallState> = new Set(["confirmed", "completed", "failed"]);

export type CallTarget =
  | { kind: "phone"; phone: string; prompt?: string }
  | { kind: "provider"; provider: ScoredProvider; phone: string; prompt?: string };

/** Opaque identifiers the call placer hands back for a started call. */
export type CallRef = {
  conversationId: string | null;
  callSid: string | null;
};

export type CallSession = {
  id: string;
  campaignId: string;
  mode: CallMode;
  target: CallTarget;
  state: CallState;
  createdAt: string;
  updatedAt: string;
  callRef: CallRef | null;
  failureReason: string | null;
  bookingId: string | null;
};

/** Read-only view of a session handed to callers for progress display. */
export type CallSessionHandle = Readonly<CallSession>;

export type Campaign = {
  id: string;
  mode: CallMode;
  sessions: CallSessionHandle[];
};

export type PlacementResult =
  | { ok: true; ref: CallRef }
  | { ok: false; error: string };

export interface CallPlacer {
  /** Resolves once placement is acknowledged or refused. Implementations must not reject. */
  startCall(target: CallTarget): Promise<PlacementResult>;
}

/**
 * Statuses reported by the telephony side (Twilio's CallStatus vocabulary plus `answered`).
 */
export const EXTERNAL_CALL_STATUSES = [
  "queued",
  "initiated",
  "ringing",
  "answered",
  "in-progress",
  "completed",
  "busy",
  "no-answer",
  "failed",
  "canceled"
] as const;

export type ExternalCallStatus = (typeof EXTERNAL_CALL_STATUSES)[number];
