export type SinkOutcome =
  | { status: "pending" }
  | { status: "not_configured" }
  | { status: "success"; ref?: string }
  | { status: "failed"; reason: string };

export type SinkName = "calendar" | "webhook";

export type Booking = {
  id: string;
  /** Our session id when the confirmation could be correlated, otherwise null. */
  sessionId: string | null;
  /** The reference exactly as the confirmation source sent it. */
  sessionRef: string | null;
  providerName: string;
  date: string;
  time: string;
  title: string | null;
  requesterPhone: string | null;
  receivedAt: string;
  calendar: SinkOutcome;
  webhook: SinkOutcome;
};

export type ConfirmationEvent = {
  session_id?: string | null;
  conversation_id?: string | null;
  provider_name?: string | null;
  date?: string | null;
  time?: string | null;
  title?: string | null;
  requester_phone?: string | null;
};

export type ConsolidationResult =
  | { status: "accepted"; booking: Booking }
  | { status: "duplicate"; booking: Booking }
  | { status: "malformed"; reason: string };
