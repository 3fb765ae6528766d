import { randomUUID } from "node:crypto";
import pino from "pino";
import { env } from "../env.js";
import { errorMessage } from "../errors.js";
import {
  TERMINAL_STATES,
  type CallMode,
  type CallPlacer,
  type CallSession,
  type CallSessionHandle,
  type CallState,
  type CallTarget,
  type Campaign,
  type ExternalCallStatus,
  type PlacementResult
} from "./types.js";

const log = pino({ level: env.LOG_LEVEL });

export type DispatcherCallbacks = {
  /** Fires after every state change with the new snapshot. */
  onSessionUpdate?: (session: CallSessionHandle) => void;
  /** Fires when a terminal session is dropped after the retention window. */
  onSessionPruned?: (sessionId: string) => void;
};

export type DispatcherOptions = {
  placer: CallPlacer;
  /** How long a session may stay unconfirmed before it is booked as `completed`. */
  sessionLifetimeMs: number;
  /**
   * How long a terminal session stays resolvable before it is dropped along with its call
   * refs. Confirmations for it are uncorrelated after that. Defaults to 3x the lifetime.
   */
  retentionMs?: number;
  callbacks?: DispatcherCallbacks;
  now?: () => Date;
};

const STATUS_TO_STATE: Record<ExternalCallStatus, CallState | null> = {
  queued: null,
  initiated: "dialing",
  ringing: "dialing",
  answered: "in-progress",
  "in-progress": "in-progress",
  completed: "completed",
  busy: "failed",
  "no-answer": "failed",
  failed: "failed",
  canceled: "failed"
};

// Forward-only ordering of the non-terminal states.
const PROGRESS: Record<CallState, number> = {
  queued: 0,
  dialing: 1,
  "in-progress": 2,
  confirmed: 3,
  completed: 3,
  failed: 3
};

export class OutreachDispatcher {
  private sessions = new Map<string, CallSession>();
  private refIndex = new Map<string, string>();
  private timers = new Map<string, NodeJS.Timeout>();
  private placer: CallPlacer;
  private lifetimeMs: number;
  private retentionMs: number;
  private callbacks: DispatcherCallbacks;
  private now: () => Date;

  constructor(opts: DispatcherOptions) {
    this.placer = opts.placer;
    this.lifetimeMs = opts.sessionLifetimeMs;
    this.retentionMs = opts.retentionMs ?? opts.sessionLifetimeMs * 3;
    this.callbacks = opts.callbacks ?? {};
    this.now = opts.now ?? (() => new Date());
  }

  /** Records one `queued` session per target. No calls are placed yet. */
  enqueue(targets: readonly CallTarget[], mode: CallMode): Campaign {
    const campaignId = randomUUID();
    const createdAt = this.now().toISOString();
    const sessions = targets.map((target) => {
      const session: CallSession = {
        id: randomUUID(),
        campaignId,
        mode,
        target,
        state: "queued",
        createdAt,
        updatedAt: createdAt,
        callRef: null,
        failureReason: null,
        bookingId: null
      };
      this.sessions.set(session.id, session);
      this.armLifetime(session.id);
      this.emit(session);
      return this.snapshot(session);
    });
    return { id: campaignId, mode, sessions };
  }

  /**
   * Starts every queued call of the campaign at once. A refused placement fails only its own
   * session; the promise always resolves with the latest snapshots.
   */
  async place(campaign: Campaign): Promise<CallSessionHandle[]> {
    await Promise.all(campaign.sessions.map((s) => this.placeOne(s.id)));
    return campaign.sessions.map((s) => this.get(s.id)).filter((s): s is CallSessionHandle => s !== null);
  }

  async dispatch(targets: readonly CallTarget[], mode: CallMode): Promise<Campaign> {
    const campaign = this.enqueue(targets, mode);
    const sessions = await this.place(campaign);
    return { ...campaign, sessions };
  }

  private async placeOne(sessionId: string) {
    const session = this.sessions.get(sessionId);
    if (!session || session.state !== "queued") return;

    let result: PlacementResult;
    try {
      result = await this.placer.startCall(session.target);
    } catch (err) {
      result = { ok: false, error: errorMessage(err) };
    }

    if (!result.ok) {
      if (TERMINAL_STATES.has(session.state)) {
        log.debug({ sessionId, state: session.state, error: result.error }, "placement failed after session settled");
        return;
      }
      log.warn({ sessionId, phone: session.target.phone, error: result.error }, "call placement failed");
      this.transition(session, "failed", { failureReason: result.error });
      return;
    }

    session.callRef = result.ref;
    if (!this.sessions.has(sessionId)) return;
    if (result.ref.conversationId) this.refIndex.set(result.ref.conversationId, session.id);
    if (result.ref.callSid) this.refIndex.set(result.ref.callSid, session.id);
    log.info({ sessionId, ...result.ref }, "call placed");
    // A status callback may already have moved the session on.
    if (session.state === "queued") this.transition(session, "dialing");
  }

  /**
   * Applies a state notification from the telephony side. `ref` may be our session id, the
   * conversation id, or the call SID. Returns false when the ref is unknown or the move is
   * not allowed from the current state.
   */
  onCallState(ref: string, status: ExternalCallStatus): boolean {
    const session = this.lookup(ref);
    if (!session) {
      log.debug({ ref, status }, "call state for unknown session");
      return false;
    }
    const next = STATUS_TO_STATE[status];
    if (!next || TERMINAL_STATES.has(session.state)) return false;
    if (PROGRESS[next] <= PROGRESS[session.state]) return false;
    this.transition(session, next, next === "failed" ? { failureReason: `call ${status}` } : {});
    return true;
  }

  /**
   * Atomic check-and-set: binds a booking to the session unless one is already bound.
   * Returns the booking id that now owns the session.
   */
  markConfirmed(sessionId: string, bookingId: string): { bookingId: string; created: boolean } | null {
    const session = this.sessions.get(sessionId);
    if (!session) return null;
    if (session.bookingId) return { bookingId: session.bookingId, created: false };
    session.bookingId = bookingId;
    this.transition(session, "confirmed", { failureReason: null });
    return { bookingId, created: true };
  }

  /** Resolves any accepted reference to our session id. */
  resolve(ref: string): string | null {
    return this.lookup(ref)?.id ?? null;
  }

  get(sessionId: string): CallSessionHandle | null {
    const session = this.sessions.get(sessionId);
    return session ? this.snapshot(session) : null;
  }

  list(campaignId?: string): CallSessionHandle[] {
    const out: CallSessionHandle[] = [];
    for (const s of this.sessions.values()) {
      if (!campaignId || s.campaignId === campaignId) out.push(this.snapshot(s));
    }
    return out;
  }

  /** Drops pending lifetime and retention timers. In-flight calls are left to the placer. */
  close() {
    for (const timer of this.timers.values()) clearTimeout(timer);
    this.timers.clear();
  }

  private lookup(ref: string): CallSession | null {
    const direct = this.sessions.get(ref);
    if (direct) return direct;
    const id = this.refIndex.get(ref);
    return id ? this.sessions.get(id) ?? null : null;
  }

  private armLifetime(sessionId: string) {
    const timer = setTimeout(() => {
      this.timers.delete(sessionId);
      const session = this.sessions.get(sessionId);
      if (!session || TERMINAL_STATES.has(session.state)) return;
      log.info({ sessionId, lifetimeMs: this.lifetimeMs }, "session lifetime elapsed without booking");
      this.transition(session, "completed", { failureReason: "session lifetime elapsed" });
    }, this.lifetimeMs);
    timer.unref();
    this.timers.set(sessionId, timer);
  }

  private armRetention(sessionId: string) {
    const timer = setTimeout(() => {
      this.timers.delete(sessionId);
      this.prune(sessionId);
    }, this.retentionMs);
    timer.unref();
    this.timers.set(sessionId, timer);
  }

  private prune(sessionId: string) {
    const session = this.sessions.get(sessionId);
    if (!session) return;
    this.sessions.delete(sessionId);
    for (const ref of [session.callRef?.conversationId, session.callRef?.callSid]) {
      if (ref && this.refIndex.get(ref) === sessionId) this.refIndex.delete(ref);
    }
    log.debug({ sessionId, state: session.state }, "session pruned");
    this.callbacks.onSessionPruned?.(sessionId);
  }

  private transition(
    session: CallSession,
    state: CallState,
    patch: Partial<Pick<CallSession, "failureReason">> = {}
  ) {
    session.state = state;
    session.updatedAt = this.now().toISOString();
    if (patch.failureReason !== undefined) session.failureReason = patch.failureReason;
    if (TERMINAL_STATES.has(state)) {
      const timer = this.timers.get(session.id);
      if (timer) clearTimeout(timer);
      this.armRetention(session.id);
    }
    this.emit(session);
  }

  private snapshot(session: CallSession): CallSessionHandle {
    return Object.freeze({ ...session, callRef: session.callRef ? { ...session.callRef } : null });
  }

  private emit(session: CallSession) {
    this.callbacks.onSessionUpdate?.(this.snapshot(session));
  }
}
