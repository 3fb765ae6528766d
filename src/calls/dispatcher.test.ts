import { afterEach, describe, expect, it, vi } from "vitest";
import { fakePlacer, gatedPlacer } from "../test-utils/fixtures.js";
import { OutreachDispatcher } from "./dispatcher.js";
import type { CallPlacer, CallSessionHandle, CallTarget, PlacementResult } from "./types.js";

const A: CallTarget = { kind: "phone", phone: "+15550000001" };
const B: CallTarget = { kind: "phone", phone: "+15550000002" };
const C: CallTarget = { kind: "phone", phone: "+15550000003" };

function heldPlacer(): CallPlacer & { answer: (result: PlacementResult) => void } {
  let answer: (result: PlacementResult) => void = () => {};
  return {
    answer: (result) => answer(result),
    startCall: () =>
      new Promise<PlacementResult>((resolve) => {
        answer = resolve;
      })
  };
}

describe("OutreachDispatcher", () => {
  let dispatcher: OutreachDispatcher;

  afterEach(() => {
    dispatcher.close();
    vi.useRealTimers();
  });

  it("records queued sessions without placing calls", () => {
    const placer = fakePlacer();
    dispatcher = new OutreachDispatcher({ placer, sessionLifetimeMs: 60_000 });
    const campaign = dispatcher.enqueue([A, B], "swarm");

    expect(campaign.sessions.map((s) => s.state)).toEqual(["queued", "queued"]);
    expect(new Set(campaign.sessions.map((s) => s.campaignId))).toEqual(new Set([campaign.id]));
    expect(placer.calls).toHaveLength(0);
  });

  it("moves acknowledged sessions to dialing and indexes their refs", async () => {
    dispatcher = new OutreachDispatcher({ placer: fakePlacer(), sessionLifetimeMs: 60_000 });
    const campaign = await dispatcher.dispatch([A], "solo");
    const [session] = campaign.sessions;

    expect(session.state).toBe("dialing");
    expect(session.callRef).toEqual({ conversationId: "conv-+15550000001", callSid: "CA-+15550000001" });
    expect(dispatcher.resolve("conv-+15550000001")).toBe(session.id);
    expect(dispatcher.resolve("CA-+15550000001")).toBe(session.id);
    expect(dispatcher.resolve(session.id)).toBe(session.id);
    expect(dispatcher.resolve("unknown")).toBeNull();
  });

  it("isolates a refused placement to its own session", async () => {
    dispatcher = new OutreachDispatcher({
      placer: fakePlacer({ "+15550000002": "number unreachable" }),
      sessionLifetimeMs: 60_000
    });
    const campaign = await dispatcher.dispatch([A, B, C], "swarm");

    expect(campaign.sessions.map((s) => s.state)).toEqual(["dialing", "failed", "dialing"]);
    expect(campaign.sessions[1].failureReason).toBe("number unreachable");
  });

  it("turns a throwing placer into a failed session", async () => {
    dispatcher = new OutreachDispatcher({
      placer: {
        async startCall() {
          throw new Error("socket hang up");
        }
      },
      sessionLifetimeMs: 60_000
    });
    const campaign = await dispatcher.dispatch([A], "solo");
    expect(campaign.sessions[0].state).toBe("failed");
    expect(campaign.sessions[0].failureReason).toBe("socket hang up");
  });

  it("places every call before any acknowledgement returns", async () => {
    const placer = gatedPlacer();
    const started: string[] = [];
    dispatcher = new OutreachDispatcher({
      placer: {
        startCall(target) {
          started.push(target.phone);
          return placer.startCall(target);
        }
      },
      sessionLifetimeMs: 60_000
    });
    const pending = dispatcher.dispatch([A, B, C], "swarm");
    await Promise.resolve();
    expect(started).toEqual([A.phone, B.phone, C.phone]);

    placer.release();
    const campaign = await pending;
    expect(campaign.sessions.every((s) => s.state === "dialing")).toBe(true);
  });

  it("applies call-state notifications forward only", async () => {
    dispatcher = new OutreachDispatcher({ placer: fakePlacer(), sessionLifetimeMs: 60_000 });
    const [session] = (await dispatcher.dispatch([A], "solo")).sessions;

    expect(dispatcher.onCallState("CA-+15550000001", "answered")).toBe(true);
    expect(dispatcher.get(session.id)?.state).toBe("in-progress");
    expect(dispatcher.onCallState("CA-+15550000001", "ringing")).toBe(false);
    expect(dispatcher.onCallState("CA-+15550000001", "completed")).toBe(true);
    expect(dispatcher.get(session.id)?.state).toBe("completed");
    expect(dispatcher.onCallState("CA-+15550000001", "failed")).toBe(false);
    expect(dispatcher.onCallState("CA-unknown", "answered")).toBe(false);
  });

  it("records the telephony status as the failure reason", async () => {
    dispatcher = new OutreachDispatcher({ placer: fakePlacer(), sessionLifetimeMs: 60_000 });
    const [session] = (await dispatcher.dispatch([A], "solo")).sessions;
    dispatcher.onCallState(session.id, "no-answer");
    expect(dispatcher.get(session.id)).toMatchObject({ state: "failed", failureReason: "call no-answer" });
  });

  it("binds exactly one booking to a session", async () => {
    dispatcher = new OutreachDispatcher({ placer: fakePlacer(), sessionLifetimeMs: 60_000 });
    const [session] = (await dispatcher.dispatch([A], "solo")).sessions;

    expect(dispatcher.markConfirmed(session.id, "booking-1")).toEqual({ bookingId: "booking-1", created: true });
    expect(dispatcher.markConfirmed(session.id, "booking-2")).toEqual({ bookingId: "booking-1", created: false });
    expect(dispatcher.get(session.id)).toMatchObject({ state: "confirmed", bookingId: "booking-1" });
    expect(dispatcher.markConfirmed("missing", "booking-3")).toBeNull();
  });

  it("completes unconfirmed sessions once their lifetime elapses", async () => {
    vi.useFakeTimers();
    dispatcher = new OutreachDispatcher({ placer: fakePlacer(), sessionLifetimeMs: 1_000 });
    const [open, booked] = (await dispatcher.dispatch([A, B], "swarm")).sessions;
    dispatcher.markConfirmed(booked.id, "booking-1");

    vi.advanceTimersByTime(999);
    expect(dispatcher.get(open.id)?.state).toBe("dialing");

    vi.advanceTimersByTime(1);
    expect(dispatcher.get(open.id)).toMatchObject({ state: "completed", failureReason: "session lifetime elapsed" });
    expect(dispatcher.get(booked.id)?.state).toBe("confirmed");
  });

  it("reports every state change to the update callback", async () => {
    const seen: CallSessionHandle[] = [];
    dispatcher = new OutreachDispatcher({
      placer: fakePlacer(),
      sessionLifetimeMs: 60_000,
      callbacks: { onSessionUpdate: (s) => seen.push(s) }
    });
    const [session] = (await dispatcher.dispatch([A], "solo")).sessions;
    dispatcher.onCallState(session.id, "in-progress");

    expect(seen.map((s) => s.state)).toEqual(["queued", "dialing", "in-progress"]);
  });

  it("lists sessions by campaign and hands out frozen copies", async () => {
    dispatcher = new OutreachDispatcher({ placer: fakePlacer(), sessionLifetimeMs: 60_000 });
    const first = await dispatcher.dispatch([A], "solo");
    await dispatcher.dispatch([B, C], "swarm");

    expect(dispatcher.list()).toHaveLength(3);
    expect(dispatcher.list(first.id).map((s) => s.target.phone)).toEqual([A.phone]);
    expect(Object.isFrozen(dispatcher.list(first.id)[0])).toBe(true);
  });

  it("keeps a confirmed session when its placement fails late", async () => {
    const placer = heldPlacer();
    dispatcher = new OutreachDispatcher({ placer, sessionLifetimeMs: 60_000 });
    const pending = dispatcher.dispatch([A], "solo");
    const [session] = dispatcher.list();

    dispatcher.markConfirmed(session.id, "booking-1");
    placer.answer({ ok: false, error: "line busy" });
    await pending;

    expect(dispatcher.get(session.id)).toMatchObject({ state: "confirmed", bookingId: "booking-1", failureReason: null });
  });

  it("keeps a timed-out session completed when its placement fails late", async () => {
    vi.useFakeTimers();
    const placer = heldPlacer();
    dispatcher = new OutreachDispatcher({ placer, sessionLifetimeMs: 1_000 });
    const pending = dispatcher.dispatch([A], "solo");
    const [session] = dispatcher.list();

    vi.advanceTimersByTime(1_000);
    placer.answer({ ok: false, error: "line busy" });
    await pending;

    expect(dispatcher.get(session.id)).toMatchObject({ state: "completed", failureReason: "session lifetime elapsed" });
  });

  it("drops terminal sessions and their refs after the retention window", async () => {
    vi.useFakeTimers();
    const pruned: string[] = [];
    dispatcher = new OutreachDispatcher({
      placer: fakePlacer(),
      sessionLifetimeMs: 60_000,
      retentionMs: 5_000,
      callbacks: { onSessionPruned: (id) => pruned.push(id) }
    });
    const [done, open] = (await dispatcher.dispatch([A, B], "swarm")).sessions;
    dispatcher.onCallState("CA-+15550000001", "completed");

    vi.advanceTimersByTime(4_999);
    expect(dispatcher.get(done.id)?.state).toBe("completed");

    vi.advanceTimersByTime(1);
    expect(dispatcher.get(done.id)).toBeNull();
    expect(dispatcher.resolve("CA-+15550000001")).toBeNull();
    expect(dispatcher.resolve("conv-+15550000001")).toBeNull();
    expect(pruned).toEqual([done.id]);
    expect(dispatcher.get(open.id)?.state).toBe("dialing");
    expect(dispatcher.list()).toHaveLength(1);
  });

  it("starts the retention window when the lifetime elapses", async () => {
    vi.useFakeTimers();
    dispatcher = new OutreachDispatcher({ placer: fakePlacer(), sessionLifetimeMs: 1_000, retentionMs: 2_000 });
    const [session] = (await dispatcher.dispatch([A], "solo")).sessions;

    vi.advanceTimersByTime(1_000);
    expect(dispatcher.get(session.id)?.state).toBe("completed");
    vi.advanceTimersByTime(1_999);
    expect(dispatcher.get(session.id)).not.toBeNull();
    vi.advanceTimersByTime(1);
    expect(dispatcher.get(session.id)).toBeNull();
  });
});
