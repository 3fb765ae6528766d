import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { OutreachDispatcher } from "../calls/dispatcher.js";
import type { ProviderDirectory } from "../providers/directory.js";
import { fakePlacer, makeProvider } from "../test-utils/fixtures.js";
import { USER_TEST_PHONE, buildProviderPrompt, resolveDialNumber, startSolo, startSwarm, type OutreachDeps } from "./campaign.js";

const directory: ProviderDirectory = {
  async load() {
    return [
      makeProvider({ id: "a", name: "Brightside Dental", phone: "+15550000001", rating: 4.8, distanceMiles: 2.1, availability: 0.9 }),
      makeProvider({ id: "b", name: "Harbor Family Dentistry", phone: "+15550000002", rating: 4.2, distanceMiles: 0.5, availability: 0.95 }),
      makeProvider({ id: "c", name: "Low Rated Clinic", phone: "+15550000003", rating: 3.5, distanceMiles: 1, availability: 1 }),
      makeProvider({ id: "d", name: "Faraway Dental", phone: "+15550000004", rating: 4.9, distanceMiles: 9, availability: 0.8 }),
      makeProvider({ id: "t", name: "Test Line", phone: USER_TEST_PHONE, rating: 4.5, distanceMiles: 1, availability: 0.5 })
    ];
  }
};

describe("outreach campaigns", () => {
  let dispatcher: OutreachDispatcher;
  let placer: ReturnType<typeof fakePlacer>;
  let deps: OutreachDeps;

  beforeEach(() => {
    placer = fakePlacer();
    dispatcher = new OutreachDispatcher({ placer, sessionLifetimeMs: 60_000 });
    deps = {
      dispatcher,
      directory,
      refiner: { refine: vi.fn(async () => "REFINED") },
      availability: { freeSlots: vi.fn(async () => ["09:00-11:00"]) },
      loadPreferences: async () => ({ maxDistance: 5, minRating: 4, preferredTime: "morning" }),
      swarmSize: 2
    };
  });

  afterEach(() => dispatcher.close());

  it("dials a single number with the refined task", async () => {
    const campaign = await startSolo(deps, { phoneNumber: "+15550001111", task: "book a cleaning" });

    expect(deps.refiner.refine).toHaveBeenCalledWith("book a cleaning");
    expect(campaign.mode).toBe("solo");
    expect(campaign.sessions).toHaveLength(1);
    expect(campaign.sessions[0].state).toBe("dialing");
    expect(placer.calls).toEqual([{ kind: "phone", phone: "+15550001111", prompt: "REFINED" }]);
  });

  it("calls the top-ranked providers that match the preferences", async () => {
    const launch = await startSwarm(deps, { userPhone: "+15550009999", objective: "book a cleaning" });

    expect(launch.ranked.map((p) => p.id)).toEqual(["a", "t"]);
    expect(launch.freeSlots).toEqual(["09:00-11:00"]);
    expect(deps.availability.freeSlots).toHaveBeenCalledWith("morning");
    expect(launch.campaign.sessions.map((s) => s.state)).toEqual(["dialing", "dialing"]);
    expect(placer.calls.map((t) => t.phone)).toEqual(["+15550000001", "+15550009999"]);
    expect(placer.calls[0].prompt).toBe(
      "You are calling Brightside Dental. They have a match score of 82 and are 2.1 miles away. " +
        "They are ranked #1. Your goal is to negotiate a morning slot. " +
        "The user is free during these times: 09:00-11:00. Only request slots that fall within these windows. REFINED"
    );
  });

  it("lets the request loosen the stored preferences", async () => {
    const launch = await startSwarm(
      { ...deps, swarmSize: 10 },
      { userPhone: "+15550009999", objective: "book a cleaning", preferences: { minRating: 3 } }
    );
    expect(launch.preferences).toEqual({ maxDistance: 5, minRating: 3, preferredTime: "morning" });
    expect(launch.ranked.map((p) => p.id).sort()).toEqual(["a", "b", "c", "t"]);
  });

  it("launches an empty campaign when nobody matches", async () => {
    const launch = await startSwarm(deps, {
      userPhone: "+15550009999",
      objective: "book a cleaning",
      preferences: { minRating: 5 }
    });
    expect(launch.ranked).toEqual([]);
    expect(launch.campaign.sessions).toEqual([]);
    expect(placer.calls).toEqual([]);
  });
});

describe("resolveDialNumber", () => {
  it("routes the test placeholder to the user's phone", () => {
    expect(resolveDialNumber({ phone: USER_TEST_PHONE }, "+15550009999")).toBe("+15550009999");
    expect(resolveDialNumber({ phone: "+15550000001" }, "+15550009999")).toBe("+15550000001");
  });
});

describe("buildProviderPrompt", () => {
  it("lists every free window", () => {
    const prompt = buildProviderPrompt({
      provider: { ...makeProvider({ id: "a", name: "Clinic A", distanceMiles: 3 }), score: 0.456, rank: 2 },
      preferredTime: "afternoon",
      freeSlots: ["13:00-14:00", "16:00-17:00"],
      instruction: "Be brief."
    });
    expect(prompt).toBe(
      "You are calling Clinic A. They have a match score of 46 and are 3 miles away. They are ranked #2. " +
        "Your goal is to negotiate a afternoon slot. The user is free during these times: 13:00-14:00, 16:00-17:00. " +
        "Only request slots that fall within these windows. Be brief."
    );
  });
});
