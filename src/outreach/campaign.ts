import pino from "pino";
import { env } from "../env.js";
import type { OutreachDispatcher } from "../calls/dispatcher.js";
import type { CallTarget, Campaign } from "../calls/types.js";
import type { ProviderDirectory } from "../providers/directory.js";
import { filterByPreferences, rank, topK } from "../providers/ranking.js";
import type { Preferences, ScoredProvider } from "../providers/types.js";
import type { AvailabilityChecker } from "./availability.js";
import type { InstructionRefiner } from "./instructions.js";

const log = pino({ level: env.LOG_LEVEL });

/** Directory placeholder that routes the call to the requesting user's own phone. */
export const USER_TEST_PHONE = "USER_TEST_PHONE";

export type OutreachDeps = {
  dispatcher: Pick<OutreachDispatcher, "dispatch">;
  directory: ProviderDirectory;
  refiner: InstructionRefiner;
  availability: AvailabilityChecker;
  loadPreferences: () => Promise<Preferences>;
  swarmSize: number;
};

export type SoloRequest = { phoneNumber: string; task: string };

export type SwarmRequest = {
  userPhone: string;
  objective: string;
  preferences?: Partial<Pick<Preferences, "maxDistance" | "minRating">>;
};

export type SwarmLaunch = {
  campaign: Campaign;
  ranked: ScoredProvider[];
  freeSlots: string[];
  preferences: Preferences;
};

export function resolveDialNumber(provider: Pick<ScoredProvider, "phone">, userPhone: string): string {
  return provider.phone === USER_TEST_PHONE ? userPhone : provider.phone;
}

export function buildProviderPrompt(opts: {
  provider: ScoredProvider;
  preferredTime: string;
  freeSlots: string[];
  instruction: string;
}): string {
  const p = opts.provider;
  return [
    `You are calling ${p.name}.`,
    `They have a match score of ${Math.round(p.score * 100)} and are ${p.distanceMiles} miles away.`,
    `They are ranked #${p.rank}.`,
    `Your goal is to negotiate a ${opts.preferredTime} slot.`,
    `The user is free during these times: ${opts.freeSlots.join(", ")}.`,
    `Only request slots that fall within these windows. ${opts.instruction}`
  ].join(" ");
}

export async function startSolo(deps: OutreachDeps, req: SoloRequest): Promise<Campaign> {
  log.info({ phone: req.phoneNumber }, "solo objective received");
  const prompt = await deps.refiner.refine(req.task);
  const target: CallTarget = { kind: "phone", phone: req.phoneNumber, prompt };
  const campaign = await deps.dispatcher.dispatch([target], "solo");
  log.info({ campaignId: campaign.id, state: campaign.sessions[0]?.state }, "solo call dispatched");
  return campaign;
}

/**
 * Ranks the directory against the user's preferences and calls the top providers at once,
 * each with a prompt tailored to its rank and the user's free windows.
 */
export async function startSwarm(deps: OutreachDeps, req: SwarmRequest): Promise<SwarmLaunch> {
  log.info({ userPhone: req.userPhone }, "swarm objective received");
  const filePrefs = await deps.loadPreferences();
  const preferences: Preferences = {
    maxDistance: req.preferences?.maxDistance ?? filePrefs.maxDistance,
    minRating: req.preferences?.minRating ?? filePrefs.minRating,
    preferredTime: filePrefs.preferredTime
  };

  const providers = await deps.directory.load();
  const ranked = topK(rank(filterByPreferences(providers, preferences)), deps.swarmSize);

  const [freeSlots, instruction] = await Promise.all([
    deps.availability.freeSlots(preferences.preferredTime),
    deps.refiner.refine(req.objective)
  ]);

  const targets: CallTarget[] = ranked.map((provider) => ({
    kind: "provider",
    provider,
    phone: resolveDialNumber(provider, req.userPhone),
    prompt: buildProviderPrompt({ provider, preferredTime: preferences.preferredTime, freeSlots, instruction })
  }));

  log.info({ providers: ranked.map((p) => p.name) }, "swarm deployed");
  const campaign = await deps.dispatcher.dispatch(targets, "swarm");
  log.info(
    { campaignId: campaign.id, placed: campaign.sessions.filter((s) => s.state !== "failed").length, total: campaign.sessions.length },
    "swarm calls dispatched"
  );
  return { campaign, ranked, freeSlots, preferences };
}
