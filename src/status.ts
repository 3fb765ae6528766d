import type { Env } from "./env.js";
import type { BookingSinks } from "./sinks/index.js";

export const CALL_PLACEMENT_KEYS = ["ELEVENLABS_API_KEY", "AGENT_ID", "AGENT_PHONE_NUMBER_ID"] as const;

export type ServiceStatus = {
  callPlacement: { configured: boolean; missing: string[] };
  instructionRefinement: boolean;
  calendarConfigured: boolean;
  webhookConfigured: boolean;
  swarmSize: number;
};

export function missingCallPlacementKeys(cfg: Pick<Env, (typeof CALL_PLACEMENT_KEYS)[number]>): string[] {
  return CALL_PLACEMENT_KEYS.filter((k) => !cfg[k]);
}

export function serviceStatus(cfg: Env, sinks: BookingSinks): ServiceStatus {
  const missing = missingCallPlacementKeys(cfg);
  return {
    callPlacement: { configured: missing.length === 0, missing },
    instructionRefinement: Boolean(cfg.OPENAI_API_KEY),
    calendarConfigured: sinks.calendar !== null,
    webhookConfigured: sinks.webhook !== null,
    swarmSize: cfg.SWARM_SIZE
  };
}
