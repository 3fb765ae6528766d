import fetch from "node-fetch";
import { z } from "zod";
import { errorMessage } from "../errors.js";
import type { CallPlacer, CallTarget, PlacementResult } from "./types.js";

export const ELEVENLABS_OUTBOUND_URL = "https://api.elevenlabs.io/v1/convai/twilio/outbound-call";

export type ElevenLabsConfig = {
  apiKey: string;
  agentId: string;
  phoneNumberId: string;
};

const outboundResponseSchema = z.object({
  conversation_id: z.string().nullish(),
  callSid: z.string().nullish()
});

const errorBodySchema = z.object({
  detail: z.unknown().optional(),
  message: z.unknown().optional()
});

function describeError(text: string, fallback: string): string {
  try {
    const parsed = errorBodySchema.safeParse(JSON.parse(text));
    if (parsed.success) {
      const detail = parsed.data.detail ?? parsed.data.message;
      if (typeof detail === "string") return detail;
      if (detail !== undefined) return JSON.stringify(detail);
    }
  } catch {
    // not JSON; use the raw body
  }
  return text || fallback;
}

export function buildOutboundPayload(cfg: ElevenLabsConfig, target: CallTarget) {
  return {
    agent_id: cfg.agentId,
    agent_phone_number_id: cfg.phoneNumberId,
    to_number: target.phone,
    ...(target.prompt
      ? {
          conversation_initiation_client_data: {
            conversation_config_override: {
              agent: { prompt: { prompt: target.prompt } }
            }
          }
        }
      : {})
  };
}

/** Places calls through the ElevenLabs agent's Twilio outbound endpoint. */
export function createElevenLabsPlacer(cfg: ElevenLabsConfig): CallPlacer {
  return {
    async startCall(target: CallTarget): Promise<PlacementResult> {
      try {
        const resp = await fetch(ELEVENLABS_OUTBOUND_URL, {
          method: "POST",
          headers: {
            "xi-api-key": cfg.apiKey,
            "Content-Type": "application/json"
          },
          body: JSON.stringify(buildOutboundPayload(cfg, target))
        });

        if (!resp.ok) {
          const text = await resp.text();
          return { ok: false, error: describeError(text, `HTTP ${resp.status}`) };
        }
        const data = outboundResponseSchema.parse(await resp.json());
        return {
          ok: true,
          ref: { conversationId: data.conversation_id ?? null, callSid: data.callSid ?? null }
        };
      } catch (e) {
        return { ok: false, error: errorMessage(e) };
      }
    }
  };
}
