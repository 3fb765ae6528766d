import fetch, { type Response } from "node-fetch";
import { z } from "zod";
import { UpstreamError, errorMessage } from "../errors.js";

const OPENAI_CHAT_URL = "https://api.openai.com/v1/chat/completions";

export const REFINER_SYSTEM_PROMPT = `You write system prompts for an AI voice agent that makes outbound calls (e.g., to receptionists).

Rules:
1. Transform the user's short input into a clear, detailed instruction the voice agent will follow.
2. The resulting instructions MUST tell the voice agent to be extremely concise and avoid long introductions. Receptionists are busy; the agent should state the purpose of the call in the first 10 seconds.
3. The agent has tools available: check_availability and confirm_booking. When booking appointments or checking schedules, instruct the agent to use check_availability to find open slots and confirm_booking to finalize the appointment, passing the provider name, date (YYYY-MM-DD) and time (HH:MM).
4. Output only the refined instruction text, with no meta-commentary or markdown.`;

const completionSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string() }) }))
    .min(1)
});

export interface InstructionRefiner {
  refine(task: string): Promise<string>;
}

export function createOpenAiRefiner(cfg: { apiKey: string; model: string }): InstructionRefiner {
  return {
    async refine(task: string) {
      let resp: Response;
      try {
        resp = await fetch(OPENAI_CHAT_URL, {
          method: "POST",
          headers: {
            Authorization: `Bearer ${cfg.apiKey}`,
            "Content-Type": "application/json"
          },
          body: JSON.stringify({
            model: cfg.model,
            messages: [
              { role: "system", content: REFINER_SYSTEM_PROMPT },
              { role: "user", content: task }
            ],
            temperature: 0.7
          })
        });
      } catch (e) {
        throw new UpstreamError(503, `OpenAI request failed: ${errorMessage(e)}`);
      }

      if (!resp.ok) {
        const text = await resp.text();
        throw new UpstreamError(502, `OpenAI API error: ${text || `HTTP ${resp.status}`}`);
      }
      const parsed = completionSchema.safeParse(await resp.json());
      if (!parsed.success) {
        throw new UpstreamError(502, "OpenAI API error: unexpected response shape");
      }
      return parsed.data.choices[0].message.content.trim();
    }
  };
}

/** Used when no OpenAI key is configured: the task is passed to the agent as written. */
export const passthroughRefiner: InstructionRefiner = {
  async refine(task: string) {
    return task.trim();
  }
};
