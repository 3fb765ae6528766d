/**
 * check-agent.ts
 *
 * Prints the ElevenLabs agent's voice, first message and security block, and warns when
 * per-call prompt overrides look disabled (swarm calls rely on them).
 *
 * Usage:  npx tsx scripts/check-agent.ts
 */

import fetch from "node-fetch";
import { z } from "zod";
import { env } from "../src/env.js";

const agentSchema = z
  .object({
    name: z.string().nullish(),
    conversation_config: z
      .object({
        tts: z.object({ voice_id: z.string().nullish() }).partial().nullish(),
        agent: z.object({ first_message: z.string().nullish() }).partial().nullish()
      })
      .partial()
      .nullish(),
    platform_settings: z
      .object({ security: z.record(z.unknown()).nullish() })
      .partial()
      .nullish()
  })
  .passthrough();

async function main() {
  if (!env.ELEVENLABS_API_KEY || !env.AGENT_ID) {
    console.error("❌ ELEVENLABS_API_KEY and AGENT_ID must be set in .env");
    process.exit(1);
  }

  console.log(`🕵️  Checking agent ${env.AGENT_ID}...`);
  const resp = await fetch(`https://api.elevenlabs.io/v1/convai/agents/${env.AGENT_ID}`, {
    headers: { "xi-api-key": env.ELEVENLABS_API_KEY }
  });

  if (!resp.ok) {
    console.error(`❌ Could not fetch agent. Status: ${resp.status}`);
    console.error(`   ${await resp.text()}`);
    process.exit(1);
  }

  const agent = agentSchema.parse(await resp.json());
  const security = agent.platform_settings?.security ?? {};

  console.log("\n── Agent ──────────────────────────────");
  console.log(`Name:          ${agent.name ?? "(unnamed)"}`);
  console.log(`Voice ID:      ${agent.conversation_config?.tts?.voice_id ?? "(default)"}`);
  console.log(`First message: ${agent.conversation_config?.agent?.first_message ?? "(none)"}`);
  console.log("\n── Security ───────────────────────────");
  console.log(JSON.stringify(security, null, 2));

  const anyEnabled = Object.values(security).some((v) => v === true);
  console.log("\n── Diagnosis ──────────────────────────");
  console.log(
    anyEnabled
      ? "✅ Overrides appear to be allowed."
      : "❌ Overrides look disabled; per-call prompts will be ignored. Run scripts/update-agent.ts."
  );
}

main().catch((err) => {
  console.error("❌", err instanceof Error ? err.message : err);
  process.exit(1);
});
