/**
 * update-agent.ts
 *
 * Sets the agent's default voice and opening line and unlocks prompt overrides so each swarm
 * call can carry its own provider-specific prompt.
 *
 * Usage:  AGENT_VOICE_ID=<voice id> npx tsx scripts/update-agent.ts
 */

import fetch from "node-fetch";
import { env } from "../src/env.js";

const VOICE_ID = process.env.AGENT_VOICE_ID ?? "cgSgspJ2msm6clMCkdW9";
const FIRST_MESSAGE =
  process.env.AGENT_FIRST_MESSAGE ?? "Hello, I'm calling to book an appointment for my client.";

async function main() {
  if (!env.ELEVENLABS_API_KEY || !env.AGENT_ID) {
    console.error("❌ ELEVENLABS_API_KEY and AGENT_ID must be set in .env");
    process.exit(1);
  }

  console.log(`🔧 Updating agent ${env.AGENT_ID}...`);
  console.log(`   voice:         ${VOICE_ID}`);
  console.log(`   first message: "${FIRST_MESSAGE}"`);

  const resp = await fetch(`https://api.elevenlabs.io/v1/convai/agents/${env.AGENT_ID}`, {
    method: "PATCH",
    headers: { "xi-api-key": env.ELEVENLABS_API_KEY, "Content-Type": "application/json" },
    body: JSON.stringify({
      conversation_config: {
        agent: { first_message: FIRST_MESSAGE, language: "en" },
        tts: { voice_id: VOICE_ID }
      },
      platform_settings: {
        security: { allow_custom_rules: true, allow_banned_terms: true }
      }
    })
  });

  if (!resp.ok) {
    console.error(`❌ Update failed. Status: ${resp.status}`);
    console.error(`   ${await resp.text()}`);
    process.exit(1);
  }
  console.log("✅ Agent updated. Restart the server before placing calls.");
}

main().catch((err) => {
  console.error("❌", err instanceof Error ? err.message : err);
  process.exit(1);
});
