/**
 * test-call.ts
 *
 * Places a plain Twilio call (no agent) that reads one sentence, to check the line and the
 * destination number independently of the voice agent.
 *
 * Usage:  npx tsx scripts/test-call.ts +15550100199
 */

import twilio from "twilio";
import { env } from "../src/env.js";
import { getTwilioClient } from "../src/twilio/client.js";

async function main() {
  const to = process.argv[2];
  if (!to) {
    console.error("Usage: npx tsx scripts/test-call.ts <destination number>");
    process.exit(1);
  }
  if (!env.TWILIO_CALLER_NUMBER) {
    console.error("❌ TWILIO_CALLER_NUMBER must be set in .env");
    process.exit(1);
  }

  const vr = new twilio.twiml.VoiceResponse();
  vr.say({ voice: "Polly.Joanna" }, "This is a test call. If you hear this, the line works.");

  console.log(`📞 Calling ${to} from ${env.TWILIO_CALLER_NUMBER}...`);
  const call = await getTwilioClient().calls.create({
    twiml: vr.toString(),
    to,
    from: env.TWILIO_CALLER_NUMBER
  });
  console.log(`✅ Call initiated. SID: ${call.sid}`);
}

main().catch((err) => {
  console.error("❌ Call failed:", err instanceof Error ? err.message : err);
  process.exit(1);
});
