import twilio from "twilio";
import { env } from "../env.js";
import { ConfigError } from "../errors.js";

let client: ReturnType<typeof twilio> | null = null;

/** Lazily built REST client; only the line-check script places calls through it directly. */
export function getTwilioClient() {
  if (client) return client;
  const sid = env.TWILIO_ACCOUNT_SID;
  const token = env.TWILIO_AUTH_TOKEN;
  if (!sid || !token) {
    throw new ConfigError([...(sid ? [] : ["TWILIO_ACCOUNT_SID"]), ...(token ? [] : ["TWILIO_AUTH_TOKEN"])]);
  }
  client = twilio(sid, token);
  return client;
}
