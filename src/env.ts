import { z } from "zod";
import dotenv from "dotenv";

dotenv.config();

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const envSchema = z.object({
  PORT: z.coerce.number().default(3000),
  PUBLIC_BASE_URL: optionalString.pipe(z.string().url().optional()),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),

  // Outbound calls go through an ElevenLabs conversational agent bridged to Twilio.
  // All three are needed to place a call; /status reports which are missing.
  ELEVENLABS_API_KEY: optionalString,
  AGENT_ID: optionalString,
  AGENT_PHONE_NUMBER_ID: optionalString,

  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: z.string().default("gpt-4o"),

  // Number of top-ranked providers called in swarm mode.
  SWARM_SIZE: z.coerce.number().int().min(1).max(10).default(3),
  SESSION_LIFETIME_MS: z.coerce.number().int().positive().default(10 * 60 * 1000),
  // Terminal sessions stay resolvable for dedup this long, then are dropped.
  SESSION_RETENTION_MS: z.coerce.number().int().positive().default(30 * 60 * 1000),

  PROVIDERS_PATH: z.string().default("./data/providers.json"),
  USER_PREFERENCES_PATH: z.string().default("./data/user_preferences.json"),
  CHECK_AVAILABILITY_URL: optionalString,

  BOOKING_WEBHOOK_URL: optionalString,
  WEBHOOK_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),

  GOOGLE_SERVICE_ACCOUNT_JSON_PATH: optionalString,
  GOOGLE_CALENDAR_ID: z.string().default("primary"),
  CALENDAR_TIMEZONE: z.string().default("America/New_York"),
  CALENDAR_EVENT_MINUTES: z.coerce.number().int().positive().default(60),

  TWILIO_ACCOUNT_SID: optionalString,
  TWILIO_AUTH_TOKEN: optionalString,
  TWILIO_VALIDATE_SIGNATURE: z
    .enum(["true", "false"])
    .default("false")
    .transform((v) => v === "true"),
  // Source number for the line-check script only; real calls use AGENT_PHONE_NUMBER_ID.
  TWILIO_CALLER_NUMBER: optionalString
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  return envSchema.parse(source);
}

export const env: Env = parseEnv(process.env);
