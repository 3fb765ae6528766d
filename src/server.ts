import http from "node:http";
import pino from "pino";

import { env } from "./env.js";
import { ConfigError } from "./errors.js";
import { createApp } from "./app.js";
import { BookingConsolidator } from "./bookings/consolidator.js";
import { TelemetryStore } from "./bookings/telemetry.js";
import { OutreachDispatcher } from "./calls/dispatcher.js";
import { createElevenLabsPlacer } from "./calls/elevenlabs.js";
import type { CallPlacer } from "./calls/types.js";
import { createFileDirectory, loadPreferences } from "./providers/directory.js";
import { createAvailabilityChecker } from "./outreach/availability.js";
import type { OutreachDeps } from "./outreach/campaign.js";
import { createOpenAiRefiner, passthroughRefiner } from "./outreach/instructions.js";
import { createEventHub, type OutreachEvent } from "./realtime/events.js";
import { createSinks } from "./sinks/index.js";
import { missingCallPlacementKeys, serviceStatus } from "./status.js";

const log = pino({ level: env.LOG_LEVEL });

// Stands in until ELEVENLABS_* settings exist; routes that dial refuse earlier with a ConfigError.
const unconfiguredPlacer: CallPlacer = {
  async startCall() {
    return { ok: false, error: "call placement is not configured" };
  }
};

async function main() {
  const sinks = createSinks(env);
  const directory = createFileDirectory(env.PROVIDERS_PATH);

  // The hub needs the HTTP server, which needs the app; publish is wired once it exists.
  let publish: (event: OutreachEvent) => void = () => {};

  const placer =
    env.ELEVENLABS_API_KEY && env.AGENT_ID && env.AGENT_PHONE_NUMBER_ID
      ? createElevenLabsPlacer({
          apiKey: env.ELEVENLABS_API_KEY,
          agentId: env.AGENT_ID,
          phoneNumberId: env.AGENT_PHONE_NUMBER_ID
        })
      : unconfiguredPlacer;

  const dispatcher = new OutreachDispatcher({
    placer,
    sessionLifetimeMs: env.SESSION_LIFETIME_MS,
    retentionMs: env.SESSION_RETENTION_MS,
    callbacks: {
      onSessionUpdate: (session) => publish({ type: "session", session }),
      onSessionPruned: (sessionId) => consolidator.forget(sessionId)
    }
  });

  const consolidator = new BookingConsolidator({
    store: new TelemetryStore(),
    sessions: dispatcher,
    sinks,
    callbacks: { onBookingUpdate: (booking) => publish({ type: "booking", booking }) }
  });

  const outreachDeps: OutreachDeps = {
    dispatcher,
    directory,
    refiner: env.OPENAI_API_KEY
      ? createOpenAiRefiner({ apiKey: env.OPENAI_API_KEY, model: env.OPENAI_MODEL })
      : passthroughRefiner,
    availability: createAvailabilityChecker(env.CHECK_AVAILABILITY_URL),
    loadPreferences: () => loadPreferences(env.USER_PREFERENCES_PATH),
    swarmSize: env.SWARM_SIZE
  };

  const app = createApp({
    dispatcher,
    consolidator,
    directory,
    outreach: () => {
      const missing = missingCallPlacementKeys(env);
      if (missing.length > 0) throw new ConfigError(missing);
      return outreachDeps;
    },
    status: () => serviceStatus(env, sinks),
    twilio: {
      authToken: env.TWILIO_AUTH_TOKEN,
      validateSignature: env.TWILIO_VALIDATE_SIGNATURE,
      publicBaseUrl: env.PUBLIC_BASE_URL
    }
  });

  const server = http.createServer(app);
  const hub = createEventHub(server, () => ({
    sessions: dispatcher.list(),
    bookings: consolidator.history()
  }));
  publish = hub.publish;

  const status = serviceStatus(env, sinks);
  if (!status.callPlacement.configured) {
    log.warn({ missing: status.callPlacement.missing }, "call placement not configured; dispatch routes will refuse");
  }
  log.info(
    { calendar: status.calendarConfigured, webhook: status.webhookConfigured, swarmSize: env.SWARM_SIZE },
    "booking sinks"
  );

  const shutdown = (signal: string) => {
    log.info({ signal }, "shutting down");
    dispatcher.close();
    hub
      .close()
      .then(() => consolidator.whenIdle())
      .catch((err) => log.warn({ err }, "error while closing event hub"))
      .finally(() => server.close(() => process.exit(0)));
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  server.listen(env.PORT, () => {
    log.info({ port: env.PORT }, "server listening");
  });
}

main().catch((err) => {
  log.error({ err }, "fatal");
  process.exit(1);
});
