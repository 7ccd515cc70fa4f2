#!/usr/bin/env node
import { randomUUID } from "node:crypto";
import { parseArgs } from "node:util";
import { buildApp } from "./app.js";
import { env } from "./config.js";
import { appendSessionEvent, closeDb, healthcheckDb } from "./db.js";
import { logger } from "./logger.js";
import { launchMcpSessions, loadMcpServersConfig } from "./services/backends/launcher.js";
import { registerBackendSessions } from "./services/capabilities/discovery.js";
import { CapabilityRegistry } from "./services/capabilities/registry.js";
import { CapabilityRouter } from "./services/capabilities/router.js";
import { startOperatorConsole } from "./services/voice/console.js";
import { GeminiLivePeer } from "./services/voice/gemini-live.js";
import { loadSystemInstruction } from "./services/voice/instructions.js";
import { SessionOrchestrator } from "./services/voice/orchestrator.js";
import { SessionEventBus } from "./services/voice/session-events.js";
import { SessionLogFile, attachEventStore } from "./services/voice/session-log.js";
import { SoxCapture, SoxPlayback } from "./services/voice/sox-audio.js";

function parseCliArgs(argv: string[]): { muted: boolean; mcpConfigPath: string } {
  const { values } = parseArgs({
    args: argv,
    options: {
      muted: { type: "boolean", default: false },
      "mcp-config": { type: "string" }
    }
  });

  return {
    muted: values.muted === true || env.START_MUTED,
    mcpConfigPath: values["mcp-config"] ?? env.MCP_CONFIG_PATH
  };
}

async function start(): Promise<number> {
  const args = parseCliArgs(process.argv.slice(2));
  if (!env.GEMINI_API_KEY) {
    throw new Error("GEMINI_API_KEY is required to start a voice session");
  }

  const sessionId = randomUUID();
  const startedAt = new Date();
  const log = logger.child({ session_id: sessionId });

  const registry = new CapabilityRegistry(logger.child({ component: "registry" }));
  const router = new CapabilityRouter({
    registry,
    logger: logger.child({ component: "router" }),
    timeoutMs: env.TOOL_CALL_TIMEOUT_MS
  });

  const servers = await loadMcpServersConfig(args.mcpConfigPath, logger);
  const backends = await launchMcpSessions(servers, {
    logger: logger.child({ component: "backend" }),
    requestTimeoutMs: env.TOOL_CALL_TIMEOUT_MS
  });
  await registerBackendSessions(backends, registry, router, logger.child({ component: "discovery" }));

  const events = new SessionEventBus(logger.child({ component: "events" }));
  const sessionLog = await SessionLogFile.open(env.SESSION_LOG_DIR, startedAt, logger);
  const detachSessionLog = sessionLog.attach(events);
  let eventStore: ReturnType<typeof attachEventStore> | null = null;
  try {
    if (await healthcheckDb()) {
      eventStore = attachEventStore(events, sessionId, appendSessionEvent, logger);
    }
  } catch (error) {
    logger.warn({ error }, "session event store unavailable, continuing without it");
  }

  const orchestrator = new SessionOrchestrator({
    peer: new GeminiLivePeer({
      url: env.GEMINI_LIVE_URL,
      apiKey: env.GEMINI_API_KEY,
      model: env.GEMINI_LIVE_MODEL,
      inputSampleRateHz: env.AUDIO_INPUT_SAMPLE_RATE_HZ,
      setupTimeoutMs: env.GEMINI_SETUP_TIMEOUT_MS,
      logger: logger.child({ component: "gemini" })
    }),
    capture: new SoxCapture({
      command: env.AUDIO_CAPTURE_COMMAND,
      sampleRateHz: env.AUDIO_INPUT_SAMPLE_RATE_HZ,
      chunkSamples: env.AUDIO_CHUNK_SAMPLES,
      device: env.AUDIO_CAPTURE_DEVICE,
      logger: logger.child({ component: "capture" })
    }),
    playbackSink: new SoxPlayback({
      command: env.AUDIO_PLAYBACK_COMMAND,
      sampleRateHz: env.AUDIO_OUTPUT_SAMPLE_RATE_HZ,
      logger: logger.child({ component: "playback" })
    }),
    registry,
    router,
    events,
    logger: log,
    systemInstruction: await loadSystemInstruction(env.SYSTEM_INSTRUCTION_PATH),
    googleSearch: env.GEMINI_GOOGLE_SEARCH_ENABLED,
    startMuted: args.muted,
    outputSampleRateHz: env.AUDIO_OUTPUT_SAMPLE_RATE_HZ,
    drainGraceMs: env.PLAYBACK_DRAIN_GRACE_MS
  });

  const operatorConsole = startOperatorConsole({
    session: orchestrator,
    events,
    listCapabilities: () => registry.list(),
    input: process.stdin,
    output: process.stdout,
    logger: logger.child({ component: "console" })
  });

  const api = env.OPERATOR_API_ENABLED
    ? buildApp({
        session: orchestrator,
        events,
        listCapabilities: () => registry.list(),
        logger: logger.child({ component: "operator_api" }),
        authToken: env.OPERATOR_AUTH_TOKEN
      })
    : null;

  let interrupts = 0;
  process.on("SIGINT", () => {
    interrupts += 1;
    if (interrupts > 1) {
      process.exit(130);
    }
    log.info("interrupt received, closing session");
    void orchestrator.quit();
  });

  try {
    if (api) {
      await api.listen({ host: env.HOST, port: env.PORT });
    }
    await orchestrator.start();
    const reason = await orchestrator.closed;
    log.info({ reason }, "voice session ended");
    return reason === "transport_failure" ? 1 : 0;
  } finally {
    operatorConsole.close();
    await api?.close();
    await router.close();
    detachSessionLog();
    await sessionLog.close();
    if (eventStore) {
      eventStore.detach();
      await eventStore.flush();
    }
    await closeDb();
  }
}

start()
  .then((code) => {
    process.exit(code);
  })
  .catch((error: unknown) => {
    logger.fatal({ error }, "voice-bridge failed");
    process.exit(1);
  });
