#!/usr/bin/env node
/**
 * WebRTC Voice Bridge
 *
 * Bridges a browser's WebRTC audio to a voice-AI call: the browser posts
 * its SDP offer, the bridge answers, then relays G.711/Opus audio to the
 * voice service as PCM and sends the service's replies back as PCMU.
 *
 * Configuration comes from the environment (PORT, BIND, VOICE_API_KEY,
 * VOICE_API_BASE_URL, VOICE_MODEL, VOICE_NAME, VOICE_SYSTEM_PROMPT,
 * VOICE_GREETING, LOG_LEVEL).
 */

import { loadConfigFromEnv } from "./src/config.js";
import { createConsoleLogger } from "./src/logger.js";
import { createVoiceBridgeRuntime } from "./src/runtime.js";

async function main(): Promise<void> {
  const config = loadConfigFromEnv();
  const logger = createConsoleLogger(config.logLevel);
  const runtime = createVoiceBridgeRuntime({ config, logger });

  await runtime.start();
  logger.info(
    `[webrtc-voice] Ready on http://${config.serve.bind}:${runtime.server.port}` +
      ` (POST ${config.serve.offerPath}, observer ${config.serve.observerPath})`
  );

  let stopping = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;
    logger.info(`[webrtc-voice] ${signal} received, shutting down`);
    runtime
      .stop()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error("[webrtc-voice] Shutdown failed:", err);
        process.exit(1);
      });
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err: unknown) => {
  console.error("[webrtc-voice] Failed to start:", err);
  process.exit(1);
});
