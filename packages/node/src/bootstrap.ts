/**
 * Wires an ExposureService from configuration: JSONL stores under
 * DATA_DIR and the disclosure server client.
 */

import { join } from "node:path";
import type { Logger } from "pino";
import { ExposureApiClient } from "@exposure/sdk";
import {
  FileCheckpointStore,
  JsonlObservationStore,
  JsonlOwnKeyStore,
} from "@exposure/store";
import type { AppConfig } from "./config.js";
import { ExposureService } from "./services/exposure-service.js";

export function createNodeService(config: AppConfig, logger: Logger): ExposureService {
  const observations = new JsonlObservationStore({
    filePath: join(config.DATA_DIR, "observations.jsonl"),
  });
  const ownKeys = new JsonlOwnKeyStore({ filePath: join(config.DATA_DIR, "own-keys.jsonl") });

  if (observations.skippedLines > 0 || ownKeys.skippedLines > 0) {
    logger.warn(
      { observations: observations.skippedLines, ownKeys: ownKeys.skippedLines },
      "Skipped unreadable store lines",
    );
  }

  const client = new ExposureApiClient({
    baseUrl: config.API_BASE_URL,
    timeout: config.API_TIMEOUT_MS,
    retries: config.API_RETRIES,
    logger: logger.child({ component: "sdk" }),
  });

  return new ExposureService({
    observations,
    ownKeys,
    checkpoints: new FileCheckpointStore(join(config.DATA_DIR, "checkpoint.json")),
    keyClient: client,
    reportClient: client,
    windowSeconds: config.WINDOW_SECONDS,
    lookbackWindows: config.LOOKBACK_WINDOWS,
    keyWindowCount: config.KEY_WINDOW_COUNT,
    reportKeyCount: config.REPORT_KEY_COUNT,
    noOwnKeys: config.NO_OWN_KEYS_POLICY,
    logger,
  });
}
