#!/usr/bin/env node
import { buildToolRegistry } from "./composition/container";
import { initializeLogging } from "./runtime/logging";
import { loadConfig } from "./config";
import { isRecord } from "./shared/guards";
import {
  CONFIG_PATH,
  EXAMPLE_NAME,
  FSTAR_VERIFIER_SERVER_HOST,
  LOG_FILE,
  TOOL_LOG_LEVEL,
  TOOL_NAME,
  TOOL_PARAMS,
} from "./env";

function parseParams(raw: string | undefined): Record<string, unknown> {
  if (!raw || !raw.trim()) return {};
  const parsed: unknown = JSON.parse(raw);
  if (!isRecord(parsed)) {
    throw new Error("--params must be a JSON object.");
  }
  return parsed;
}

async function main() {
  const loggingHandle = initializeLogging(LOG_FILE);
  if (loggingHandle.logPath) {
    console.info(`Logging output to ${loggingHandle.logPath}`);
  }

  try {
    const { config, path: configPath } = loadConfig(CONFIG_PATH);
    if (configPath) {
      console.info(`Loaded config from ${configPath}`);
    } else if (CONFIG_PATH) {
      console.warn(`Config file ${CONFIG_PATH} not found; registering default tools.`);
    }

    const registry = buildToolRegistry(config, {
      verifierHost: FSTAR_VERIFIER_SERVER_HOST,
      logLevel: TOOL_LOG_LEVEL,
    });

    if (!TOOL_NAME) {
      console.log(JSON.stringify(registry.specs(), null, 2));
      return;
    }

    const extra = EXAMPLE_NAME ? { tools_kwargs: { example_name: EXAMPLE_NAME } } : {};
    const result = await registry.invoke(TOOL_NAME, parseParams(TOOL_PARAMS), extra);
    console.log(result.message);
  } finally {
    await loggingHandle.shutdown();
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
