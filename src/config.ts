import fs from "fs";
import path from "path";
import type { FunctionToolSchema, ParameterSpec } from "./ports/tools/AgentToolPort";
import { isRecord } from "./shared/guards";
import { deepFreeze } from "./shared/freeze";

export interface ToolConfigEntry {
  class_name: string;
  config: Record<string, unknown>;
  tool_schema?: FunctionToolSchema;
}

export interface AppConfig {
  tools?: ToolConfigEntry[];
}

const DEFAULT_CONFIG_FILENAMES = ["tools.config.json"];

export interface LoadedConfig {
  config: AppConfig;
  path?: string;
}

export function loadConfig(configPath?: string): LoadedConfig {
  const searchPaths = configPath
    ? [configPath]
    : DEFAULT_CONFIG_FILENAMES.map((name) => path.resolve(process.cwd(), name));

  for (const candidate of searchPaths) {
    try {
      const resolved = path.resolve(candidate);
      if (!fs.existsSync(resolved)) continue;
      const raw = fs.readFileSync(resolved, "utf8");
      const parsed: unknown = JSON.parse(raw);
      if (!isRecord(parsed)) {
        console.warn(`Ignoring config at ${resolved}; expected a JSON object.`);
        continue;
      }
      const normalized: AppConfig = {};
      if (Array.isArray(parsed.tools)) {
        normalized.tools = normalizeTools(parsed.tools);
      }
      return { config: normalized, path: resolved };
    } catch (err) {
      console.warn(`Failed to load config from ${candidate}:`, err);
    }
  }

  return { config: {} };
}

function normalizeTools(input: unknown[]): ToolConfigEntry[] {
  const out: ToolConfigEntry[] = [];

  input.forEach((value, index) => {
    if (!isRecord(value) || typeof value.class_name !== "string" || !value.class_name.trim()) {
      console.warn(`Invalid tool configuration at index ${index}; expected an object with class_name.`);
      return;
    }

    const entry: ToolConfigEntry = {
      class_name: value.class_name.trim(),
      config: isRecord(value.config) ? value.config : {},
    };

    if (value.tool_schema !== undefined) {
      const schema = normalizeSchema(value.tool_schema);
      if (schema) {
        entry.tool_schema = schema;
      } else {
        console.warn(
          `Invalid tool_schema for "${entry.class_name}"; falling back to the built-in schema.`
        );
      }
    }

    out.push(entry);
  });

  return out;
}

export function normalizeSchema(value: unknown): FunctionToolSchema | null {
  if (!isRecord(value) || value.type !== "function" || !isRecord(value.function)) return null;
  const fn = value.function;
  if (typeof fn.name !== "string" || !fn.name) return null;

  const params: Record<string, unknown> = isRecord(fn.parameters) ? fn.parameters : {};
  const properties: Record<string, ParameterSpec> = {};
  if (isRecord(params.properties)) {
    for (const [key, spec] of Object.entries(params.properties)) {
      if (!isRecord(spec) || typeof spec.type !== "string") return null;
      properties[key] = {
        type: spec.type,
        ...(typeof spec.description === "string" ? { description: spec.description } : {}),
      };
    }
  }
  const required = Array.isArray(params.required)
    ? params.required.filter((name): name is string => typeof name === "string")
    : [];

  return deepFreeze<FunctionToolSchema>({
    type: "function",
    function: {
      name: fn.name,
      description: typeof fn.description === "string" ? fn.description : "",
      parameters: { type: "object", properties, required },
    },
  });
}
