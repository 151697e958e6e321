export type ParameterSpec = {
  type: string;
  description?: string;
  enum?: string[];
};

export type ParametersSchema = {
  type: "object";
  properties: Record<string, ParameterSpec>;
  required: string[];
};

// OpenAI "function tool" shape, as handed to the model
export interface FunctionToolSchema {
  type: "function";
  function: {
    name: string;
    description: string;
    parameters: ParametersSchema;
  };
}

/** Flattened view of a tool used for listing. */
export interface ToolDescriptor {
  name: string;
  description: string;
  parameters: Record<string, ParameterSpec>;
  required: string[];
}

/**
 * Auxiliary arguments the orchestration layer passes alongside a call.
 * `tools_kwargs` carries per-example context that the model never sees.
 */
export interface ToolCallExtras {
  tools_kwargs?: Record<string, unknown>;
  [key: string]: unknown;
}

export interface ToolExecutionResult {
  message: string;
  score: number;
  metadata: Record<string, unknown>;
}

/**
 * Lifecycle every tool satisfies. The host calls `create` once per episode,
 * `execute` zero or more times with the returned id, then `release`.
 */
export interface AgentTool {
  readonly name: string;
  getSchema(): FunctionToolSchema;
  create(instanceId?: string, groundTruth?: string, extra?: ToolCallExtras): Promise<string>;
  execute(
    instanceId: string,
    parameters: Record<string, unknown>,
    extra?: ToolCallExtras
  ): Promise<ToolExecutionResult>;
  release(instanceId: string, extra?: ToolCallExtras): Promise<void>;
}

export function toToolDescriptor(schema: FunctionToolSchema): ToolDescriptor {
  return {
    name: schema.function.name,
    description: schema.function.description,
    parameters: schema.function.parameters.properties,
    required: schema.function.parameters.required,
  };
}
