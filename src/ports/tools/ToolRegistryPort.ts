import type { ChatCompletionTool } from "openai/resources";
import type {
  AgentTool,
  ToolCallExtras,
  ToolDescriptor,
  ToolExecutionResult,
} from "./AgentToolPort";

export interface ToolRegistryPort {
  names(): string[];
  list(): ToolDescriptor[];
  specs(): ChatCompletionTool[];
  get(name: string): AgentTool | undefined;
  invoke(
    name: string,
    parameters: Record<string, unknown>,
    extra?: ToolCallExtras
  ): Promise<ToolExecutionResult>;
}
