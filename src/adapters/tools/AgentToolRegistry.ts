import type { ChatCompletionTool } from "openai/resources";
import type {
  AgentTool,
  ToolCallExtras,
  ToolDescriptor,
  ToolExecutionResult,
} from "../../ports/tools/AgentToolPort";
import { toToolDescriptor } from "../../ports/tools/AgentToolPort";
import type { ToolRegistryPort } from "../../ports/tools/ToolRegistryPort";
import type { LoggerPort } from "../../ports/sys/LoggerPort";

/** Dispatch table from tool name to the tool that serves it. */
export class AgentToolRegistry implements ToolRegistryPort {
  private readonly toolsByName = new Map<string, AgentTool>();

  constructor(tools: AgentTool[], private readonly logger?: LoggerPort) {
    for (const tool of tools) {
      if (this.toolsByName.has(tool.name)) {
        throw new Error(`Tool "${tool.name}" is registered more than once.`);
      }
      this.toolsByName.set(tool.name, tool);
    }
  }

  names(): string[] {
    return Array.from(this.toolsByName.keys());
  }

  get(name: string): AgentTool | undefined {
    return this.toolsByName.get(name);
  }

  list(): ToolDescriptor[] {
    return Array.from(this.toolsByName.values()).map((tool) => toToolDescriptor(tool.getSchema()));
  }

  specs(): ChatCompletionTool[] {
    return Array.from(this.toolsByName.values()).map((tool): ChatCompletionTool => {
      const schema = tool.getSchema();
      return {
        type: "function",
        function: {
          name: schema.function.name,
          description: schema.function.description,
          parameters: schema.function.parameters,
        },
      };
    });
  }

  /** Runs one episode against a tool: create, execute once, release. */
  async invoke(
    name: string,
    parameters: Record<string, unknown>,
    extra: ToolCallExtras = {}
  ): Promise<ToolExecutionResult> {
    const tool = this.toolsByName.get(name);
    if (!tool) {
      return {
        message: `Tool "${name}" is not registered.`,
        score: 0,
        metadata: {},
      };
    }

    const instanceId = await tool.create(undefined, undefined, extra);
    this.logger?.debug("tool instance created", { tool: name, instanceId });
    try {
      return await tool.execute(instanceId, parameters, extra);
    } finally {
      await tool.release(instanceId, extra);
      this.logger?.debug("tool instance released", { tool: name, instanceId });
    }
  }
}
