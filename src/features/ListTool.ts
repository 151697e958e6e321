import type {
  AgentTool,
  FunctionToolSchema,
  ToolCallExtras,
  ToolDescriptor,
  ToolExecutionResult,
} from "../ports/tools/AgentToolPort";
import { toToolDescriptor } from "../ports/tools/AgentToolPort";
import type { LoggerPort } from "../ports/sys/LoggerPort";
import { InstanceStore } from "../domain/tools/InstanceStore";
import { FSTAR_TOOL_SCHEMA, LIST_TOOL_SCHEMA } from "../shared/toolSchemas";
import { deepFreeze } from "../shared/freeze";

/** Read-only directory of the tools an agent may call. */
export class ListTool implements AgentTool {
  readonly name: string;
  private readonly catalog: readonly ToolDescriptor[];
  private readonly instances = new InstanceStore();

  private readonly schema: FunctionToolSchema;

  constructor(
    private readonly logger: LoggerPort,
    schema: FunctionToolSchema = LIST_TOOL_SCHEMA
  ) {
    this.schema = deepFreeze(schema);
    this.name = schema.function.name;
    this.catalog = deepFreeze([structuredClone(toToolDescriptor(FSTAR_TOOL_SCHEMA))]);
  }

  getSchema(): FunctionToolSchema {
    return this.schema;
  }

  async create(instanceId?: string, groundTruth?: string, _extra?: ToolCallExtras): Promise<string> {
    return this.instances.create(instanceId, groundTruth).id;
  }

  async execute(
    instanceId: string,
    _parameters: Record<string, unknown>,
    _extra?: ToolCallExtras
  ): Promise<ToolExecutionResult> {
    this.logger.debug("listing tools", { instanceId, count: this.catalog.length });
    return { message: JSON.stringify(this.catalog, null, 2), score: 0, metadata: {} };
  }

  async release(instanceId: string, _extra?: ToolCallExtras): Promise<void> {
    this.instances.release(instanceId);
  }
}
