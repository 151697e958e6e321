import type {
  AgentTool,
  FunctionToolSchema,
  ToolCallExtras,
  ToolExecutionResult,
} from "../../ports/tools/AgentToolPort";
import type { ProofVerifierPort, VerificationResponse } from "../../ports/verifier/ProofVerifierPort";
import type { LoggerPort } from "../../ports/sys/LoggerPort";
import { InstanceStore } from "../../domain/tools/InstanceStore";
import { ToolContractError, describeError } from "../../shared/errors";
import { FSTAR_TOOL_SCHEMA } from "../../shared/toolSchemas";
import { deepFreeze } from "../../shared/freeze";

export type ContractViolationMode = "report" | "throw";

export interface FStarExecutionToolOptions {
  schema?: FunctionToolSchema;
  /**
   * What to do when the call lacks `code` or `tools_kwargs.example_name`.
   * "report" answers with an "Invalid tool call." message; "throw" rejects
   * with ToolContractError so the orchestration layer can fail the episode.
   */
  contractViolation?: ContractViolationMode;
}

export interface FStarExecutionArgs {
  code: string;
}

export function isVerified(response: VerificationResponse): boolean {
  return (response.return_code ?? -2) === 0 && response.score === 1.0;
}

export function formatVerification(response: VerificationResponse): string {
  const verdict = isVerified(response) ? "True" : "False";
  return `Verification Success: ${verdict}\n${response.messages ?? ""}`;
}

function readArgs(parameters: Record<string, unknown>): FStarExecutionArgs {
  if (typeof parameters.code !== "string") {
    throw new ToolContractError('Missing required parameter "code".');
  }
  return { code: parameters.code };
}

function readProblemId(extra: ToolCallExtras | undefined): string {
  const exampleName = extra?.tools_kwargs?.example_name;
  if (typeof exampleName !== "string" || !exampleName) {
    throw new ToolContractError('Missing "tools_kwargs.example_name" in call context.');
  }
  return exampleName;
}

/**
 * Checks a candidate F* solution against the remote verifier. The score is
 * always 0; the verdict lives in the message text.
 */
export class FStarExecutionTool implements AgentTool {
  readonly name: string;
  private readonly schema: FunctionToolSchema;
  private readonly contractViolation: ContractViolationMode;
  private readonly instances = new InstanceStore();

  constructor(
    private readonly verifier: ProofVerifierPort,
    private readonly logger: LoggerPort,
    options: FStarExecutionToolOptions = {}
  ) {
    this.schema = deepFreeze(options.schema ?? FSTAR_TOOL_SCHEMA);
    this.name = this.schema.function.name;
    this.contractViolation = options.contractViolation ?? "report";
  }

  getSchema(): FunctionToolSchema {
    return this.schema;
  }

  async create(instanceId?: string, groundTruth?: string, _extra?: ToolCallExtras): Promise<string> {
    return this.instances.create(instanceId, groundTruth).id;
  }

  async execute(
    instanceId: string,
    parameters: Record<string, unknown>,
    extra?: ToolCallExtras
  ): Promise<ToolExecutionResult> {
    if (!this.instances.has(instanceId)) {
      this.logger.warn("execute called for an instance that was not created", { instanceId });
    }

    let args: FStarExecutionArgs;
    let problemId: string;
    try {
      args = readArgs(parameters);
      problemId = readProblemId(extra);
    } catch (err) {
      if (this.contractViolation === "throw") throw err;
      this.logger.warn("rejected malformed tool call", { instanceId, error: describeError(err) });
      return { message: `Invalid tool call.\n${describeError(err)}`, score: 0, metadata: {} };
    }

    try {
      const response = await this.verifier.check({ solution: args.code, problem_id: problemId });
      this.logger.info("verification finished", {
        instanceId,
        problemId,
        verified: isVerified(response),
      });
      return { message: formatVerification(response), score: 0, metadata: {} };
    } catch (err) {
      this.logger.error("verification request failed", {
        instanceId,
        problemId,
        error: describeError(err),
      });
      return { message: `Runtime error occurred.\n${describeError(err)}`, score: 0, metadata: {} };
    }
  }

  async release(instanceId: string, _extra?: ToolCallExtras): Promise<void> {
    this.instances.release(instanceId);
  }
}
