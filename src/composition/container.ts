import type { AppConfig, ToolConfigEntry } from '../config';
import type { AgentTool } from '../ports/tools/AgentToolPort';
import type { LogLevel } from '../ports/sys/LoggerPort';
import { ConsoleLogger } from '../adapters/sys/ConsoleLogger';
import { AgentToolRegistry } from '../adapters/tools/AgentToolRegistry';
import { HttpProofVerifier } from '../adapters/verifier/HttpProofVerifier';
import { ListTool } from '../features/ListTool';
import {
  FStarExecutionTool,
  type ContractViolationMode,
} from '../features/VerificationTools/FStarExecutionTool';

export interface ContainerOptions {
  verifierHost: string;
  logLevel: LogLevel;
}

type ToolFactory = (entry: ToolConfigEntry, logger: ConsoleLogger, options: ContainerOptions) => AgentTool;

function readNumber(config: Record<string, unknown>, key: string): number | undefined {
  const value = config[key];
  return typeof value === 'number' && Number.isFinite(value) && value > 0 ? value : undefined;
}

function readContractMode(config: Record<string, unknown>): ContractViolationMode | undefined {
  const value = config.contract_violation;
  return value === 'report' || value === 'throw' ? value : undefined;
}

const TOOL_FACTORIES: Record<string, ToolFactory> = {
  ListTool: (entry, logger) => new ListTool(logger.child('[tools/list]'), entry.tool_schema),
  FStarExecutionTool: (entry, logger, options) => {
    const toolLogger = logger.child('[tools/execute_fstar]');
    const serverHost =
      typeof entry.config.server_host === 'string' && entry.config.server_host
        ? entry.config.server_host
        : options.verifierHost;
    const verifier = new HttpProofVerifier({
      baseUrl: serverHost,
      timeoutMs: readNumber(entry.config, 'timeout_ms'),
      logger: toolLogger,
    });
    return new FStarExecutionTool(verifier, toolLogger, {
      schema: entry.tool_schema,
      contractViolation: readContractMode(entry.config),
    });
  },
};

export const AVAILABLE_TOOL_CLASSES = Object.keys(TOOL_FACTORIES);

const DEFAULT_TOOLS: ToolConfigEntry[] = [
  { class_name: 'ListTool', config: {} },
  { class_name: 'FStarExecutionTool', config: {} },
];

export function buildToolRegistry(appConfig: AppConfig, options: ContainerOptions): AgentToolRegistry {
  const logger = new ConsoleLogger(options.logLevel);
  const entries = appConfig.tools ?? DEFAULT_TOOLS;

  const tools: AgentTool[] = [];
  for (const entry of entries) {
    const factory = TOOL_FACTORIES[entry.class_name];
    if (!factory) {
      logger.warn(`[tools] Unknown tool class requested: ${entry.class_name}`);
      continue;
    }
    tools.push(factory(entry, logger, options));
  }

  const registry = new AgentToolRegistry(tools, logger.child('[registry]'));
  logger.info('[tools] Registered tools', { names: registry.names() });
  return registry;
}
