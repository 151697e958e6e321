import type { FunctionToolSchema } from "../ports/tools/AgentToolPort";
import { deepFreeze } from "./freeze";

export const LIST_TOOL_NAME = "tools/list";
export const FSTAR_TOOL_NAME = "tools/execute_fstar";

export const LIST_TOOL_SCHEMA: FunctionToolSchema = deepFreeze<FunctionToolSchema>({
  type: "function",
  function: {
    name: LIST_TOOL_NAME,
    description:
      "Shows the list of all available tools, with information about name and parameters.",
    parameters: {
      type: "object",
      properties: {},
      required: [],
    },
  },
});

export const FSTAR_TOOL_SCHEMA: FunctionToolSchema = deepFreeze<FunctionToolSchema>({
  type: "function",
  function: {
    name: FSTAR_TOOL_NAME,
    description: "A tool that executes the given fstar code.",
    parameters: {
      type: "object",
      properties: {
        code: {
          type: "string",
          description: "F* code to execute",
        },
      },
      required: ["code"],
    },
  },
});
