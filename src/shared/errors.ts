import { isRecord } from "./guards";

/** A tool call that is missing a required parameter or caller context. */
export class ToolContractError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ToolContractError";
  }
}

export class VerifierHttpError extends Error {
  constructor(readonly status: number, statusText: string) {
    super(`${status} ${statusText}`.trim());
    this.name = "VerifierHttpError";
  }
}

export class VerifierTimeoutError extends Error {
  constructor(readonly timeoutMs: number, url: string) {
    super(`No response from ${url} within ${timeoutMs} ms`);
    this.name = "VerifierTimeoutError";
  }
}

export class VerifierProtocolError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "VerifierProtocolError";
  }
}

interface ErrorLike {
  name: string;
  message: string;
  cause?: unknown;
}

// fetch failures may come from another realm, so no instanceof here
function isErrorLike(value: unknown): value is ErrorLike {
  return isRecord(value) && typeof value.name === "string" && typeof value.message === "string";
}

/** Renders an error as `<kind>: <detail>` for tool output. */
export function describeError(err: unknown): string {
  if (!isErrorLike(err)) {
    return `Error: ${String(err)}`;
  }
  const cause = isErrorLike(err.cause) ? ` (${err.cause.message})` : "";
  return `${err.name}: ${err.message}${cause}`;
}
