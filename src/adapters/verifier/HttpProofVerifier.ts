import type {
  ProofVerifierPort,
  VerificationRequest,
  VerificationResponse,
} from "../../ports/verifier/ProofVerifierPort";
import type { LoggerPort } from "../../ports/sys/LoggerPort";
import {
  VerifierHttpError,
  VerifierProtocolError,
  VerifierTimeoutError,
} from "../../shared/errors";
import { isRecord } from "../../shared/guards";

export const CHECK_SOLUTION_PATH = "/check_problem_solution";
export const DEFAULT_VERIFIER_TIMEOUT_MS = 15_000;

export interface HttpProofVerifierOptions {
  baseUrl: string;
  timeoutMs?: number;
  logger?: LoggerPort;
}

function toVerificationResponse(body: unknown): VerificationResponse {
  if (!isRecord(body)) {
    throw new VerifierProtocolError("Verifier reply is not a JSON object");
  }
  const out: VerificationResponse = {};
  if (typeof body.return_code === "number") out.return_code = body.return_code;
  if (typeof body.score === "number") out.score = body.score;
  if (typeof body.messages === "string") out.messages = body.messages;
  return out;
}

/**
 * Talks to the proof-checking service over HTTP. Each call gets its own
 * abort timer covering the request and the body read; connections come from
 * the runtime's shared fetch pool.
 */
export class HttpProofVerifier implements ProofVerifierPort {
  readonly url: string;
  private readonly timeoutMs: number;

  constructor(private readonly options: HttpProofVerifierOptions) {
    this.url = options.baseUrl.replace(/\/+$/, "") + CHECK_SOLUTION_PATH;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_VERIFIER_TIMEOUT_MS;
  }

  async check(request: VerificationRequest): Promise<VerificationResponse> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      this.options.logger?.debug("POST verifier", {
        url: this.url,
        problem_id: request.problem_id,
      });
      const res = await fetch(this.url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(request),
        signal: controller.signal,
      });
      if (!res.ok) {
        // drain so the socket goes back to the pool
        await res.text();
        throw new VerifierHttpError(res.status, res.statusText);
      }
      const body: unknown = await res.json();
      return toVerificationResponse(body);
    } catch (err) {
      if (controller.signal.aborted) {
        throw new VerifierTimeoutError(this.timeoutMs, this.url);
      }
      throw err;
    } finally {
      clearTimeout(timer);
    }
  }
}
