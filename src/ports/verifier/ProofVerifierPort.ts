export interface VerificationRequest {
  solution: string;
  problem_id: string;
}

/** Reply from the checker. Every field may be absent. */
export interface VerificationResponse {
  return_code?: number;
  score?: number;
  messages?: string;
}

export interface ProofVerifierPort {
  check(request: VerificationRequest): Promise<VerificationResponse>;
}
