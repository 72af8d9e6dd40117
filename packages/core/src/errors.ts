export type GatewayFailureKind = "network" | "timeout" | "malformed" | "provider";

/** Conditions that end a request abnormally. */
export abstract class AgentLoopError extends Error {
  abstract readonly code: string;
}

export class GatewayFailure extends AgentLoopError {
  readonly code = "gateway_failure";
  readonly kind: GatewayFailureKind;

  constructor(kind: GatewayFailureKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GatewayFailure";
    this.kind = kind;
  }
}

export class LoopLimitExceeded extends AgentLoopError {
  readonly code = "loop_limit_exceeded";
  readonly rounds: number;

  constructor(rounds: number) {
    super(`Stopped after ${rounds} model round-trips without a final answer.`);
    this.name = "LoopLimitExceeded";
    this.rounds = rounds;
  }
}

export class InvalidHistory extends AgentLoopError {
  readonly code = "invalid_history";

  constructor(message: string) {
    super(message);
    this.name = "InvalidHistory";
  }
}
