import type { SimulationStatus } from "@shared/types/simulation";

export type SimulationErrorCode =
  | "INVALID_ARGUMENT"
  | "INVALID_STATE"
  | "NOT_FOUND"
  | "GENERATION_ERROR"
  | "GATEWAY_ERROR";

export class SimulationError extends Error {
  readonly code: SimulationErrorCode;

  constructor(code: SimulationErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidArgumentError extends SimulationError {
  constructor(message: string) {
    super("INVALID_ARGUMENT", message);
  }
}

export class InvalidStateError extends SimulationError {
  readonly from: SimulationStatus;
  readonly action: string;

  constructor(action: string, from: SimulationStatus) {
    super("INVALID_STATE", `Cannot ${action} a simulation in status "${from}"`);
    this.from = from;
    this.action = action;
  }
}

export class NotFoundError extends SimulationError {
  constructor(simulationId: string) {
    super("NOT_FOUND", `Simulation ${simulationId} not found`);
  }
}

export class GenerationError extends SimulationError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super("GENERATION_ERROR", message);
    this.issues = issues;
  }
}

export type GatewayFailureKind =
  | "timeout"
  | "rate_limited"
  | "server_error"
  | "network"
  | "auth"
  | "invalid_request"
  | "malformed_response"
  | "unknown";

const RETRYABLE_KINDS: ReadonlySet<GatewayFailureKind> = new Set([
  "timeout",
  "rate_limited",
  "server_error",
  "network",
]);

export class GatewayError extends SimulationError {
  readonly kind: GatewayFailureKind;
  readonly retryable: boolean;
  readonly status: number | undefined;
  readonly attempts: number;

  constructor(
    kind: GatewayFailureKind,
    message: string,
    options: { status?: number; attempts?: number; cause?: unknown } = {},
  ) {
    super("GATEWAY_ERROR", message);
    this.kind = kind;
    this.retryable = RETRYABLE_KINDS.has(kind);
    this.status = options.status;
    this.attempts = options.attempts ?? 1;
    if (options.cause !== undefined) this.cause = options.cause;
  }

  withAttempts(attempts: number): GatewayError {
    return new GatewayError(
      this.kind,
      `${this.message} (after ${attempts} attempt${attempts === 1 ? "" : "s"})`,
      { status: this.status, attempts, cause: this.cause },
    );
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
