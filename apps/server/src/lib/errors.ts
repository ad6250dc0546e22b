export class SimulationNotFoundError extends Error {
  readonly statusCode = 404;

  constructor(simulationId: string) {
    super(`Simulation ${simulationId} not found`);
    this.name = "SimulationNotFoundError";
  }
}

export class AgentNotFoundError extends Error {
  readonly statusCode = 404;

  constructor(agentId: string) {
    super(`Agent ${agentId} not found`);
    this.name = "AgentNotFoundError";
  }
}

export class ValidationError extends Error {
  readonly statusCode = 400;

  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class TickInProgressError extends Error {
  readonly statusCode = 409;

  constructor(simulationId: string) {
    super(`Simulation ${simulationId} is already running a tick`);
    this.name = "TickInProgressError";
  }
}

/**
 * The engine's own ordering rules were broken. Never caught inside a tick:
 * the tick aborts and nothing is saved.
 */
export class InvariantViolationError extends Error {
  readonly statusCode = 500;

  constructor(message: string) {
    super(`Invariant violated: ${message}`);
    this.name = "InvariantViolationError";
  }
}

export class OracleTimeoutError extends Error {
  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "OracleTimeoutError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}
