/**
 * Error types for ring settlement.
 *
 * An invalid ring is not an error: it yields an empty transfer plan.
 * Everything below aborts the current settlement attempt.
 */

export type SettlementErrorCode =
  | "UNSETTLEABLE_RING"
  | "INVARIANT_VIOLATION"
  | "BAD_PARAMETER";

export class SettlementError extends Error {
  constructor(message: string, public readonly code: SettlementErrorCode) {
    super(message);
    this.name = "SettlementError";
  }
}

/**
 * Raised when the forward pass finds an edge the next order cannot cover.
 */
export class UnsettleableRingError extends SettlementError {
  constructor(
    public readonly edgeIndex: number,
    required: bigint,
    available: bigint
  ) {
    super(
      `unsettleable ring: order ${edgeIndex} needs ${required}, next order sells ${available}`,
      "UNSETTLEABLE_RING"
    );
    this.name = "UnsettleableRingError";
  }
}

/**
 * A fitted order broke one of its bounds. Always a bug in fitting.
 */
export class InvariantViolationError extends SettlementError {
  constructor(public readonly orderIndex: number, invariant: string) {
    super(`order ${orderIndex}: ${invariant}`, "INVARIANT_VIOLATION");
    this.name = "InvariantViolationError";
  }
}

export class BadParameterError extends SettlementError {
  constructor(message: string) {
    super(message, "BAD_PARAMETER");
    this.name = "BadParameterError";
  }
}
