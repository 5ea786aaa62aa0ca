/**
 * Indicator arithmetic produced a non-finite value.
 */
export class ComputationError extends Error {
  readonly name = "ComputationError";

  constructor(readonly indicator: string, readonly value: unknown) {
    super(`${indicator} produced a non-finite value: ${String(value)}`);
  }
}

export default ComputationError;
