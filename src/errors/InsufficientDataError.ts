/**
 * Series is shorter than the window an indicator needs.
 */
export class InsufficientDataError extends Error {
  readonly name = "InsufficientDataError";

  constructor(
    readonly indicator: string,
    readonly required: number,
    readonly received: number
  ) {
    super(
      `${indicator} requires at least ${required} candles, received ${received}`
    );
  }
}

export default InsufficientDataError;
