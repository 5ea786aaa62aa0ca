/**
 * No candle data was supplied where some is required.
 */
export class EmptyInputError extends Error {
  readonly name = "EmptyInputError";

  constructor(message = "no candle series supplied") {
    super(message);
  }
}

export default EmptyInputError;
