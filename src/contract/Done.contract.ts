/**
 * Payload of `doneSubject` when a background loop stops.
 */
export interface DoneContract {
  symbol: string;
  /** Number of completed analysis cycles */
  cycles: number;
}

export default DoneContract;
