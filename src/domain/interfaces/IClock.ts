export interface IClock {
  /** Epoch milliseconds */
  now(): number;
}

/** Uniform draw in [0, 1) */
export type RandomSource = () => number;
