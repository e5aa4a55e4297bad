// src/types/rng.ts

/** A seeded uniform source on [0, 1). */
export type RNG = () => number;
