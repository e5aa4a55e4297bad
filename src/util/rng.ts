// src/util/rng.ts
import seedrandom from "seedrandom";
import type { RNG } from "../types/rng.js";

/**
 * Create a seeded random number generator.
 */
export function createRng(seed: number | string): RNG {
  return seedrandom(String(seed));
}

/**
 * Seed used when the run configuration names none.
 */
export function freshSeed(): number {
  return Date.now() % 2147483647;
}

/**
 * Pick a random integer in [min, max] inclusive.
 */
export function randomInt(rng: RNG, min: number, max: number): number {
  return Math.floor(rng() * (max - min + 1)) + min;
}

/**
 * Draw a 31-bit seed for a downstream consumer (a backend request, faker).
 */
export function deriveSeed(rng: RNG): number {
  return randomInt(rng, 0, 2147483646);
}

/**
 * Pick a random element from an array.
 */
export function randomPick<T>(rng: RNG, arr: readonly T[]): T {
  const item = arr[Math.floor(rng() * arr.length)];
  if (item === undefined) {
    throw new Error("Cannot pick from empty array");
  }
  return item;
}

/**
 * Pick up to n distinct elements, keeping their original relative order.
 */
export function pickN<T>(rng: RNG, arr: readonly T[], n: number): T[] {
  if (n >= arr.length) {
    return [...arr];
  }

  const used = new Set<number>();
  while (used.size < n) {
    used.add(Math.floor(rng() * arr.length));
  }

  return arr.filter((_, idx) => used.has(idx));
}

/**
 * Generate a random boolean with given probability of true.
 */
export function randomBool(rng: RNG, probability = 0.5): boolean {
  return rng() < probability;
}
