/*
 * Copyright 2025 The Carpocratian Church of Commonality and Equality, Inc.
 *
 * Licensed under the Apache License, Version 2.0 (the "License");
 * you may not use this file except in compliance with the License.
 * You may obtain a copy of the License at
 *
 *      http://www.apache.org/licenses/LICENSE-2.0
 *
 * Unless required by applicable law or agreed to in writing, software
 * distributed under the License is distributed on an "AS IS" BASIS,
 * WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
 * See the License for the specific language governing permissions and
 * limitations under the License.
 */
/*
 * core/random.ts
 * Seeded randomness: PRNG, Poisson counts, categorical draws
 */

/** A source of uniform floats in [0, 1). */
export type RandomSource = () => number;

/**
 * mulberry32 PRNG. Same seed, same sequence.
 */
export function mulberry32(seed: number): RandomSource {
  let a = seed >>> 0;
  return function () {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

// Knuth's method loses precision once exp(-lambda) gets tiny, so large rates
// are drawn as a sum of smaller Poisson variables.
const POISSON_CHUNK = 30;

function knuthPoisson(rng: RandomSource, lambda: number): number {
  const limit = Math.exp(-lambda);
  let k = 0;
  let p = rng();
  while (p > limit) {
    k++;
    p *= rng();
  }
  return k;
}

/**
 * Draw a non-negative integer from Poisson(lambda).
 */
export function samplePoisson(rng: RandomSource, lambda: number): number {
  if (!(lambda > 0)) return 0;
  let remaining = lambda;
  let count = 0;
  while (remaining > POISSON_CHUNK) {
    count += knuthPoisson(rng, POISSON_CHUNK);
    remaining -= POISSON_CHUNK;
  }
  return count + knuthPoisson(rng, remaining);
}

/**
 * Draw an index with probability proportional to its weight.
 * Weights must be non-negative with a positive sum.
 */
export function sampleCategorical(rng: RandomSource, weights: readonly number[]): number {
  let total = 0;
  let last = -1;
  for (let i = 0; i < weights.length; i++) {
    total += weights[i];
    if (weights[i] > 0) last = i;
  }
  if (last < 0) {
    throw new RangeError("Cannot sample from weights with no positive entry");
  }

  const target = rng() * total;
  let cumulative = 0;
  for (let i = 0; i < weights.length; i++) {
    if (weights[i] <= 0) continue;
    cumulative += weights[i];
    if (target < cumulative) return i;
  }
  // Floating point slack at the top of the range
  return last;
}

/**
 * Uniform integer in [0, n).
 */
export function randomInt(rng: RandomSource, n: number): number {
  return Math.floor(rng() * n);
}
