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
 * engine/rewards.ts
 * Reward components and their weights
 *
 * Movement components are counted only when an elevator actually changes
 * floor, once per passenger aboard during that move. Passengers riding an
 * idle or stopped elevator contribute to neither.
 */
import { ConfigurationError } from "../core/errors.js";

/**
 * Counts gathered during one Building step.
 */
export interface RewardComponents {
  /** Passengers unloaded at their destination */
  delivered: number;
  /** Passenger-moves that reduced distance to destination */
  movedToward: number;
  /** Passenger-moves that did not */
  movedAway: number;
  /** Arrivals turned away by a full queue */
  rejected: number;
  /** Queued passengers that hit their wait limit */
  abandoned: number;
  /** Passengers aboard any elevator after actions */
  inElevator: number;
  /** Passengers in any queue after actions */
  inQueue: number;
}

/** One weight per component; reward = Σ weight × count */
export type RewardWeights = { [K in keyof RewardComponents]: number };

export const REWARD_COMPONENTS = [
  "delivered",
  "movedToward",
  "movedAway",
  "rejected",
  "abandoned",
  "inElevator",
  "inQueue",
] as const satisfies readonly (keyof RewardComponents)[];

const KNOWN: ReadonlySet<string> = new Set(REWARD_COMPONENTS);
const POSITIVE: ReadonlySet<keyof RewardComponents> = new Set(["delivered", "movedToward"]);

export const DEFAULT_REWARD_WEIGHTS: Readonly<RewardWeights> = Object.freeze({
  delivered: 10,
  movedToward: 1,
  movedAway: -1,
  rejected: -5,
  abandoned: -5,
  inElevator: -0.1,
  inQueue: -0.2,
});

export function emptyComponents(): RewardComponents {
  return {
    delivered: 0,
    movedToward: 0,
    movedAway: 0,
    rejected: 0,
    abandoned: 0,
    inElevator: 0,
    inQueue: 0,
  };
}

/**
 * Fill unset weights from the defaults and check signs: delivered and
 * movedToward must be >= 0, every other weight <= 0.
 */
export function resolveRewardWeights(overrides: Partial<RewardWeights> = {}): RewardWeights {
  const weights: RewardWeights = { ...DEFAULT_REWARD_WEIGHTS };
  for (const key of REWARD_COMPONENTS) {
    const value = overrides[key];
    if (value === undefined) continue;
    const path = `rewardWeights.${key}`;
    if (!Number.isFinite(value)) {
      throw new ConfigurationError(path, `weight must be a finite number, got ${value}`);
    }
    if (POSITIVE.has(key) ? value < 0 : value > 0) {
      throw new ConfigurationError(path, `weight must be ${POSITIVE.has(key) ? ">= 0" : "<= 0"}, got ${value}`);
    }
    weights[key] = value;
  }
  for (const key of Object.keys(overrides)) {
    if (!KNOWN.has(key)) {
      throw new ConfigurationError(`rewardWeights.${key}`, "unknown reward component");
    }
  }
  return weights;
}

export function scoreComponents(components: RewardComponents, weights: RewardWeights): number {
  let reward = 0;
  for (const key of REWARD_COMPONENTS) {
    reward += weights[key] * components[key];
  }
  return reward;
}
