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
 * engine/config.ts
 * Building configuration: options, defaults and validation
 */
import { ConfigurationError } from "../core/errors.js";
import { RandomSource } from "../core/random.js";
import {
  ArrivalGenerator,
  ArrivalSource,
  ScheduledArrival,
  ScheduledArrivals,
  defaultArrivalParams,
  validateArrivalParams,
} from "./ArrivalGenerator.js";
import { ElevatorSpec } from "./Elevator.js";
import { RewardWeights, resolveRewardWeights } from "./rewards.js";

export type ObservationMode = "structured" | "flattened";

export interface ElevatorConfig {
  /** Default: 0 */
  minFloor?: number;
  /** Default: top floor */
  maxFloor?: number;
  /** Default: 10 */
  capacity?: number;
  /** Default: minFloor */
  startFloor?: number;
}

/**
 * Builds the arrival source for an episode from the resolved configuration
 * and the episode's random stream.
 */
export type ArrivalFactory = (config: ResolvedBuildingConfig, rng: RandomSource) => ArrivalSource;

export interface BuildingConfig {
  /** Number of floors, ground floor is 0 (default: 10) */
  floors?: number;
  /** Elevator count with default settings, or one entry per elevator (default: 2) */
  elevators?: number | ElevatorConfig[];
  /** Poisson rate per floor (default: see defaultArrivalParams) */
  arrivalRates?: number[];
  /** Destination distribution per arrival floor (default: see defaultArrivalParams) */
  destinationProbabilities?: number[][];
  /** Max passengers per queue, one value for all floors or one per floor (default: 20) */
  queueCapacity?: number | number[];
  /** Steps a passenger waits in a queue before leaving (default: 50) */
  maxWait?: number;
  rewardWeights?: Partial<RewardWeights>;
  /** Default: "structured" */
  observationMode?: ObservationMode;
  /** Steps after which the episode is truncated; null for no cap (default: null) */
  episodeLength?: number | null;
  seed?: number;
  debug?: boolean;
  /** Verify core invariants after each step (default: true) */
  checkInvariants?: boolean;
  /** Replace the Poisson arrival process */
  arrivals?: ArrivalFactory;
}

export interface ResolvedBuildingConfig {
  floors: number;
  elevators: ElevatorSpec[];
  arrivalRates: number[];
  destinationProbabilities: number[][];
  queueCapacity: number[];
  maxWait: number;
  rewardWeights: RewardWeights;
  observationMode: ObservationMode;
  episodeLength: number | null;
  seed: number | null;
  debug: boolean;
  checkInvariants: boolean;
  arrivals: ArrivalFactory;
}

export const DEFAULTS = {
  floors: 10,
  elevators: 2,
  capacity: 10,
  queueCapacity: 20,
  maxWait: 50,
  observationMode: "structured",
} as const;

export const poissonArrivals: ArrivalFactory = (config, rng) =>
  new ArrivalGenerator(
    {
      floors: config.floors,
      arrivalRates: config.arrivalRates,
      destinationProbabilities: config.destinationProbabilities,
    },
    config.maxWait,
    rng
  );

/**
 * Arrival factory replaying a fixed schedule instead of random arrivals.
 */
export function scheduledArrivals(schedule: ScheduledArrival[]): ArrivalFactory {
  const copy = schedule.map(entry => ({ ...entry }));
  return (config) => {
    copy.forEach((entry, i) => {
      for (const floor of [entry.arrivalFloor, entry.destinationFloor]) {
        if (!Number.isInteger(floor) || floor < 0 || floor >= config.floors) {
          throw new ConfigurationError(`arrivals[${i}]`, `floor ${floor} outside [0, ${config.floors - 1}]`);
        }
      }
      if (entry.arrivalFloor === entry.destinationFloor) {
        throw new ConfigurationError(`arrivals[${i}]`, `destination equals arrival floor ${entry.arrivalFloor}`);
      }
    });
    return new ScheduledArrivals(copy, config.maxWait);
  };
}

function requireInteger(path: string, value: number, min: number, max = Infinity): number {
  if (!Number.isInteger(value) || value < min || value > max) {
    const range = max === Infinity ? `>= ${min}` : `in [${min}, ${max}]`;
    throw new ConfigurationError(path, `expected an integer ${range}, got ${value}`);
  }
  return value;
}

function resolveElevator(entry: ElevatorConfig, index: number, floors: number): ElevatorSpec {
  const path = `elevators[${index}]`;
  const top = floors - 1;
  const minFloor = requireInteger(`${path}.minFloor`, entry.minFloor ?? 0, 0, top);
  const maxFloor = requireInteger(`${path}.maxFloor`, entry.maxFloor ?? top, 0, top);
  if (maxFloor < minFloor) {
    throw new ConfigurationError(path, `maxFloor ${maxFloor} is below minFloor ${minFloor}`);
  }
  const capacity = requireInteger(`${path}.capacity`, entry.capacity ?? DEFAULTS.capacity, 1);
  const startFloor = requireInteger(`${path}.startFloor`, entry.startFloor ?? minFloor, minFloor, maxFloor);
  return { minFloor, maxFloor, capacity, startFloor };
}

/**
 * Apply defaults and validate. The result shares no mutable arrays with
 * the input, so several buildings can be built from one config object.
 *
 * @throws ConfigurationError describing the first invalid option
 */
export function resolveConfig(config: BuildingConfig = {}): ResolvedBuildingConfig {
  const floors = requireInteger("floors", config.floors ?? DEFAULTS.floors, 2);

  const elevatorEntries: ElevatorConfig[] =
    typeof config.elevators === "number" || config.elevators === undefined
      ? Array.from(
          { length: requireInteger("elevators", config.elevators ?? DEFAULTS.elevators, 1) },
          () => ({})
        )
      : config.elevators;
  if (elevatorEntries.length === 0) {
    throw new ConfigurationError("elevators", "at least one elevator is required");
  }
  const elevators = elevatorEntries.map((entry, i) => resolveElevator(entry, i, floors));

  const defaults = defaultArrivalParams(elevators.length, floors);
  const arrivalRates = [...(config.arrivalRates ?? defaults.arrivalRates)];
  const destinationProbabilities = (config.destinationProbabilities ?? defaults.destinationProbabilities).map(
    row => [...row]
  );
  validateArrivalParams({ floors, arrivalRates, destinationProbabilities });

  const rawCapacity = config.queueCapacity ?? DEFAULTS.queueCapacity;
  let queueCapacity: number[];
  if (typeof rawCapacity === "number") {
    queueCapacity = new Array<number>(floors).fill(requireInteger("queueCapacity", rawCapacity, 0));
  } else {
    if (rawCapacity.length !== floors) {
      throw new ConfigurationError("queueCapacity", `expected ${floors} entries, got ${rawCapacity.length}`);
    }
    queueCapacity = rawCapacity.map((value, i) => requireInteger(`queueCapacity[${i}]`, value, 0));
  }

  const maxWait = requireInteger("maxWait", config.maxWait ?? DEFAULTS.maxWait, 0);

  const observationMode = config.observationMode ?? DEFAULTS.observationMode;
  if (observationMode !== "structured" && observationMode !== "flattened") {
    throw new ConfigurationError("observationMode", `expected "structured" or "flattened", got ${String(observationMode)}`);
  }

  const episodeLength =
    config.episodeLength === undefined || config.episodeLength === null
      ? null
      : requireInteger("episodeLength", config.episodeLength, 1);

  const seed = config.seed === undefined ? null : requireInteger("seed", config.seed, Number.MIN_SAFE_INTEGER);

  return {
    floors,
    elevators,
    arrivalRates,
    destinationProbabilities,
    queueCapacity,
    maxWait,
    rewardWeights: resolveRewardWeights(config.rewardWeights),
    observationMode,
    episodeLength,
    seed,
    debug: config.debug ?? false,
    checkInvariants: config.checkInvariants ?? true,
    arrivals: config.arrivals ?? poissonArrivals,
  };
}
