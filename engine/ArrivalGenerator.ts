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
 * engine/ArrivalGenerator.ts
 * Sources of new passengers, one batch per timestep
 */
import { ConfigurationError } from "../core/errors.js";
import { RandomSource, samplePoisson, sampleCategorical } from "../core/random.js";
import { Passenger } from "./Passenger.js";

/** Tolerance when checking that a destination distribution sums to 1 */
export const PROBABILITY_TOLERANCE = 1e-9;

/**
 * Anything that can produce the passengers arriving at a timestep.
 * Passengers are returned in ascending arrival-floor order.
 */
export interface ArrivalSource {
  generate(timestep: number): Passenger[];
}

export interface ArrivalParams {
  floors: number;
  /** Poisson rate per floor per timestep */
  arrivalRates: number[];
  /** Row per arrival floor: probability of each destination floor */
  destinationProbabilities: number[][];
}

export function passengerId(timestep: number, floor: number, index: number): string {
  return `t${timestep}-f${floor}-${index}`;
}

/**
 * Recommended parameters: most traffic starts at the ground floor and
 * spreads evenly upwards; upper floors see light traffic, mostly heading
 * back down to the ground floor.
 */
export function defaultArrivalParams(elevators: number, floors: number): ArrivalParams {
  const GROUND_FLOOR_RATE = 0.5 * elevators;
  const OTHER_FLOOR_RATE = (0.5 * elevators) / floors;
  const GROUND_DESTINATION_PROB = floors > 2 ? 0.8 : 1;
  const OTHER_DESTINATION_PROB = floors > 2 ? (1 - GROUND_DESTINATION_PROB) / (floors - 2) : 0;

  const arrivalRates = [GROUND_FLOOR_RATE];
  for (let i = 1; i < floors; i++) arrivalRates.push(OTHER_FLOOR_RATE);

  const destinationProbabilities: number[][] = [
    Array.from({ length: floors }, (_, j) => (j === 0 ? 0 : 1 / (floors - 1))),
  ];
  for (let i = 1; i < floors; i++) {
    destinationProbabilities.push(
      Array.from({ length: floors }, (_, j) => {
        if (j === 0) return GROUND_DESTINATION_PROB;
        if (j === i) return 0;
        return OTHER_DESTINATION_PROB;
      })
    );
  }

  return { floors, arrivalRates, destinationProbabilities };
}

/**
 * Check arrival parameters, throwing ConfigurationError on the first
 * problem found.
 */
export function validateArrivalParams({ floors, arrivalRates, destinationProbabilities }: ArrivalParams): void {
  if (arrivalRates.length !== floors) {
    throw new ConfigurationError(
      "arrivalRates",
      `expected ${floors} rates, got ${arrivalRates.length}`
    );
  }
  arrivalRates.forEach((rate, floor) => {
    if (!Number.isFinite(rate) || rate < 0) {
      throw new ConfigurationError(`arrivalRates[${floor}]`, `rate must be a finite number >= 0, got ${rate}`);
    }
  });

  if (destinationProbabilities.length !== floors) {
    throw new ConfigurationError(
      "destinationProbabilities",
      `expected ${floors} rows, got ${destinationProbabilities.length}`
    );
  }
  destinationProbabilities.forEach((row, floor) => {
    const path = `destinationProbabilities[${floor}]`;
    if (row.length !== floors) {
      throw new ConfigurationError(path, `expected ${floors} entries, got ${row.length}`);
    }
    row.forEach((p, j) => {
      if (!Number.isFinite(p) || p < 0) {
        throw new ConfigurationError(`${path}[${j}]`, `probability must be a finite number >= 0, got ${p}`);
      }
    });
    if (row[floor] !== 0) {
      throw new ConfigurationError(`${path}[${floor}]`, `probability of staying on the arrival floor must be 0, got ${row[floor]}`);
    }
    const sum = row.reduce((acc, p) => acc + p, 0);
    if (Math.abs(sum - 1) > PROBABILITY_TOLERANCE) {
      throw new ConfigurationError(path, `probabilities must sum to 1, got ${sum}`);
    }
  });
}

/**
 * Poisson arrivals per floor with categorical destinations.
 *
 * The generator copies its parameters and keeps no state between calls
 * apart from the random source it was given.
 */
export class ArrivalGenerator implements ArrivalSource {
  readonly floors: number;
  readonly maxWait: number;
  private readonly rates: readonly number[];
  private readonly destinations: readonly (readonly number[])[];
  private readonly rng: RandomSource;

  constructor(params: ArrivalParams, maxWait: number, rng: RandomSource) {
    validateArrivalParams(params);
    this.floors = params.floors;
    this.maxWait = maxWait;
    this.rates = [...params.arrivalRates];
    this.destinations = params.destinationProbabilities.map(row => [...row]);
    this.rng = rng;
  }

  generate(timestep: number): Passenger[] {
    const passengers: Passenger[] = [];
    for (let floor = 0; floor < this.floors; floor++) {
      const count = samplePoisson(this.rng, this.rates[floor]);
      for (let k = 0; k < count; k++) {
        passengers.push(
          new Passenger({
            id: passengerId(timestep, floor, k),
            arrivalFloor: floor,
            destinationFloor: sampleCategorical(this.rng, this.destinations[floor]),
            arrivalStep: timestep,
            maxWait: this.maxWait,
          })
        );
      }
    }
    return passengers;
  }
}

export interface ScheduledArrival {
  step: number;
  arrivalFloor: number;
  destinationFloor: number;
  /** Defaults to the source's maxWait */
  maxWait?: number;
}

/**
 * Replays a fixed list of arrivals. Each call builds fresh passengers,
 * so the same schedule can drive several episodes.
 */
export class ScheduledArrivals implements ArrivalSource {
  readonly maxWait: number;
  private readonly byStep = new Map<number, ScheduledArrival[]>();

  constructor(schedule: ScheduledArrival[], maxWait: number) {
    this.maxWait = maxWait;
    for (const entry of schedule) {
      const list = this.byStep.get(entry.step) ?? [];
      list.push(entry);
      this.byStep.set(entry.step, list);
    }
    for (const list of this.byStep.values()) {
      list.sort((a, b) => a.arrivalFloor - b.arrivalFloor);
    }
  }

  generate(timestep: number): Passenger[] {
    const entries = this.byStep.get(timestep) ?? [];
    const perFloor = new Map<number, number>();
    return entries.map(entry => {
      const index = perFloor.get(entry.arrivalFloor) ?? 0;
      perFloor.set(entry.arrivalFloor, index + 1);
      return new Passenger({
        id: passengerId(timestep, entry.arrivalFloor, index),
        arrivalFloor: entry.arrivalFloor,
        destinationFloor: entry.destinationFloor,
        arrivalStep: timestep,
        maxWait: entry.maxWait ?? this.maxWait,
      });
    });
  }
}
