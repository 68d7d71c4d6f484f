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
 * engine/Passenger.ts
 */
import { ConfigurationError } from "../core/errors.js";

export type Direction = "up" | "down";

export interface PassengerInit {
  id: string;
  arrivalFloor: number;
  destinationFloor: number;
  arrivalStep: number;
  maxWait: number;
}

/**
 * A single rider, from arrival at a floor queue until delivery,
 * abandonment or rejection.
 */
export class Passenger {
  readonly id: string;
  readonly arrivalFloor: number;
  readonly destinationFloor: number;
  readonly arrivalStep: number;
  readonly maxWait: number;

  /** Steps spent queued; frozen once boarded */
  wait = 0;
  /** Steps since arrival */
  age = 0;
  /** Timestep at which the passenger boarded, if they have */
  boardedAt: number | null = null;

  constructor({ id, arrivalFloor, destinationFloor, arrivalStep, maxWait }: PassengerInit) {
    if (arrivalFloor === destinationFloor) {
      throw new ConfigurationError(
        "destinationFloor",
        `passenger ${id} has destination equal to arrival floor ${arrivalFloor}`
      );
    }
    this.id = id;
    this.arrivalFloor = arrivalFloor;
    this.destinationFloor = destinationFloor;
    this.arrivalStep = arrivalStep;
    this.maxWait = maxWait;
  }

  get direction(): Direction {
    return this.destinationFloor > this.arrivalFloor ? "up" : "down";
  }

  get aboard(): boolean {
    return this.boardedAt !== null;
  }

  /**
   * Advance one timestep. Age always grows; wait only while queued.
   */
  tick(): void {
    if (!this.aboard) this.wait++;
    this.age++;
  }

  markBoarded(timestep: number): void {
    this.boardedAt = timestep;
  }

  /** Wait has reached the limit */
  hasExpired(): boolean {
    return this.wait >= this.maxWait;
  }

  isAt(floor: number): boolean {
    return floor === this.destinationFloor;
  }

  /**
   * Whether a move from `from` to `to` brought the passenger closer to
   * their destination. A move that leaves the distance unchanged or larger
   * counts as away.
   */
  movedToward(from: number, to: number): boolean {
    return Math.abs(to - this.destinationFloor) < Math.abs(from - this.destinationFloor);
  }

  toJSON() {
    return {
      id: this.id,
      arrivalFloor: this.arrivalFloor,
      destinationFloor: this.destinationFloor,
      arrivalStep: this.arrivalStep,
      maxWait: this.maxWait,
      wait: this.wait,
      age: this.age,
      boardedAt: this.boardedAt,
    };
  }
}
