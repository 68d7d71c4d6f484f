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
 * engine/Elevator.ts
 */
import { invariant } from "../core/errors.js";
import { Passenger } from "./Passenger.js";

export interface ElevatorSpec {
  minFloor: number;
  maxFloor: number;
  capacity: number;
  startFloor: number;
}

export interface MoveCount {
  toward: number;
  away: number;
}

/**
 * A car confined to [minFloor, maxFloor] carrying at most `capacity`
 * passengers. Moves are one floor at a time and stop at the bounds.
 */
export class Elevator {
  readonly id: number;
  readonly minFloor: number;
  readonly maxFloor: number;
  readonly capacity: number;
  readonly startFloor: number;

  private _floor: number;
  private _passengers: Passenger[] = [];

  constructor(id: number, { minFloor, maxFloor, capacity, startFloor }: ElevatorSpec) {
    this.id = id;
    this.minFloor = minFloor;
    this.maxFloor = maxFloor;
    this.capacity = capacity;
    this.startFloor = startFloor;
    this._floor = startFloor;
    this.checkInvariants();
  }

  get floor(): number {
    return this._floor;
  }

  get passengers(): readonly Passenger[] {
    return this._passengers;
  }

  get load(): number {
    return this._passengers.length;
  }

  get availableCapacity(): number {
    return this.capacity - this._passengers.length;
  }

  get isFull(): boolean {
    return this._passengers.length >= this.capacity;
  }

  /** Floors requested by at least one passenger aboard */
  destinations(): Set<number> {
    return new Set(this._passengers.map(p => p.destinationFloor));
  }

  /** @returns whether the floor changed */
  moveUp(): boolean {
    if (this._floor >= this.maxFloor) return false;
    this._floor++;
    return true;
  }

  /** @returns whether the floor changed */
  moveDown(): boolean {
    if (this._floor <= this.minFloor) return false;
    this._floor--;
    return true;
  }

  board(passengers: Passenger[]): void {
    invariant(
      passengers.length <= this.availableCapacity,
      () => `elevator ${this.id} boarding ${passengers.length} with ${this.availableCapacity} free`
    );
    this._passengers.push(...passengers);
  }

  /**
   * Remove exactly the passengers whose destination is the current floor.
   */
  unload(): Passenger[] {
    const leaving: Passenger[] = [];
    const staying: Passenger[] = [];
    for (const p of this._passengers) {
      (p.isAt(this._floor) ? leaving : staying).push(p);
    }
    this._passengers = staying;
    return leaving;
  }

  /**
   * Classify the passengers aboard by whether the last move, from `from`
   * to the current floor, brought them closer to their destination.
   */
  countMoved(from: number): MoveCount {
    let toward = 0;
    for (const p of this._passengers) {
      if (p.movedToward(from, this._floor)) toward++;
    }
    return { toward, away: this._passengers.length - toward };
  }

  reset(): void {
    this._floor = this.startFloor;
    this._passengers = [];
  }

  checkInvariants(): void {
    invariant(
      this._floor >= this.minFloor && this._floor <= this.maxFloor,
      () => `elevator ${this.id} at floor ${this._floor} outside [${this.minFloor}, ${this.maxFloor}]`
    );
    invariant(
      this._passengers.length <= this.capacity,
      () => `elevator ${this.id} carries ${this._passengers.length} over capacity ${this.capacity}`
    );
  }
}
