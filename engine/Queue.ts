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
 * engine/Queue.ts
 * Bounded FIFO of passengers waiting at one floor for one direction
 */
import { invariant } from "../core/errors.js";
import { Direction, Passenger } from "./Passenger.js";

export class Queue {
  readonly floor: number;
  readonly direction: Direction;
  readonly maxSize: number;
  private _passengers: Passenger[] = [];

  constructor(floor: number, direction: Direction, maxSize: number) {
    this.floor = floor;
    this.direction = direction;
    this.maxSize = maxSize;
  }

  get size(): number {
    return this._passengers.length;
  }

  get isEmpty(): boolean {
    return this._passengers.length === 0;
  }

  get passengers(): readonly Passenger[] {
    return this._passengers;
  }

  canAdmit(): boolean {
    return this._passengers.length < this.maxSize;
  }

  enqueue(passenger: Passenger): void {
    invariant(this.canAdmit(), () => `queue ${this.floor}/${this.direction} is full (${this.maxSize})`);
    invariant(
      passenger.arrivalFloor === this.floor && passenger.direction === this.direction,
      () => `passenger ${passenger.id} routed to queue ${this.floor}/${this.direction}`
    );
    this._passengers.push(passenger);
  }

  /**
   * Remove up to `count` passengers, earliest-arrived first.
   */
  take(count: number): Passenger[] {
    if (count <= 0) return [];
    return this._passengers.splice(0, count);
  }

  /**
   * Remove and return every passenger whose wait reached their limit.
   */
  removeExpired(): Passenger[] {
    const expired: Passenger[] = [];
    const kept: Passenger[] = [];
    for (const p of this._passengers) {
      (p.hasExpired() ? expired : kept).push(p);
    }
    this._passengers = kept;
    return expired;
  }

  clear(): void {
    this._passengers = [];
  }

  [Symbol.iterator](): Iterator<Passenger> {
    return this._passengers[Symbol.iterator]();
  }
}
