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
 * engine/Building.ts
 * Owns the queues and elevators and advances the simulation one step at a time
 */
import { Emitter } from "../core/events.js";
import { invariant } from "../core/errors.js";
import { createLogger, Logger } from "../core/log.js";
import { mulberry32, RandomSource } from "../core/random.js";
import { ArrivalSource } from "./ArrivalGenerator.js";
import { BuildingConfig, ResolvedBuildingConfig, resolveConfig } from "./config.js";
import { Elevator } from "./Elevator.js";
import { Direction, Passenger } from "./Passenger.js";
import { Queue } from "./Queue.js";
import { ActionCode, ActionTarget, executeAction, validateActions, ACTION_NAMES } from "./actions.js";
import { RewardComponents, emptyComponents, scoreComponents } from "./rewards.js";

/** Running counts since the last reset */
export interface BuildingTotals {
  arrived: number;
  admitted: number;
  rejected: number;
  abandoned: number;
  boarded: number;
  delivered: number;
}

export interface BuildingStepResult {
  /** Timestep counter after the step */
  timestep: number;
  reward: number;
  components: RewardComponents;
  /** True once the configured episode length is reached */
  done: boolean;
  /** Whether each elevator's action changed anything */
  effective: boolean[];
}

export type PassengerLocation =
  | { kind: "queue"; floor: number; direction: Direction }
  | { kind: "elevator"; elevator: number };

export interface BuildingSnapshot {
  timestep: number;
  elevators: { id: number; floor: number; passengers: string[] }[];
  queues: { floor: number; direction: Direction; passengers: string[] }[];
  totals: BuildingTotals;
}

export interface BuildingEvents {
  "building:reset": { payload: { timestep: number } };
  "passenger:admitted": { payload: { passenger: Passenger; queue: Queue } };
  "passenger:rejected": { payload: { passenger: Passenger } };
  "passenger:abandoned": { payload: { passenger: Passenger } };
  "passenger:boarded": { payload: { passenger: Passenger; elevator: number } };
  "passenger:delivered": { payload: { passenger: Passenger; elevator: number } };
  "building:step": { payload: { actions: ActionCode[]; result: BuildingStepResult } };
}

function emptyTotals(): BuildingTotals {
  return { arrived: 0, admitted: 0, rejected: 0, abandoned: 0, boarded: 0, delivered: 0 };
}

function queueKey(floor: number, direction: Direction): string {
  return `${floor}:${direction}`;
}

/**
 * The simulation core.
 *
 * One call to `step` runs, in order: arrivals and queue admission, queue
 * expiry, one action per elevator in construction order, aging, and the
 * timestep increment. Elevator order is part of the contract: when two
 * elevators load from the same queue in one step, the first one listed
 * boards first.
 */
export class Building extends Emitter<BuildingEvents> implements ActionTarget {
  readonly config: ResolvedBuildingConfig;
  readonly floors: number;
  readonly elevators: readonly Elevator[];
  readonly log: Logger;

  private _queues = new Map<string, Queue>();
  private _timestep = 0;
  private _totals: BuildingTotals = emptyTotals();
  private _arrivals: ArrivalSource;

  /**
   * @param config - Options, validated here
   * @param rng - Random stream for arrivals; seeded from `config.seed` (or the clock) when omitted
   * @throws ConfigurationError
   */
  constructor(config: BuildingConfig = {}, rng?: RandomSource) {
    super();
    this.config = resolveConfig(config);
    this.floors = this.config.floors;
    this.log = createLogger("building", this.config.debug);

    this.elevators = this.config.elevators.map((spec, i) => new Elevator(i, spec));

    for (let floor = 0; floor < this.floors; floor++) {
      const capacity = this.config.queueCapacity[floor];
      if (floor < this.floors - 1) this._queues.set(queueKey(floor, "up"), new Queue(floor, "up", capacity));
      if (floor > 0) this._queues.set(queueKey(floor, "down"), new Queue(floor, "down", capacity));
    }

    this._arrivals = this.config.arrivals(this.config, rng ?? this.defaultRng());
    this.log.info(`🏢 ${this.floors} floors, ${this.elevators.length} elevator(s)`);
  }

  get timestep(): number {
    return this._timestep;
  }

  get totals(): BuildingTotals {
    return { ...this._totals };
  }

  get queues(): Queue[] {
    return [...this._queues.values()];
  }

  /** The queue at `floor` for `direction`, if that floor has one */
  queue(floor: number, direction: Direction): Queue | undefined {
    return this._queues.get(queueKey(floor, direction));
  }

  get queuedCount(): number {
    let n = 0;
    for (const q of this._queues.values()) n += q.size;
    return n;
  }

  get aboardCount(): number {
    let n = 0;
    for (const e of this.elevators) n += e.load;
    return n;
  }

  /**
   * Every passenger still in the simulation with where they are.
   */
  *passengers(): Generator<{ passenger: Passenger; location: PassengerLocation }> {
    for (const q of this._queues.values()) {
      for (const passenger of q) {
        yield { passenger, location: { kind: "queue", floor: q.floor, direction: q.direction } };
      }
    }
    for (const e of this.elevators) {
      for (const passenger of e.passengers) {
        yield { passenger, location: { kind: "elevator", elevator: e.id } };
      }
    }
  }

  /**
   * Empty every queue and elevator, return elevators to their start
   * floors and rewind the clock. Arrivals restart from `rng`.
   */
  reset(rng?: RandomSource): void {
    for (const q of this._queues.values()) q.clear();
    for (const e of this.elevators) e.reset();
    this._timestep = 0;
    this._totals = emptyTotals();
    this._arrivals = this.config.arrivals(this.config, rng ?? this.defaultRng());
    this.emit("building:reset", { payload: { timestep: 0 } });
    this.log.debug("🔄 reset");
  }

  /**
   * Advance one timestep.
   *
   * @param actions - One action code per elevator, in elevator order
   * @throws RangeError if the vector has the wrong length or an unknown code
   */
  step(actions: readonly number[]): BuildingStepResult {
    const codes = validateActions(actions, this.elevators.length);
    const components = emptyComponents();

    // 1. Arrivals
    for (const passenger of this._arrivals.generate(this._timestep)) {
      this._totals.arrived++;
      if (this.admit(passenger)) {
        this._totals.admitted++;
      } else {
        components.rejected++;
        this._totals.rejected++;
      }
    }

    // 2. Expiry
    for (const q of this._queues.values()) {
      for (const passenger of q.removeExpired()) {
        components.abandoned++;
        this._totals.abandoned++;
        this.emit("passenger:abandoned", { payload: { passenger } });
        this.log.debug(`🚶 ${passenger.id} gave up after ${passenger.wait} step(s) at floor ${q.floor}`);
      }
    }

    // 3. Actions, in elevator order
    const effective = codes.map((code, i) => {
      const elevator = this.elevators[i];
      const outcome = executeAction(code, elevator, this);

      for (const passenger of outcome.boarded) {
        this._totals.boarded++;
        this.emit("passenger:boarded", { payload: { passenger, elevator: elevator.id } });
      }
      for (const passenger of outcome.delivered) {
        components.delivered++;
        this._totals.delivered++;
        this.emit("passenger:delivered", { payload: { passenger, elevator: elevator.id } });
      }
      if (outcome.moved) {
        components.movedToward += outcome.moved.toward;
        components.movedAway += outcome.moved.away;
      }
      if (outcome.effective) {
        this.log.debug(`🛗 elevator ${elevator.id}: ${ACTION_NAMES[code]} (floor ${elevator.floor})`);
      }
      return outcome.effective;
    });
    components.inElevator = this.aboardCount;
    components.inQueue = this.queuedCount;

    // 4. Aging
    for (const { passenger } of this.passengers()) passenger.tick();

    // 5. Clock
    this._timestep++;

    const result: BuildingStepResult = {
      timestep: this._timestep,
      reward: scoreComponents(components, this.config.rewardWeights),
      components,
      done: this.config.episodeLength !== null && this._timestep >= this.config.episodeLength,
      effective,
    };

    if (this.config.checkInvariants) this.checkInvariants();

    this.emit("building:step", { payload: { actions: codes, result } });
    return result;
  }

  /**
   * Verify internal consistency.
   * @throws InvariantViolation
   */
  checkInvariants(): void {
    for (const e of this.elevators) e.checkInvariants();

    const seen = new Set<string>();
    for (const q of this._queues.values()) {
      invariant(q.size <= q.maxSize, () => `queue ${q.floor}/${q.direction} holds ${q.size} over ${q.maxSize}`);
    }
    for (const { passenger } of this.passengers()) {
      invariant(!seen.has(passenger.id), () => `passenger ${passenger.id} is in two places`);
      seen.add(passenger.id);
      invariant(
        passenger.wait <= passenger.age,
        () => `passenger ${passenger.id} wait ${passenger.wait} exceeds age ${passenger.age}`
      );
    }

    const t = this._totals;
    invariant(
      this.queuedCount + this.aboardCount + t.delivered + t.abandoned === t.admitted,
      () =>
        `accounting: ${this.queuedCount} queued + ${this.aboardCount} aboard + ${t.delivered} delivered + ` +
        `${t.abandoned} abandoned != ${t.admitted} admitted`
    );
    invariant(
      t.admitted + t.rejected === t.arrived,
      () => `accounting: ${t.admitted} admitted + ${t.rejected} rejected != ${t.arrived} arrived`
    );
  }

  snapshot(): BuildingSnapshot {
    return {
      timestep: this._timestep,
      elevators: this.elevators.map(e => ({
        id: e.id,
        floor: e.floor,
        passengers: e.passengers.map(p => p.id),
      })),
      queues: this.queues.map(q => ({
        floor: q.floor,
        direction: q.direction,
        passengers: q.passengers.map(p => p.id),
      })),
      totals: this.totals,
    };
  }

  private admit(passenger: Passenger): boolean {
    const queue = this.queue(passenger.arrivalFloor, passenger.direction);
    invariant(queue !== undefined, () => `no ${passenger.direction} queue at floor ${passenger.arrivalFloor}`);

    if (!queue.canAdmit()) {
      this.emit("passenger:rejected", { payload: { passenger } });
      this.log.debug(`⛔ ${passenger.id} turned away, floor ${queue.floor} ${queue.direction} queue full`);
      return false;
    }
    queue.enqueue(passenger);
    this.emit("passenger:admitted", { payload: { passenger, queue } });
    return true;
  }

  private defaultRng(): RandomSource {
    return mulberry32(this.config.seed ?? Date.now());
  }
}
