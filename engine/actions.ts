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

/**
 * Elevator action codes and their handlers.
 *
 * Every code is valid in every state. When an action's precondition does
 * not hold (moving past a bound, loading from an empty or missing queue,
 * loading into a full car, unloading with nobody for this floor) the
 * handler changes nothing and reports `effective: false`.
 */

import { Direction, Passenger } from "./Passenger.js";
import { Elevator, MoveCount } from "./Elevator.js";
import { Queue } from "./Queue.js";

export const Actions = {
  IDLE: 0,
  MOVE_UP: 1,
  MOVE_DOWN: 2,
  LOAD_UP: 3,
  LOAD_DOWN: 4,
  UNLOAD: 5,
} as const;

export type ActionCode = typeof Actions[keyof typeof Actions];

export const NUM_ACTIONS = 6;

export const ACTION_NAMES: Record<ActionCode, string> = {
  0: "idle",
  1: "move up",
  2: "move down",
  3: "load up",
  4: "load down",
  5: "unload",
};

/** What a handler needs from the building */
export interface ActionTarget {
  readonly timestep: number;
  queue(floor: number, direction: Direction): Queue | undefined;
}

export interface ActionOutcome {
  effective: boolean;
  boarded: Passenger[];
  delivered: Passenger[];
  /** Set only when the floor changed */
  moved: MoveCount | null;
}

export type ActionHandler = (elevator: Elevator, target: ActionTarget) => ActionOutcome;

function noEffect(): ActionOutcome {
  return { effective: false, boarded: [], delivered: [], moved: null };
}

function move(elevator: Elevator, step: () => boolean): ActionOutcome {
  const from = elevator.floor;
  if (!step()) return noEffect();
  return { effective: true, boarded: [], delivered: [], moved: elevator.countMoved(from) };
}

function load(elevator: Elevator, target: ActionTarget, direction: Direction): ActionOutcome {
  const queue = target.queue(elevator.floor, direction);
  if (!queue || queue.isEmpty || elevator.isFull) return noEffect();

  const boarded = queue.take(elevator.availableCapacity);
  for (const p of boarded) p.markBoarded(target.timestep);
  elevator.board(boarded);
  return { effective: true, boarded, delivered: [], moved: null };
}

/*━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━
  ACTION REGISTRY
━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━*/

export const ActionRegistry: Readonly<Record<ActionCode, ActionHandler>> = Object.freeze({
  [Actions.IDLE]: () => noEffect(),

  [Actions.MOVE_UP]: (elevator: Elevator) => move(elevator, () => elevator.moveUp()),

  [Actions.MOVE_DOWN]: (elevator: Elevator) => move(elevator, () => elevator.moveDown()),

  [Actions.LOAD_UP]: (elevator: Elevator, target: ActionTarget) => load(elevator, target, "up"),

  [Actions.LOAD_DOWN]: (elevator: Elevator, target: ActionTarget) => load(elevator, target, "down"),

  /**
   * Drop off everyone whose destination is the current floor
   */
  [Actions.UNLOAD]: (elevator: Elevator) => {
    const delivered = elevator.unload();
    if (delivered.length === 0) return noEffect();
    return { effective: true, boarded: [], delivered, moved: null };
  },
});

/*━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━
  UTILITY FUNCTIONS
━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━*/

export function isActionCode(value: unknown): value is ActionCode {
  return typeof value === "number" && Number.isInteger(value) && value >= 0 && value < NUM_ACTIONS;
}

/**
 * Check an action vector against the elevator count and the 0–5 bound.
 * @throws RangeError on a wrong length or an unknown code
 */
export function validateActions(actions: readonly number[], elevators: number): ActionCode[] {
  if (actions.length !== elevators) {
    throw new RangeError(`Expected ${elevators} actions (one per elevator), got ${actions.length}`);
  }
  return actions.map((action, i) => {
    if (!isActionCode(action)) {
      throw new RangeError(`Action for elevator ${i} must be an integer in [0, ${NUM_ACTIONS - 1}], got ${action}`);
    }
    return action;
  });
}

export function executeAction(code: ActionCode, elevator: Elevator, target: ActionTarget): ActionOutcome {
  return ActionRegistry[code](elevator, target);
}

export function listActions(): string[] {
  return Object.values(ACTION_NAMES);
}
