/*
 * interface/observation.ts
 * Building state -> agent observation
 *
 * Only button-level information is exposed: whether some passenger aboard
 * requested a floor, whether a floor's up/down queue is non-empty, and
 * where each elevator is. Passenger counts and identities stay hidden.
 */
import { Building } from "../engine/Building.js";
import { ElevatorSpec } from "../engine/Elevator.js";
import { ObservationMode } from "../engine/config.js";
import { Space } from "./Gym.js";

export interface StructuredObservation {
  /** [elevator][floor]: a passenger aboard requested that floor */
  elevatorButtons: boolean[][];
  /** [floor]: the queue in that direction is non-empty */
  callButtons: { up: boolean[]; down: boolean[] };
  elevatorFloors: number[];
}

export type FlatObservation = number[];

export type ElevatorObservation = StructuredObservation | FlatObservation;

export function encodeStructured(building: Building): StructuredObservation {
  const floors = building.floors;
  const up: boolean[] = [];
  const down: boolean[] = [];
  for (let floor = 0; floor < floors; floor++) {
    up.push(!(building.queue(floor, "up")?.isEmpty ?? true));
    down.push(!(building.queue(floor, "down")?.isEmpty ?? true));
  }

  return {
    elevatorButtons: building.elevators.map(e => {
      const requested = e.destinations();
      return Array.from({ length: floors }, (_, floor) => requested.has(floor));
    }),
    callButtons: { up, down },
    elevatorFloors: building.elevators.map(e => e.floor),
  };
}

/**
 * Layout: elevator buttons (row-major), up calls, down calls, one-hot
 * elevator floors (one row of `floors` per elevator).
 */
export function flatten(obs: StructuredObservation): FlatObservation {
  const floors = obs.callButtons.up.length;
  const bits = (row: boolean[]) => row.map(b => (b ? 1 : 0));
  const out: number[] = [];
  for (const row of obs.elevatorButtons) out.push(...bits(row));
  out.push(...bits(obs.callButtons.up));
  out.push(...bits(obs.callButtons.down));
  for (const floor of obs.elevatorFloors) {
    for (let f = 0; f < floors; f++) out.push(f === floor ? 1 : 0);
  }
  return out;
}

export function encodeObservation(building: Building, mode: ObservationMode): ElevatorObservation {
  const structured = encodeStructured(building);
  return mode === "flattened" ? flatten(structured) : structured;
}

export function flatObservationSize(floors: number, elevators: number): number {
  return floors * elevators + floors * 2 + floors * elevators;
}

export function observationSpace(floors: number, elevators: readonly ElevatorSpec[], mode: ObservationMode): Space {
  const e = elevators.length;
  if (mode === "flattened") {
    const size = flatObservationSize(floors, e);
    return { shape: [size], low: new Array<number>(size).fill(0), high: new Array<number>(size).fill(1) };
  }
  return {
    shape: [],
    spaces: {
      elevatorButtons: { shape: [e, floors], low: new Array<number>(e * floors).fill(0), high: new Array<number>(e * floors).fill(1) },
      callButtons: { shape: [2, floors], low: new Array<number>(2 * floors).fill(0), high: new Array<number>(2 * floors).fill(1) },
      elevatorFloors: {
        shape: [e],
        low: elevators.map(spec => spec.minFloor),
        high: elevators.map(spec => spec.maxFloor),
      },
    },
  };
}
