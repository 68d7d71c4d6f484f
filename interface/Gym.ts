/*
 * interface/Gym.ts
 * A standardized Reinforcement Learning interface
 * Compatible with OpenAI Gym / Gymnasium API paradigms.
 */
import { Emitter } from "../core/events.js";

export interface StepResult<TObs, TInfo> {
  observation: TObs;
  reward: number;
  terminated: boolean; // Episode ended inside the simulation
  truncated: boolean;  // Episode cap reached
  info: TInfo;
}

/**
 * Space description.
 * - Box: `shape` with `low`/`high` bounds per entry
 * - Discrete: `n`
 * - MultiDiscrete: `nvec`, one entry per sub-action
 * - Dict: named sub-spaces in `spaces`
 */
export interface Space {
  shape: number[];
  low?: number[];
  high?: number[];
  n?: number; // For discrete spaces
  nvec?: number[]; // For multi-discrete spaces
  spaces?: Record<string, Space>;
}

export interface GymEvents<TObs, TAction, TInfo> {
  "env:reset": { payload: { seed: number; observation: TObs } };
  "env:step": { payload: { action: TAction } & StepResult<TObs, TInfo> };
}

/**
 * Abstract base class for RL environments.
 * Wraps a simulation and converts its state into observations.
 *
 * Subclasses emit `env:reset` and `env:step` so recorders and loggers can
 * follow an episode without wrapping the environment.
 */
export abstract class GymEnvironment<TObs, TAction, TInfo> extends Emitter<GymEvents<TObs, TAction, TInfo>> {
  abstract get observationSpace(): Space;
  abstract get actionSpace(): Space;

  /**
   * Resets the simulation to an initial state.
   * @returns The initial observation.
   */
  abstract reset(seed?: number): TObs;

  /**
   * Executes one time-step within the environment.
   * @param action - The action chosen by the agent.
   */
  abstract step(action: TAction): StepResult<TObs, TInfo>;
}
