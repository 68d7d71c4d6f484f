/**
 * Vectorized Elevator Environment for Batch RL Training
 *
 * Runs N independent elevator environments side by side.
 * Compatible with standard vectorized environment interfaces (Gym VecEnv).
 *
 * - Batched reset/step operations
 * - Automatic environment reset on truncation
 * - Each environment owns its building, queues and random streams
 */

import { ElevatorEnv, ElevatorStepInfo } from "./ElevatorEnv.js";
import { ElevatorObservation } from "./observation.js";
import { BuildingConfig } from "../engine/config.js";

/**
 * Configuration for vectorized environment
 */
export interface VectorizedElevatorConfig extends BuildingConfig {
  /** Number of parallel environments (default: 8) */
  numEnvs?: number;
  /** Auto-reset environments when an episode ends (default: true) */
  autoReset?: boolean;
}

/**
 * Batched step result
 */
export interface BatchStepResult {
  /** Observations for all envs, after any auto-reset */
  observations: ElevatorObservation[];
  rewards: number[];
  terminateds: boolean[];
  truncateds: boolean[];
  infos: ElevatorStepInfo[];
}

export class VectorizedElevatorEnv {
  private envs: ElevatorEnv[];
  private autoReset: boolean;
  private baseSeed: number;

  constructor(config: VectorizedElevatorConfig = {}) {
    const { numEnvs = 8, autoReset = true, ...buildingConfig } = config;
    if (!Number.isInteger(numEnvs) || numEnvs < 1) {
      throw new RangeError(`numEnvs must be a positive integer, got ${numEnvs}`);
    }

    this.autoReset = autoReset;
    this.baseSeed = buildingConfig.seed ?? Date.now();

    // Each env gets its own copy of the configuration and a distinct seed
    this.envs = [];
    for (let i = 0; i < numEnvs; i++) {
      this.envs.push(new ElevatorEnv({ ...buildingConfig, seed: this.seedFor(i) }));
    }
  }

  /**
   * Number of parallel environments
   */
  get numEnvs(): number {
    return this.envs.length;
  }

  /**
   * Environment at `index`, for inspection
   */
  env(index: number): ElevatorEnv {
    const env = this.envs[index];
    if (!env) throw new RangeError(`No environment at index ${index}`);
    return env;
  }

  /**
   * Reset all environments
   * @returns Initial observations [numEnvs]
   */
  reset(seed?: number): ElevatorObservation[] {
    if (seed !== undefined) this.baseSeed = seed;
    return this.envs.map((env, i) => env.reset(this.seedFor(i)));
  }

  /**
   * Take actions in all environments
   * @param actions Action vector for each environment [numEnvs][numElevators]
   */
  step(actions: number[][]): BatchStepResult {
    if (actions.length !== this.envs.length) {
      throw new RangeError(`Expected ${this.envs.length} action vectors, got ${actions.length}`);
    }

    const result: BatchStepResult = {
      observations: [],
      rewards: [],
      terminateds: [],
      truncateds: [],
      infos: [],
    };

    this.envs.forEach((env, i) => {
      const step = env.step(actions[i]);
      result.rewards.push(step.reward);
      result.terminateds.push(step.terminated);
      result.truncateds.push(step.truncated);
      result.infos.push(step.info);

      if ((step.terminated || step.truncated) && this.autoReset) {
        result.observations.push(env.reset());
      } else {
        result.observations.push(step.observation);
      }
    });

    return result;
  }

  sampleActions(): number[][] {
    return this.envs.map(env => env.sampleAction());
  }

  private seedFor(index: number): number {
    return this.baseSeed + index * 1000;
  }
}
