/*
 * interface/ElevatorEnv.ts
 * Gym environment for multi-elevator control
 *
 * Actions: one code per elevator (MultiDiscrete, 6 per elevator)
 *   0: Idle
 *   1: Move up
 *   2: Move down
 *   3: Load from the up queue
 *   4: Load from the down queue
 *   5: Unload passengers for this floor
 *
 * Rewards are a weighted sum of per-step counts (delivered, moved toward or
 * away from destination, rejected, abandoned, riding, waiting). The episode
 * never terminates by itself; it is truncated when `episodeLength` is set
 * and reached.
 */
import { GymEnvironment, StepResult, Space } from "./Gym.js";
import {
  ElevatorObservation,
  FlatObservation,
  StructuredObservation,
  encodeObservation,
  encodeStructured,
  flatten,
  observationSpace,
} from "./observation.js";
import { Building, BuildingTotals } from "../engine/Building.js";
import { BuildingConfig, ResolvedBuildingConfig, resolveConfig } from "../engine/config.js";
import { NUM_ACTIONS } from "../engine/actions.js";
import { RewardComponents } from "../engine/rewards.js";
import { mulberry32, randomInt, RandomSource } from "../core/random.js";
import { createLogger, Logger } from "../core/log.js";

export interface ElevatorStepInfo {
  timestep: number;
  components: RewardComponents;
  totals: BuildingTotals;
  /** Per elevator: whether its action changed anything */
  effective: boolean[];
}

export type ElevatorStepResult = StepResult<ElevatorObservation, ElevatorStepInfo>;

// Keeps the action-sampling stream apart from the arrival stream
const ACTION_STREAM_SALT = 0x9e3779b9;

function nextSeed(rng: RandomSource): number {
  return Math.floor(rng() * 0x100000000);
}

export class ElevatorEnv extends GymEnvironment<ElevatorObservation, number[], ElevatorStepInfo> {
  config: BuildingConfig;
  resolved: ResolvedBuildingConfig;
  readonly log: Logger;

  private _building: Building | null = null;
  private _seed: number | null = null;
  private _episodeSeeds: RandomSource | null = null;
  private _actionRng: RandomSource;

  /**
   * @throws ConfigurationError
   */
  constructor(config: BuildingConfig = {}) {
    super();
    this.config = config;
    this.resolved = resolveConfig(config);
    this.log = createLogger("env", this.resolved.debug);
    this._actionRng = mulberry32((this.resolved.seed ?? 0) ^ ACTION_STREAM_SALT);
  }

  get observationSpace(): Space {
    return observationSpace(this.resolved.floors, this.resolved.elevators, this.resolved.observationMode);
  }

  get actionSpace(): Space {
    const nvec = this.resolved.elevators.map(() => NUM_ACTIONS);
    return { shape: [nvec.length], nvec };
  }

  /** Number of elevators, i.e. the length of an action vector */
  get numElevators(): number {
    return this.resolved.elevators.length;
  }

  /** Seed of the current episode, null before the first reset */
  get seed(): number | null {
    return this._seed;
  }

  get building(): Building {
    if (!this._building) throw new Error("Environment has not been reset");
    return this._building;
  }

  /**
   * Start a new episode.
   *
   * With a seed, the episode (and the seeds of later unseeded resets) is
   * reproducible. Without one, the next seed comes from the previous seeded
   * stream, or from `config.seed`, or the clock. Passing `config` discards
   * the previous stream.
   *
   * @param seed - Episode seed
   * @param config - Replacement configuration, validated before use
   * @throws ConfigurationError
   */
  reset(seed?: number, config?: BuildingConfig): ElevatorObservation {
    if (config) {
      this.resolved = resolveConfig(config);
      this.config = config;
      this.log.enabled = this.resolved.debug;
      // A new configuration starts a new seed stream
      this._episodeSeeds = null;
    }

    let episodeSeed: number;
    if (seed !== undefined) {
      episodeSeed = seed;
      this._episodeSeeds = mulberry32(seed);
    } else if (this._episodeSeeds) {
      episodeSeed = nextSeed(this._episodeSeeds);
    } else {
      episodeSeed = this.resolved.seed ?? Date.now();
      this._episodeSeeds = mulberry32(episodeSeed);
    }

    this._seed = episodeSeed;
    this._actionRng = mulberry32(episodeSeed ^ ACTION_STREAM_SALT);
    this._building = new Building(this.config, mulberry32(episodeSeed));

    const observation = this.observe();
    this.log.info(`🎬 episode reset (seed ${episodeSeed})`);
    this.emit("env:reset", { payload: { seed: episodeSeed, observation } });
    return observation;
  }

  /**
   * @param actions - One action code (0-5) per elevator, in elevator order
   * @throws Error before the first reset; RangeError on a malformed action vector
   */
  step(actions: number[]): ElevatorStepResult {
    const building = this.building;
    const result = building.step(actions);
    const observation = this.observe();

    const stepResult: ElevatorStepResult = {
      observation,
      reward: result.reward,
      terminated: false,
      truncated: result.done,
      info: {
        timestep: result.timestep,
        components: result.components,
        totals: building.totals,
        effective: result.effective,
      },
    };

    if (result.done) this.log.info(`🏁 episode truncated at step ${result.timestep}`);
    this.emit("env:step", { payload: { action: [...actions], ...stepResult } });
    return stepResult;
  }

  /** Observation in the configured mode */
  observe(): ElevatorObservation {
    return encodeObservation(this.building, this.resolved.observationMode);
  }

  structured(): StructuredObservation {
    return encodeStructured(this.building);
  }

  flattened(): FlatObservation {
    return flatten(encodeStructured(this.building));
  }

  /**
   * Uniformly random action vector from the episode's action stream.
   */
  sampleAction(): number[] {
    return this.resolved.elevators.map(() => randomInt(this._actionRng, NUM_ACTIONS));
  }
}
