/*
 * interface/Recorder.ts
 * Trajectory logger + replay utility
 */

import { ElevatorEnv, ElevatorStepResult } from "./ElevatorEnv.js";
import { ElevatorObservation } from "./observation.js";

export interface RecordedStep {
  actions: number[];
  reward: number;
  observation: ElevatorObservation;
}

export interface Trajectory {
  seed: number | null;
  steps: RecordedStep[];
}

export interface ReplayResult {
  /** Steps replayed before stopping */
  replayed: number;
  /** Index of the first step whose reward or observation differed, or null */
  divergedAt: number | null;
}

/**
 * Recorder for capturing and replaying episodes.
 *
 * Useful for debugging, testing, and checking that a seed and an action
 * sequence reproduce the same trajectory. The log is plain JSON.
 */
export class Recorder {
  env: ElevatorEnv;
  log: Trajectory;
  enabled: boolean;

  private _onReset = (e: { payload: { seed: number } }) => {
    if (!this.enabled) return;
    this.log = { seed: e.payload.seed, steps: [] };
  };

  private _onStep = (e: { payload: { action: number[] } & ElevatorStepResult }) => {
    if (!this.enabled) return;
    const { action, reward, observation } = e.payload;
    this.log.steps.push({ actions: [...action], reward, observation: structuredClone(observation) });
  };

  constructor(env: ElevatorEnv) {
    this.env = env;
    this.log = { seed: env.seed, steps: [] };
    this.enabled = false;
  }

  /**
   * Start recording. A reset while recording starts a fresh log.
   */
  start(): this {
    if (this.enabled) return this;
    this.enabled = true;
    this.env.on("env:reset", this._onReset);
    this.env.on("env:step", this._onStep);
    return this;
  }

  /**
   * Stop recording
   */
  stop(): this {
    if (!this.enabled) return this;
    this.enabled = false;
    this.env.off("env:reset", this._onReset);
    this.env.off("env:step", this._onStep);
    return this;
  }

  clear(): this {
    this.log = { seed: this.env.seed, steps: [] };
    return this;
  }

  exportJSON(): string {
    return JSON.stringify(this.log, null, 2);
  }

  /**
   * Load a trajectory from JSON text or a parsed object.
   * @throws Error if the data is not a trajectory
   */
  importJSON(json: string | unknown): this {
    const data: unknown = typeof json === "string" ? JSON.parse(json) : json;
    if (!isTrajectory(data)) throw new Error("Invalid trajectory format");
    this.log = data;
    return this;
  }

  /**
   * Reset `target` with the recorded seed and re-apply the recorded actions,
   * comparing each reward and observation with the log.
   *
   * @param options.stopOnDivergence - Stop at the first mismatch (default: true)
   */
  replay(target: ElevatorEnv, { stopOnDivergence = true }: { stopOnDivergence?: boolean } = {}): ReplayResult {
    // Resetting the recorded env while recording replaces this.log
    const { seed, steps } = this.log;
    if (seed === null) throw new Error("Trajectory has no seed to replay from");

    target.reset(seed);
    let divergedAt: number | null = null;
    let replayed = 0;

    for (let i = 0; i < steps.length; i++) {
      const expected = steps[i];
      const actual = target.step(expected.actions);
      replayed++;
      const same =
        actual.reward === expected.reward &&
        JSON.stringify(actual.observation) === JSON.stringify(expected.observation);
      if (!same && divergedAt === null) {
        divergedAt = i;
        if (stopOnDivergence) break;
      }
    }

    return { replayed, divergedAt };
  }
}

function isRecordedStep(value: unknown): value is RecordedStep {
  if (typeof value !== "object" || value === null) return false;
  if (!("actions" in value) || !("reward" in value) || !("observation" in value)) return false;
  return (
    Array.isArray(value.actions) &&
    value.actions.every(a => typeof a === "number") &&
    typeof value.reward === "number" &&
    typeof value.observation === "object" &&
    value.observation !== null
  );
}

function isTrajectory(value: unknown): value is Trajectory {
  if (typeof value !== "object" || value === null) return false;
  if (!("seed" in value) || !("steps" in value)) return false;
  return (
    (value.seed === null || typeof value.seed === "number") &&
    Array.isArray(value.steps) &&
    value.steps.every(isRecordedStep)
  );
}
