/*
 * interface/index.ts
 * Barrel exports for the RL interfaces
 */

// Gym interface (single-agent)
export { GymEnvironment } from "./Gym.js";
export type { StepResult, Space, GymEvents } from "./Gym.js";

// Elevator environment
export { ElevatorEnv } from "./ElevatorEnv.js";
export type { ElevatorStepInfo, ElevatorStepResult } from "./ElevatorEnv.js";

// Batched environments
export { VectorizedElevatorEnv } from "./VectorizedElevatorEnv.js";
export type { VectorizedElevatorConfig, BatchStepResult } from "./VectorizedElevatorEnv.js";

// Trajectory recording and replay
export { Recorder } from "./Recorder.js";
export type { RecordedStep, ReplayResult, Trajectory } from "./Recorder.js";

// Observation encoding
export {
  encodeStructured,
  encodeObservation,
  flatten,
  flatObservationSize,
  observationSpace,
} from "./observation.js";
export type { StructuredObservation, FlatObservation, ElevatorObservation } from "./observation.js";
