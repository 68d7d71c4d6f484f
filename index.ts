/*
 * index.ts
 * Public API
 */

export * from "./interface/index.js";

// Simulation
export { Building } from "./engine/Building.js";
export type {
  BuildingEvents,
  BuildingSnapshot,
  BuildingStepResult,
  BuildingTotals,
  PassengerLocation,
} from "./engine/Building.js";
export { Elevator } from "./engine/Elevator.js";
export type { ElevatorSpec, MoveCount } from "./engine/Elevator.js";
export { Passenger } from "./engine/Passenger.js";
export type { Direction, PassengerInit } from "./engine/Passenger.js";
export { Queue } from "./engine/Queue.js";
export {
  ArrivalGenerator,
  ScheduledArrivals,
  PROBABILITY_TOLERANCE,
  defaultArrivalParams,
  passengerId,
  validateArrivalParams,
} from "./engine/ArrivalGenerator.js";
export type { ArrivalParams, ArrivalSource, ScheduledArrival } from "./engine/ArrivalGenerator.js";
export { Actions, ACTION_NAMES, ActionRegistry, NUM_ACTIONS, isActionCode, listActions } from "./engine/actions.js";
export type { ActionCode } from "./engine/actions.js";
export {
  DEFAULT_REWARD_WEIGHTS,
  REWARD_COMPONENTS,
  resolveRewardWeights,
  scoreComponents,
} from "./engine/rewards.js";
export type { RewardComponents, RewardWeights } from "./engine/rewards.js";
export { DEFAULTS, poissonArrivals, resolveConfig, scheduledArrivals } from "./engine/config.js";
export type {
  ArrivalFactory,
  BuildingConfig,
  ElevatorConfig,
  ObservationMode,
  ResolvedBuildingConfig,
} from "./engine/config.js";

// Utilities
export { Emitter } from "./core/events.js";
export { ConfigurationError, InvariantViolation } from "./core/errors.js";
export { createLogger } from "./core/log.js";
export type { Logger, LogLevel } from "./core/log.js";
export { mulberry32 } from "./core/random.js";
export type { RandomSource } from "./core/random.js";
