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
 * core/errors.ts
 * Error kinds raised by the simulation
 */

/**
 * Malformed configuration detected at construction or reset time.
 * Fatal: the offending value is never corrected silently.
 */
export class ConfigurationError extends Error {
  /** Option path of the offending value, e.g. `elevators[1].capacity` */
  readonly path: string;

  constructor(path: string, message: string) {
    super(`Invalid configuration at ${path}: ${message}`);
    this.name = "ConfigurationError";
    this.path = path;
  }
}

/**
 * A broken internal invariant. Signals a bug in the core, not a
 * simulation outcome.
 */
export class InvariantViolation extends Error {
  constructor(message: string) {
    super(`Invariant violated: ${message}`);
    this.name = "InvariantViolation";
  }
}

export function invariant(condition: boolean, message: string | (() => string)): asserts condition {
  if (!condition) {
    throw new InvariantViolation(typeof message === "function" ? message() : message);
  }
}
