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
 * core/log.ts
 * Scoped console logger, silent unless enabled
 */
import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  enabled: boolean;
  readonly scope: string;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

const MARKERS: Record<LogLevel, string> = {
  debug: "🔍",
  info: "📋",
  warn: "⚠️",
  error: "❌",
};

const COLORS: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

export function formatLine(scope: string, level: LogLevel, message: string): string {
  return `${chalk.gray(`[${scope}]`)} ${MARKERS[level]} ${COLORS[level](message)}`;
}

/**
 * Create a logger for one component. Warnings and errors are always
 * written; debug and info only while `enabled` is true.
 */
export function createLogger(scope: string, enabled = false): Logger {
  return {
    enabled,
    scope,
    debug(message) {
      if (this.enabled) console.log(formatLine(scope, "debug", message));
    },
    info(message) {
      if (this.enabled) console.log(formatLine(scope, "info", message));
    },
    warn(message) {
      console.warn(formatLine(scope, "warn", message));
    },
    error(message, error) {
      console.error(formatLine(scope, "error", message));
      if (error !== undefined) console.error(error);
    },
  };
}
