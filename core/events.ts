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
 * core/events.ts
 * Minimal typed event emitter shared by the simulation and environment layers
 */

export type Listener<T> = (event: T) => void;

/**
 * Synchronous event emitter.
 *
 * Listeners run in registration order, inside the `emit` call. A listener
 * that throws stops the emit and the error reaches the caller.
 */
export class Emitter<TEvents extends object = Record<string, unknown>> {
  private _listeners: { [K in keyof TEvents]?: Set<Listener<TEvents[K]>> } = {};

  on<K extends keyof TEvents>(type: K, fn: Listener<TEvents[K]>): this {
    let set = this._listeners[type];
    if (!set) {
      set = new Set<Listener<TEvents[K]>>();
      this._listeners[type] = set;
    }
    set.add(fn);
    return this;
  }

  once<K extends keyof TEvents>(type: K, fn: Listener<TEvents[K]>): this {
    const wrapper: Listener<TEvents[K]> = (event) => {
      this.off(type, wrapper);
      fn(event);
    };
    return this.on(type, wrapper);
  }

  off<K extends keyof TEvents>(type: K, fn: Listener<TEvents[K]>): this {
    const set = this._listeners[type];
    if (set) {
      set.delete(fn);
      if (set.size === 0) delete this._listeners[type];
    }
    return this;
  }

  emit<K extends keyof TEvents>(type: K, event: TEvents[K]): boolean {
    const set = this._listeners[type];
    if (!set || set.size === 0) return false;
    for (const fn of [...set]) {
      fn(event);
    }
    return true;
  }

  listenerCount<K extends keyof TEvents>(type: K): number {
    return this._listeners[type]?.size ?? 0;
  }

  removeAllListeners(): this {
    this._listeners = {};
    return this;
  }
}
