#!/usr/bin/env node
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

/**
 * Test suite for Elevator and Queue
 * Tests: bounded movement, boarding, unloading, move classification, FIFO queues
 */

import { Elevator } from '../engine/Elevator.js';
import { Queue } from '../engine/Queue.js';
import { Passenger } from '../engine/Passenger.js';
import { InvariantViolation } from '../core/errors.js';

// Test helpers
let testCount = 0;
let passCount = 0;
let failCount = 0;

function test(name: string, fn: () => void) {
  testCount++;
  try {
    fn();
    passCount++;
    console.log(`✓ ${name}`);
  } catch (err) {
    failCount++;
    console.error(`✗ ${name}`);
    console.error(`  ${err instanceof Error ? err.message : String(err)}`);
  }
}

function assert(condition: boolean, message: string) {
  if (!condition) {
    throw new Error(message || 'Assertion failed');
  }
}

function assertEquals(actual: unknown, expected: unknown, message?: string) {
  if (actual !== expected) {
    throw new Error(message || `Expected ${expected}, got ${actual}`);
  }
}

function assertThrows(fn: () => void, kind: new (...args: never[]) => Error, message: string) {
  try {
    fn();
  } catch (err) {
    if (err instanceof kind) return;
    throw new Error(`${message}: threw ${String(err)}`);
  }
  throw new Error(`${message}: did not throw`);
}

function rider(id: string, arrivalFloor: number, destinationFloor: number, arrivalStep = 0, maxWait = 50): Passenger {
  return new Passenger({ id, arrivalFloor, destinationFloor, arrivalStep, maxWait });
}

function makeElevator(minFloor = 0, maxFloor = 10, capacity = 10, startFloor = minFloor): Elevator {
  return new Elevator(0, { minFloor, maxFloor, capacity, startFloor });
}

console.log('\n🧪 Testing Elevator and Queue\n');
console.log('═'.repeat(60));

// ============================================================================
// MOVEMENT
// ============================================================================

console.log('\n🛗 Movement Tests\n');

test('moveUp() and moveDown() change floor by one', () => {
  const elevator = makeElevator();

  assertEquals(elevator.moveUp(), true);
  assertEquals(elevator.floor, 1);
  assertEquals(elevator.moveDown(), true);
  assertEquals(elevator.floor, 0);
});

test('moveUp() at the ceiling is an idempotent no-op', () => {
  const elevator = makeElevator(0, 2, 10, 2);

  for (let i = 0; i < 5; i++) {
    assertEquals(elevator.moveUp(), false, `Attempt ${i} should not move`);
    assertEquals(elevator.floor, 2, 'Should stay at the ceiling');
  }
});

test('moveDown() stops at a raised minimum floor', () => {
  const elevator = makeElevator(5, 10, 10, 5);

  assertEquals(elevator.moveDown(), false);
  assertEquals(elevator.floor, 5);
});

test('Constructing with a start floor outside the range is an invariant violation', () => {
  assertThrows(() => makeElevator(2, 5, 10, 1), InvariantViolation, 'Start below range');
});

// ============================================================================
// BOARDING / UNLOADING
// ============================================================================

console.log('\n🧳 Boarding Tests\n');

test('board() fills capacity and tracks destinations', () => {
  const elevator = makeElevator();
  elevator.board([rider('a', 0, 5), rider('b', 0, 9), rider('c', 0, 2), rider('d', 0, 2)]);

  assertEquals(elevator.load, 4);
  assertEquals(elevator.availableCapacity, 6);
  assertEquals(JSON.stringify([...elevator.destinations()].sort((x, y) => x - y)), JSON.stringify([2, 5, 9]));
});

test('board() beyond capacity is an invariant violation', () => {
  const elevator = makeElevator(0, 10, 1);

  assertThrows(() => elevator.board([rider('a', 0, 1), rider('b', 0, 2)]), InvariantViolation, 'Over capacity');
  assertEquals(elevator.load, 0, 'Nothing should board');
});

test('unload() removes exactly the passengers for the current floor', () => {
  const elevator = makeElevator();
  elevator.board([rider('a', 0, 2), rider('b', 0, 3), rider('c', 0, 2)]);
  elevator.moveUp();
  elevator.moveUp();

  const leaving = elevator.unload();

  assertEquals(leaving.map(p => p.id).join(','), 'a,c');
  assertEquals(elevator.passengers.map(p => p.id).join(','), 'b');
  assertEquals(elevator.unload().length, 0, 'Second unload finds nobody');
});

test('countMoved() classifies passengers aboard', () => {
  const elevator = makeElevator(0, 10, 10, 3);
  elevator.board([rider('up', 3, 7), rider('down', 3, 0), rider('here', 2, 4)]);
  elevator.moveUp();

  const moved = elevator.countMoved(3);

  assertEquals(moved.toward, 2, '"up" and "here" got closer');
  assertEquals(moved.away, 1, '"down" got further');
});

test('reset() empties the car and returns to the start floor', () => {
  const elevator = makeElevator(0, 10, 10, 4);
  elevator.board([rider('a', 4, 8)]);
  elevator.moveUp();
  elevator.reset();

  assertEquals(elevator.floor, 4);
  assertEquals(elevator.load, 0);
});

// ============================================================================
// QUEUE
// ============================================================================

console.log('\n🚶 Queue Tests\n');

test('take() serves earliest arrivals first', () => {
  const queue = new Queue(0, 'up', 10);
  queue.enqueue(rider('first', 0, 1, 0));
  queue.enqueue(rider('second', 0, 3, 1));
  queue.enqueue(rider('third', 0, 2, 2));

  assertEquals(queue.take(2).map(p => p.id).join(','), 'first,second');
  assertEquals(queue.passengers.map(p => p.id).join(','), 'third');
  assertEquals(queue.take(0).length, 0);
});

test('canAdmit() respects the bound, including zero', () => {
  const closed = new Queue(0, 'up', 0);
  assertEquals(closed.canAdmit(), false);

  const small = new Queue(1, 'down', 1);
  small.enqueue(rider('a', 1, 0));
  assertEquals(small.canAdmit(), false);
  assertThrows(() => small.enqueue(rider('b', 1, 0)), InvariantViolation, 'Enqueue into full queue');
});

test('enqueue() refuses a passenger for another floor or direction', () => {
  const queue = new Queue(2, 'up', 5);

  assertThrows(() => queue.enqueue(rider('x', 2, 0)), InvariantViolation, 'Wrong direction');
  assertThrows(() => queue.enqueue(rider('y', 1, 4)), InvariantViolation, 'Wrong floor');
});

test('removeExpired() drops only passengers at their wait limit', () => {
  const queue = new Queue(0, 'up', 5);
  const patient = rider('patient', 0, 1, 0, 3);
  const hasty = rider('hasty', 0, 1, 0, 1);
  queue.enqueue(patient);
  queue.enqueue(hasty);
  patient.tick();
  hasty.tick();

  assertEquals(queue.removeExpired().map(p => p.id).join(','), 'hasty');
  assertEquals(queue.passengers.map(p => p.id).join(','), 'patient');
});

// ============================================================================
// RESULTS
// ============================================================================

console.log('\n' + '═'.repeat(60));
console.log(`\n📊 Test Results: ${passCount}/${testCount} passed\n`);

if (failCount === 0) {
  console.log('🎉 All elevator and queue tests passed!\n');
  process.exit(0);
} else {
  console.log(`❌ ${failCount} tests failed\n`);
  process.exit(1);
}
