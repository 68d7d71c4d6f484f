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
 * Test suite for Passenger
 * Tests: construction, direction, aging, expiry, movement classification
 */

import { Passenger, PassengerInit } from '../engine/Passenger.js';
import { ConfigurationError } from '../core/errors.js';

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

function makePassenger(overrides: Partial<PassengerInit> = {}): Passenger {
  return new Passenger({
    id: 'p-1',
    arrivalFloor: 0,
    destinationFloor: 5,
    arrivalStep: 0,
    maxWait: 50,
    ...overrides,
  });
}

console.log('\n🧪 Testing Passenger\n');
console.log('═'.repeat(60));

// ============================================================================
// CONSTRUCTION
// ============================================================================

console.log('\n🧍 Construction Tests\n');

test('Passenger starts with zero wait and age', () => {
  const p = makePassenger({ arrivalStep: 7 });

  assertEquals(p.wait, 0, 'Wait should start at 0');
  assertEquals(p.age, 0, 'Age should start at 0');
  assertEquals(p.arrivalStep, 7, 'Arrival step should be kept');
  assertEquals(p.boardedAt, null, 'Should not be boarded');
  assertEquals(p.aboard, false, 'Should not be aboard');
});

test('Passenger rejects a destination equal to the arrival floor', () => {
  let error: unknown = null;
  try {
    makePassenger({ arrivalFloor: 3, destinationFloor: 3 });
  } catch (err) {
    error = err;
  }
  assert(error instanceof ConfigurationError, 'Should throw ConfigurationError');
});

test('Direction follows the sign of destination - arrival', () => {
  assertEquals(makePassenger({ arrivalFloor: 2, destinationFloor: 4 }).direction, 'up');
  assertEquals(makePassenger({ arrivalFloor: 2, destinationFloor: 0 }).direction, 'down');
});

// ============================================================================
// AGING
// ============================================================================

console.log('\n⏱️  Aging Tests\n');

test('tick() increments wait and age while queued', () => {
  const p = makePassenger();
  p.tick();
  p.tick();

  assertEquals(p.wait, 2, 'Wait should be 2');
  assertEquals(p.age, 2, 'Age should be 2');
});

test('tick() freezes wait once boarded', () => {
  const p = makePassenger();
  p.tick();
  p.markBoarded(1);
  p.tick();
  p.tick();

  assertEquals(p.wait, 1, 'Wait should stay at 1');
  assertEquals(p.age, 3, 'Age should keep growing');
  assertEquals(p.boardedAt, 1, 'Boarding step should be kept');
  assert(p.wait <= p.age, 'Wait should never exceed age');
});

// ============================================================================
// EXPIRY
// ============================================================================

console.log('\n⌛ Expiry Tests\n');

test('hasExpired() triggers when wait reaches maxWait', () => {
  const p = makePassenger({ maxWait: 2 });

  assertEquals(p.hasExpired(), false, 'Fresh passenger should not expire');
  p.tick();
  assertEquals(p.hasExpired(), false, 'Wait 1 of 2 should not expire');
  p.tick();
  assertEquals(p.hasExpired(), true, 'Wait 2 of 2 should expire');
});

test('hasExpired() is immediate with maxWait 0', () => {
  assertEquals(makePassenger({ maxWait: 0 }).hasExpired(), true);
});

// ============================================================================
// MOVEMENT
// ============================================================================

console.log('\n↕️  Movement Tests\n');

test('movedToward() compares distance before and after', () => {
  const p = makePassenger({ destinationFloor: 5 });

  assertEquals(p.movedToward(2, 3), true, 'Up toward 5');
  assertEquals(p.movedToward(3, 2), false, 'Down away from 5');
});

test('movedToward() counts leaving the destination floor as away', () => {
  const p = makePassenger({ arrivalFloor: 0, destinationFloor: 2 });

  assertEquals(p.movedToward(2, 3), false);
  assertEquals(p.movedToward(2, 1), false);
});

test('isAt() matches only the destination floor', () => {
  const p = makePassenger({ destinationFloor: 4 });

  assertEquals(p.isAt(4), true);
  assertEquals(p.isAt(3), false);
});

test('toJSON() exposes the passenger record', () => {
  const p = makePassenger({ id: 't3-f1-0', arrivalFloor: 1, destinationFloor: 0, arrivalStep: 3, maxWait: 9 });
  p.tick();

  assertEquals(
    JSON.stringify(p),
    JSON.stringify({
      id: 't3-f1-0',
      arrivalFloor: 1,
      destinationFloor: 0,
      arrivalStep: 3,
      maxWait: 9,
      wait: 1,
      age: 1,
      boardedAt: null,
    })
  );
});

// ============================================================================
// RESULTS
// ============================================================================

console.log('\n' + '═'.repeat(60));
console.log(`\n📊 Test Results: ${passCount}/${testCount} passed\n`);

if (failCount === 0) {
  console.log('🎉 All passenger tests passed!\n');
  process.exit(0);
} else {
  console.log(`❌ ${failCount} tests failed\n`);
  process.exit(1);
}
