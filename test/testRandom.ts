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
 * Test suite for random utilities
 * Tests: mulberry32 PRNG, Poisson counts, categorical draws
 */

import { mulberry32, samplePoisson, sampleCategorical, randomInt } from '../core/random.js';

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

console.log('\n🧪 Testing Random Utilities\n');
console.log('═'.repeat(60));

// ============================================================================
// mulberry32() TESTS
// ============================================================================

console.log('\n🎲 mulberry32() PRNG Tests\n');

test('mulberry32() generates numbers in [0, 1) range', () => {
  const rng = mulberry32(12345);

  for (let i = 0; i < 100; i++) {
    const value = rng();

    assert(value >= 0, `Value should be >= 0, got ${value}`);
    assert(value < 1, `Value should be < 1, got ${value}`);
  }
});

test('mulberry32() with same seed produces same sequence', () => {
  const rng1 = mulberry32(54321);
  const rng2 = mulberry32(54321);

  for (let i = 0; i < 5; i++) {
    assertEquals(rng1(), rng2(), `Value ${i} should match`);
  }
});

test('mulberry32() handles edge case seeds', () => {
  for (const seed of [0, 1, -1, 0xFFFFFFFF, Date.UTC(2024, 0, 1)]) {
    const value = mulberry32(seed)();
    assert(value >= 0 && value < 1, `Seed ${seed} should produce valid value`);
  }
});

// ============================================================================
// samplePoisson() TESTS
// ============================================================================

console.log('\n📈 samplePoisson() Tests\n');

test('samplePoisson() returns 0 for a zero or negative rate', () => {
  const rng = mulberry32(1);
  assertEquals(samplePoisson(rng, 0), 0);
  assertEquals(samplePoisson(rng, -2), 0);
});

test('samplePoisson() multiplies uniforms until below exp(-lambda)', () => {
  // exp(-1) ≈ 0.368: 0.5 stays above, 0.25 drops below -> one arrival
  assertEquals(samplePoisson(() => 0.5, 1), 1);
  // exp(-0.1) ≈ 0.905: 0.5 is already below -> no arrival
  assertEquals(samplePoisson(() => 0.5, 0.1), 0);
});

test('samplePoisson() mean tracks a small rate', () => {
  const rng = mulberry32(2024);
  let total = 0;
  for (let i = 0; i < 2000; i++) total += samplePoisson(rng, 3);
  const mean = total / 2000;
  assert(mean > 2.7 && mean < 3.3, `Mean should be ~3, got ${mean}`);
});

test('samplePoisson() mean tracks a large rate', () => {
  const rng = mulberry32(7);
  let total = 0;
  for (let i = 0; i < 500; i++) total += samplePoisson(rng, 100);
  const mean = total / 500;
  assert(mean > 97 && mean < 103, `Mean should be ~100, got ${mean}`);
});

test('samplePoisson() always returns a non-negative integer', () => {
  const rng = mulberry32(99);
  for (let i = 0; i < 200; i++) {
    const k = samplePoisson(rng, 0.7);
    assert(Number.isInteger(k) && k >= 0, `Expected non-negative integer, got ${k}`);
  }
});

// ============================================================================
// sampleCategorical() TESTS
// ============================================================================

console.log('\n🎯 sampleCategorical() Tests\n');

test('sampleCategorical() walks cumulative weights', () => {
  const weights = [0, 1, 3];
  assertEquals(sampleCategorical(() => 0, weights), 1);
  assertEquals(sampleCategorical(() => 0.2, weights), 1);
  assertEquals(sampleCategorical(() => 0.5, weights), 2);
  assertEquals(sampleCategorical(() => 0.999, weights), 2);
});

test('sampleCategorical() never picks a zero-weight index', () => {
  const rng = mulberry32(31337);
  for (let i = 0; i < 500; i++) {
    const index = sampleCategorical(rng, [0.5, 0, 0.5]);
    assert(index !== 1, 'Index 1 has zero weight');
  }
});

test('sampleCategorical() throws without a positive weight', () => {
  let threw = false;
  try {
    sampleCategorical(mulberry32(1), [0, 0, 0]);
  } catch (err) {
    threw = err instanceof RangeError;
  }
  assert(threw, 'Should throw RangeError');
});

test('randomInt() stays in [0, n)', () => {
  const rng = mulberry32(5);
  for (let i = 0; i < 200; i++) {
    const value = randomInt(rng, 6);
    assert(Number.isInteger(value) && value >= 0 && value < 6, `Out of range: ${value}`);
  }
});

// ============================================================================
// RESULTS
// ============================================================================

console.log('\n' + '═'.repeat(60));
console.log(`\n📊 Test Results: ${passCount}/${testCount} passed\n`);

if (failCount === 0) {
  console.log('🎉 All random utility tests passed!\n');
  process.exit(0);
} else {
  console.log(`❌ ${failCount} tests failed\n`);
  process.exit(1);
}
