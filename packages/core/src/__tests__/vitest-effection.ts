/**
 * Vitest + Effection integration.
 *
 * Lets tests be written as generator functions:
 *
 * ```typescript
 * import { describe, it, expect } from '../../__tests__/vitest-effection.ts'
 *
 * describe('range', () => {
 *   it('yields every value', function* () {
 *     expect(yield* collect(Dataset.range(3))).toEqual([0, 1, 2])
 *   })
 * })
 * ```
 *
 * Each test runs in its own top-level scope after every `beforeEach` of the
 * enclosing describe blocks, so resources opened by a test are torn down
 * before the next one starts.
 */
import {
  describe as $describe,
  it as $it,
  beforeAll as $beforeAll,
  afterAll as $afterAll,
  afterEach as $afterEach,
  expect,
} from 'vitest'
import { run } from 'effection'
import type { Operation } from 'effection'

export { expect }

export type TestOperation = () => Operation<void>

interface Suite {
  name: string
  parent: Suite | undefined
  beforeEachOps: TestOperation[]
}

const suites: Suite[] = []

function currentSuite(): Suite | undefined {
  return suites[suites.length - 1]
}

function* runWithSetup(suite: Suite | undefined, op: TestOperation): Operation<void> {
  const setup: TestOperation[] = []
  for (let current = suite; current; current = current.parent) {
    setup.unshift(...current.beforeEachOps)
  }
  for (const step of setup) {
    yield* step()
  }
  yield* op()
}

function defineSuite(
  register: (name: string, body: () => void) => void,
  name: string,
  fn: () => void,
): void {
  const suite: Suite = { name, parent: currentSuite(), beforeEachOps: [] }
  register(name, () => {
    suites.push(suite)
    try {
      fn()
    } finally {
      suites.pop()
    }
  })
}

// =============================================================================
// SUITES
// =============================================================================

export function describe(name: string, fn: () => void): void {
  defineSuite($describe, name, fn)
}

describe.only = function (name: string, fn: () => void): void {
  defineSuite($describe.only, name, fn)
}

describe.skip = function (name: string, fn: () => void): void {
  $describe.skip(name, fn)
}

// =============================================================================
// TESTS
// =============================================================================

export function it(desc: string, op?: TestOperation): void {
  if (!op) {
    $it.todo(desc)
    return
  }
  const suite = currentSuite()
  $it(desc, () => run(() => runWithSetup(suite, op)))
}

it.only = function (desc: string, op: TestOperation): void {
  const suite = currentSuite()
  $it.only(desc, () => run(() => runWithSetup(suite, op)))
}

it.skip = function (desc: string, _op?: TestOperation): void {
  $it.skip(desc)
}

// =============================================================================
// HOOKS
// =============================================================================

/**
 * Runs before each test of the enclosing suite, inside the test's scope, so
 * contexts it sets are visible to the test body.
 */
export function beforeEach(op: TestOperation): void {
  const suite = currentSuite()
  if (suite) {
    suite.beforeEachOps.push(op)
  } else {
    throw new Error('beforeEach() must be called inside describe()')
  }
}

export function beforeAll(op: TestOperation): void {
  $beforeAll(() => run(op))
}

export function afterAll(fn: () => void | Promise<void>): void {
  $afterAll(fn)
}

export function afterEach(fn: () => void | Promise<void>): void {
  $afterEach(fn)
}
