/**
 * Test helpers: temp directories and fixture builders.
 *
 * @example
 * ```ts
 * import { buildBudget, createTempDir } from '../testing/index.js'
 *
 * const dir = createTempDir('secrets-')
 * const budget = buildBudget({ burnedMinutes: 30 })
 * ```
 */

export { cleanupTestDir, createTempDir, readTestFile, writeTestFile } from './fs.js'
export {
	type BudgetOverrides,
	buildBudget,
	buildSlo,
	FIXED_NOW,
	fixedClock,
	minutesAfter,
} from './fixtures.js'
