/**
 * Plain-data input validation helpers.
 *
 * @module validation
 */

export {
	camelCase,
	camelizeKeys,
	formatZodIssues,
	isPlainObject,
	parseOrThrow,
} from './input.js'
