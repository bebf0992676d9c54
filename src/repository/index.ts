/**
 * Collaborator interfaces (repository, time-series source, dependency graph,
 * budget history) and their in-memory implementations.
 *
 * @module repository
 */

export {
	InMemoryDependencyGraph,
	InMemorySloRepository,
	type InMemorySloRepositoryOptions,
} from './in-memory.js'
export type {
	BudgetHistorySource,
	DependencyEdge,
	DependencyGraphView,
	SloRepository,
	TimeSeriesPoint,
	TimeSeriesSource,
	TransitiveEdge,
} from './types.js'
