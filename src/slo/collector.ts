import { ProviderQueryError, toError, ValidationError } from '../errors/index.js'
import { getEngineLogger } from '../logging/index.js'
import type { TimeSeriesSource } from '../repository/types.js'
import type { Measurement, Period, SLO } from './types.js'

const logger = getEngineLogger('budget')

/**
 * Fetch SLI samples for an SLO from the time-series collaborator.
 *
 * Each point stands for `stepSeconds`.
 *
 * @throws {ValidationError} When the SLO has no query
 * @throws {ProviderQueryError} When the source fails
 */
export async function collectMeasurements(
	source: TimeSeriesSource,
	slo: SLO,
	period: Period,
	stepSeconds = 300,
): Promise<Measurement[]> {
	if (!slo.query) {
		throw new ValidationError(`SLO ${slo.id} has no query to collect`, {
			sloId: slo.id,
		})
	}

	let points: Awaited<ReturnType<TimeSeriesSource['getSliTimeSeries']>>
	try {
		points = await source.getSliTimeSeries(
			slo.query,
			period.start,
			period.end,
			stepSeconds,
		)
	} catch (error: unknown) {
		throw new ProviderQueryError(
			`SLI query failed for ${slo.id}`,
			{ sloId: slo.id, operation: 'getSliTimeSeries' },
			toError(error),
		)
	}

	logger.debug('SLI samples collected', { sloId: slo.id, points: points.length })

	return points.map((point) => ({
		timestamp: point.timestamp,
		sliValue: point.value,
		durationSeconds: stepSeconds,
	}))
}
