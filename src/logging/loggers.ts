import { getLogger, type Logger } from '@logtape/logtape'
import { ENGINE_CATEGORY, type EngineSubsystem } from './config.js'

/**
 * Logger for one engine subsystem (`['slo-engine', subsystem]`).
 *
 * Records are dropped until {@link createEngineLogger}'s `initLogger()` (or
 * the host application) configures LogTape.
 */
export function getEngineLogger(subsystem: EngineSubsystem): Logger {
	return getLogger([ENGINE_CATEGORY, subsystem])
}
