import { join } from 'node:path'
import { describe, expect, test } from 'vitest'
import { ENGINE_SUBSYSTEMS } from './config.js'
import { createEngineLogger, DEFAULT_LOG_DIR } from './factory.js'
import { getEngineLogger } from './loggers.js'

describe('createEngineLogger', () => {
	test('defaults to the engine category and home log directory', () => {
		const logger = createEngineLogger()

		expect(logger.logDir).toBe(DEFAULT_LOG_DIR)
		expect(logger.logFile).toBe(join(DEFAULT_LOG_DIR, 'slo-engine.jsonl'))
		expect(logger.rootLogger.category).toEqual(['slo-engine'])
	})

	test('pre-creates a logger per engine subsystem', () => {
		const logger = createEngineLogger()

		expect(Object.keys(logger.subsystemLoggers)).toEqual([...ENGINE_SUBSYSTEMS])
		expect(logger.subsystemLoggers.gates?.category).toEqual([
			'slo-engine',
			'gates',
		])
	})

	test('honours custom directory and file name', () => {
		const logger = createEngineLogger({
			subsystems: ['drift'],
			logDir: '/var/log/reliability',
			logFileName: 'drift-run',
		})

		expect(logger.logFile).toBe(join('/var/log/reliability', 'drift-run.jsonl'))
		expect(Object.keys(logger.subsystemLoggers)).toEqual(['drift'])
		expect(logger.getSubsystemLogger('extra').category).toEqual([
			'slo-engine',
			'extra',
		])
	})

	test('subsystem loggers share the category library modules log under', () => {
		const logger = createEngineLogger({ logFileName: 'nightly-report' })

		expect(logger.rootLogger.category).toEqual(['slo-engine'])
		expect(logger.getSubsystemLogger('pipeline').category).toEqual(
			getEngineLogger('pipeline').category,
		)
	})

	test('creates unique 8-character hex correlation IDs', () => {
		const logger = createEngineLogger()
		const ids = new Set<string>()
		for (let i = 0; i < 50; i++) {
			const cid = logger.createCorrelationId()
			expect(cid).toMatch(/^[a-f0-9]{8}$/)
			ids.add(cid)
		}
		expect(ids.size).toBe(50)
	})
})

describe('getEngineLogger', () => {
	test('places subsystem loggers under the engine category', () => {
		expect(getEngineLogger('correlation').category).toEqual([
			'slo-engine',
			'correlation',
		])
	})
})
