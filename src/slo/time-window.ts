/**
 * Duration parsing and window start derivation.
 */

import { ValidationError } from '../errors/index.js'
import type { TimeWindow } from './types.js'

export type DurationUnit = 'm' | 'h' | 'd' | 'w'

export interface ParsedDuration {
	value: number
	unit: DurationUnit
	minutes: number
}

const DURATION_PATTERN = /^(\d+)([mhdw])$/

const UNIT_MINUTES: Record<DurationUnit, number> = {
	m: 1,
	h: 60,
	d: 1440,
	w: 10_080,
}

function isDurationUnit(value: string): value is DurationUnit {
	return value in UNIT_MINUTES
}

/**
 * Parse `30d`, `4w`, `12h` or `90m`.
 *
 * @throws {ValidationError} For any other shape or a zero duration
 */
export function parseDuration(text: string): ParsedDuration {
	const match = DURATION_PATTERN.exec(text.trim())
	const digits = match?.[1]
	const unit = match?.[2]
	if (digits === undefined || unit === undefined || !isDurationUnit(unit)) {
		throw new ValidationError(
			`Invalid duration "${text}": expected <number><m|h|d|w>`,
			{ duration: text },
		)
	}
	const value = Number.parseInt(digits, 10)
	if (value === 0) {
		throw new ValidationError(`Duration "${text}" must be positive`, {
			duration: text,
		})
	}
	return { value, unit, minutes: value * UNIT_MINUTES[unit] }
}

export function durationMinutes(text: string): number {
	return parseDuration(text).minutes
}

/**
 * Start of the window ending at `end`.
 *
 * Rolling windows reach back exactly one duration. Calendar windows snap to
 * UTC boundaries: weeks start Monday 00:00, windows of 28 days or more start
 * on the 1st of the month, other day windows at midnight, hour windows on the
 * hour. Minute windows have no calendar form and are treated as rolling.
 */
export function getStartTime(window: TimeWindow, end: Date): Date {
	const { value, unit, minutes } = parseDuration(window.duration)
	if (window.type === 'rolling' || unit === 'm') {
		return new Date(end.getTime() - minutes * 60_000)
	}

	const year = end.getUTCFullYear()
	const month = end.getUTCMonth()
	const day = end.getUTCDate()

	switch (unit) {
		case 'w': {
			const sinceMonday = (end.getUTCDay() + 6) % 7
			return new Date(Date.UTC(year, month, day - sinceMonday - 7 * (value - 1)))
		}
		case 'd':
			if (value >= 28) return new Date(Date.UTC(year, month, 1))
			return new Date(Date.UTC(year, month, day - (value - 1)))
		case 'h':
			return new Date(
				Date.UTC(year, month, day, end.getUTCHours() - (value - 1)),
			)
	}
}
