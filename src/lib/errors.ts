/** Typed errors raised by the snapshot engine. */

export type EngineErrorCode =
	| 'VALIDATION_ERROR'
	| 'EMPTY_RANGE'
	| 'INSUFFICIENT_DATA'

/** Base class for every error the engine raises on purpose. */
export class EngineError extends Error {
	code: EngineErrorCode
	suggestion: string | null

	constructor(
		message: string,
		code: EngineErrorCode,
		suggestion: string | null = null,
	) {
		super(message)
		this.name = 'EngineError'
		this.code = code
		this.suggestion = suggestion
	}

	/** Plain object for JSON output. */
	toDict(): Record<string, string> {
		const d: Record<string, string> = { code: this.code, message: this.message }
		if (this.suggestion) d.suggestion = this.suggestion
		return d
	}
}

/** Malformed snapshot, duplicate tick, bad parameter or inverted thresholds. */
export class ValidationError extends EngineError {
	field: string | null

	constructor(
		message: string,
		options: { field?: string; suggestion?: string } = {},
	) {
		super(message, 'VALIDATION_ERROR', options.suggestion ?? null)
		this.name = 'ValidationError'
		this.field = options.field ?? null
	}
}

/** Date range whose start falls after its end. */
export class EmptyRangeError extends EngineError {
	start: string
	end: string

	constructor(start: string, end: string) {
		super(
			`Start date ${start} is later than end date ${end}`,
			'EMPTY_RANGE',
			'Swap the dates or widen the range.',
		)
		this.name = 'EmptyRangeError'
		this.start = start
		this.end = end
	}
}

/**
 * Nothing to analyze in the requested window.
 * An expected outcome for sparse topics, not a fault.
 */
export class InsufficientDataError extends EngineError {
	constructor(message: string, suggestion: string | null = null) {
		super(message, 'INSUFFICIENT_DATA', suggestion)
		this.name = 'InsufficientDataError'
	}
}

/** A capture tick the store could not read and skipped. */
export class PartialReadWarning {
	date: string
	file: string
	reason: string

	constructor(date: string, file: string, reason: string) {
		this.date = date
		this.file = file
		this.reason = reason
	}

	toString(): string {
		return `${this.date}/${this.file}: ${this.reason}`
	}
}

/** Narrow an unknown thrown value to an error message. */
export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err)
}
