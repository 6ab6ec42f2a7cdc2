/**
 * Structured errors for the caption pipeline.
 *
 * Every error the library or the CLI raises carries:
 * - a machine-readable `code` (e.g. "VTT_PARSE_FAILED")
 * - a coarse `category` for routing
 * - a recoverability hint
 * - context metadata and an optional `cause`
 *
 * @module errors/structured-error
 */

/**
 * Error categories used across the repository.
 */
export type ErrorCategory =
	| 'NOT_FOUND' // File or resource doesn't exist / can't be read
	| 'VALIDATION' // Input failed a grammar or invariant check
	| 'CONFIGURATION' // Invalid CLI options
	| 'INTERNAL' // Unexpected failure

/**
 * Shape returned by {@link StructuredError.toJSON}.
 */
export interface SerializedStructuredError {
	name: string
	message: string
	category: ErrorCategory
	code: string
	recoverable: boolean
	context: Record<string, unknown>
	stack?: string
	cause?: {
		name: string
		message: string
		stack?: string
	}
}

/**
 * Error with a category, a code, a recoverability hint and context.
 *
 * Subclass it for domain errors:
 *
 * @example
 * ```typescript
 * class VttParseError extends StructuredError {
 *   constructor(context: Record<string, unknown>) {
 *     super("Document is not a supported WebVTT file", "VALIDATION", "VTT_PARSE_FAILED", false, context);
 *     this.name = "VttParseError";
 *   }
 * }
 * ```
 */
export class StructuredError extends Error {
	/**
	 * High-level error category for classification.
	 */
	public readonly category: ErrorCategory

	/**
	 * Machine-readable error code (e.g., "NATURAL_OVERFLOW", "FILE_READ_FAILED").
	 */
	public readonly code: string

	/**
	 * Whether retrying the same operation could succeed.
	 */
	public readonly recoverable: boolean

	/**
	 * Arbitrary context metadata for debugging.
	 */
	public readonly context: Record<string, unknown>

	/**
	 * Original error that caused this error (for error chaining).
	 */
	public override readonly cause?: Error

	constructor(
		message: string,
		category: ErrorCategory,
		code: string,
		recoverable: boolean,
		context: Record<string, unknown> = {},
		cause?: Error,
	) {
		super(message)
		this.name = 'StructuredError'
		this.category = category
		this.code = code
		this.recoverable = recoverable
		this.context = context
		this.cause = cause

		// Capture stack trace for V8 engines
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, StructuredError)
		}
	}

	/**
	 * Serialize error to JSON for logging or CLI output.
	 *
	 * @returns Plain object with all error properties
	 */
	toJSON(): SerializedStructuredError {
		return {
			name: this.name,
			message: this.message,
			category: this.category,
			code: this.code,
			recoverable: this.recoverable,
			context: this.context,
			stack: this.stack,
			cause: this.cause
				? {
						name: this.cause.name,
						message: this.cause.message,
						stack: this.cause.stack,
					}
				: undefined,
		}
	}
}

/**
 * Type guard to check if an error is a StructuredError.
 *
 * @param error - Value to check
 * @returns True if error is a StructuredError instance
 */
export function isStructuredError(error: unknown): error is StructuredError {
	return error instanceof StructuredError
}

/**
 * Normalize any thrown value into an Error for use as a `cause`.
 */
export function toError(value: unknown): Error {
	return value instanceof Error ? value : new Error(String(value))
}
