/**
 * Error handling utilities and base classes.
 *
 * @module errors
 */

export {
	type ErrorCategory,
	isStructuredError,
	type SerializedStructuredError,
	StructuredError,
	toError,
} from './structured-error.ts'
