/**
 * General utilities.
 *
 * @module utils
 */

export {
	isNonEmptyArray,
	type NonEmptyArray,
	nonEmptyArray,
	toNonEmptyArray,
} from './non-empty.ts'
export { splitWords } from './string.ts'
