/**
 * Validation utilities.
 *
 * @module validation
 */

export {
	addNatural,
	isNatural,
	multiplyNatural,
	type Natural,
	parseNatural,
	toNatural,
} from './natural.ts'
