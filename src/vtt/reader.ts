/**
 * Cursor over an in-memory string, used by the WebVTT grammar.
 *
 * Every `read*` method either consumes input and returns a value, or returns
 * `undefined`/`false`. A failed read may leave the cursor part-way through
 * its token; callers that need to backtrack take a {@link TextReader.mark}
 * first and {@link TextReader.reset} to it.
 *
 * @module vtt/reader
 */

const ASCII_DIGIT = /^[0-9]$/

export class TextReader {
	private position = 0

	constructor(private readonly input: string) {}

	/** True once every character has been consumed. */
	get atEnd(): boolean {
		return this.position >= this.input.length
	}

	mark(): number {
		return this.position
	}

	reset(mark: number): void {
		this.position = mark
	}

	/**
	 * Consume `expected` if the input continues with it.
	 */
	readLiteral(expected: string): boolean {
		if (!this.input.startsWith(expected, this.position)) {
			return false
		}
		this.position += expected.length
		return true
	}

	/**
	 * Consume exactly `count` ASCII digits.
	 */
	readDigits(count: number): string | undefined {
		const digits = this.input.slice(this.position, this.position + count)
		if (digits.length !== count || ![...digits].every(isAsciiDigit)) {
			return undefined
		}
		this.position += count
		return digits
	}

	/**
	 * Consume the longest non-empty run of characters matching `predicate`.
	 */
	readWhile(predicate: (char: string) => boolean): string | undefined {
		let end = this.position
		while (end < this.input.length && predicate(this.input.charAt(end))) {
			end++
		}
		if (end === this.position) {
			return undefined
		}
		const run = this.input.slice(this.position, end)
		this.position = end
		return run
	}
}

export function isAsciiDigit(char: string): boolean {
	return ASCII_DIGIT.test(char)
}
