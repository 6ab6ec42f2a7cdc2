import { describe, expect, test } from 'vitest'
import { StructuredError } from '../errors/index.ts'
import { CliOptionsSchema, parseCliOptions } from './options.ts'

describe('CliOptionsSchema', () => {
	test('applies defaults', () => {
		expect(CliOptionsSchema.parse({})).toEqual({ format: 'text', logLevel: 'info' })
	})
})

describe('parseCliOptions', () => {
	test('returns defaults for no flags', () => {
		expect(parseCliOptions({})).toEqual({ format: 'text', logLevel: 'info' })
	})

	test('maps kebab-case flags to options', () => {
		expect(
			parseCliOptions({ format: 'html', 'log-dir': '/tmp/logs', 'log-level': 'debug' }),
		).toEqual({ format: 'html', logDir: '/tmp/logs', logLevel: 'debug' })
	})

	test('uses the first value of duplicate flags', () => {
		expect(parseCliOptions({ format: ['json', 'text'] }).format).toBe('json')
	})

	test('rejects unknown flags', () => {
		expect(() => parseCliOptions({ verbose: true })).toThrow('Unknown option --verbose')
	})

	test('rejects an unsupported format', () => {
		expect(() => parseCliOptions({ format: 'xml' })).toThrow('Invalid option --format: ')
	})

	test('rejects a flag given without a value', () => {
		expect(() => parseCliOptions({ 'log-level': true })).toThrow('Invalid option --log-level: ')
	})

	test('rejects an empty log directory', () => {
		try {
			parseCliOptions({ 'log-dir': '' })
			expect.unreachable()
		} catch (error) {
			expect(error).toBeInstanceOf(StructuredError)
			expect(error).toMatchObject({
				code: 'INVALID_OPTIONS',
				category: 'CONFIGURATION',
				context: { flag: 'log-dir' },
			})
		}
	})
})
