/**
 * The `vtt-transcript` command.
 *
 * ```
 * vtt-transcript render <file.vtt> [--format text|json|html]
 * vtt-transcript captions <file.vtt>
 * ```
 *
 * @module cli/run
 */

import type { Logger } from '@logtape/logtape'
import { isStructuredError, StructuredError, toError } from '../errors/index.ts'
import { type AppLogger, createAppLogger } from '../logging/index.ts'
import {
	type Caption,
	formatTimestamp,
	isVttFile,
	parseVttOrThrow,
	renderTranscript,
	renderTranscriptHtml,
} from '../vtt/index.ts'
import { formatError, parseArgs } from './index.ts'
import { type CliOptions, parseCliOptions } from './options.ts'

export const APP_NAME = 'vtt-transcript'

export const USAGE = `Usage: ${APP_NAME} <command> <file.vtt> [options]

Commands:
  render     Print the transcript, one line per speaker turn
  captions   Print the parsed captions as JSON
  help       Show this message

Options:
  --format text|json|html   Output format for render (default: text)
  --log-dir <dir>           Directory for the log file
  --log-level <level>       debug, info, warning or error (default: info)
`

const COMMANDS = ['render', 'captions'] as const

type Command = (typeof COMMANDS)[number]

/**
 * Everything the CLI touches outside the process.
 */
export interface CliIo {
	readFile: (path: string) => Promise<string>
	stdout: (text: string) => void
	stderr: (text: string) => void
}

export interface CliDependencies {
	io: CliIo
	createLogger?: (options: CliOptions) => AppLogger<'cli'>
}

function isCommand(value: string): value is Command {
	return COMMANDS.some((command) => command === value)
}

function usageError(message: string): StructuredError {
	return new StructuredError(message, 'CONFIGURATION', 'INVALID_OPTIONS', false)
}

function defaultLogger(options: CliOptions): AppLogger<'cli'> {
	return createAppLogger({
		name: APP_NAME,
		subsystems: ['cli'],
		logDir: options.logDir,
		lowestLevel: options.logLevel,
	})
}

async function readCaptionFile(io: CliIo, file: string): Promise<string> {
	try {
		return await io.readFile(file)
	} catch (error: unknown) {
		throw new StructuredError(
			`Could not read ${file}`,
			'NOT_FOUND',
			'FILE_READ_FAILED',
			false,
			{ file },
			toError(error),
		)
	}
}

function serializeCaption(caption: Caption) {
	return {
		identifier: caption.identifier,
		start: formatTimestamp(caption.start),
		end: formatTimestamp(caption.end),
		payload: caption.payload,
	}
}

function renderOutput(captions: readonly Caption[], file: string, options: CliOptions): string {
	const lines = renderTranscript(captions)
	switch (options.format) {
		case 'json':
			return `${JSON.stringify({ file, lines }, null, 2)}\n`
		case 'html':
			return lines.length > 0 ? `${renderTranscriptHtml(lines)}\n` : ''
		case 'text':
			return lines.map((line) => `${line}\n`).join('')
	}
}

async function executeCommand(
	command: Command,
	file: string,
	options: CliOptions,
	io: CliIo,
	logger: Logger,
): Promise<void> {
	if (!isVttFile(file)) {
		logger.warn('Input does not have a .vtt extension', { file })
	}

	const content = await readCaptionFile(io, file)
	logger.debug('Read caption file', { file, length: content.length })

	const captions = parseVttOrThrow(content)
	logger.debug('Parsed captions', { file, captions: captions.length })

	if (command === 'captions') {
		io.stdout(`${JSON.stringify(captions.map(serializeCaption), null, 2)}\n`)
		return
	}

	io.stdout(renderOutput(captions, file, options))
}

interface Invocation {
	command: Command
	file: string
	options: CliOptions
}

function parseInvocation(argv: readonly string[]): Invocation {
	const { command, subcommand: file, positional, flags } = parseArgs(argv)
	const options = parseCliOptions(flags)

	if (!isCommand(command)) {
		throw usageError(command ? `Unknown command: ${command}` : 'Missing command')
	}
	if (file === undefined || positional.length > 0) {
		throw usageError(`${command} expects exactly one file`)
	}
	return { command, file, options }
}

/**
 * Run the CLI.
 *
 * @param argv - Arguments after the executable and script
 * @returns Process exit code
 */
export async function runCli(argv: readonly string[], deps: CliDependencies): Promise<number> {
	const { io, createLogger = defaultLogger } = deps

	if (argv[0] === 'help' || argv.includes('--help')) {
		io.stdout(USAGE)
		return 0
	}

	let invocation: Invocation
	try {
		invocation = parseInvocation(argv)
	} catch (error: unknown) {
		if (!isStructuredError(error)) throw error
		io.stderr(`${formatError('text', error)}\n\n${USAGE}`)
		return 1
	}

	const { command, file, options } = invocation
	const appLogger = createLogger(options)
	try {
		await appLogger.initLogger()
	} catch (error: unknown) {
		const failure = new StructuredError(
			`Could not initialize logging in ${appLogger.logDir}`,
			'CONFIGURATION',
			'LOG_INIT_FAILED',
			false,
			{ logDir: appLogger.logDir },
			toError(error),
		)
		io.stderr(`${formatError(options.format === 'json' ? 'json' : 'text', failure)}\n`)
		return 1
	}

	const logger = appLogger.getSubsystemLogger('cli')
	const cid = appLogger.createCorrelationId()

	try {
		logger.info('Command started', { cid, command, file, format: options.format })
		await executeCommand(command, file, options, io, logger.with({ cid }))
		logger.info('Command finished', { cid, command, file })
		return 0
	} catch (error: unknown) {
		const structured = isStructuredError(error)
			? error
			: new StructuredError('Unexpected failure', 'INTERNAL', 'UNEXPECTED', false, {}, toError(error))

		logger.error('Command failed', { cid, command, file, error: structured.toJSON() })
		const report = formatError(options.format === 'json' ? 'json' : 'text', {
			message: `${file}: ${structured.message}`,
			code: structured.code,
			context: structured.context,
		})
		io.stderr(`${report}\n`)
		return 1
	} finally {
		await appLogger.closeLogger()
	}
}
