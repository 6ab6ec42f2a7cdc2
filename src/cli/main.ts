#!/usr/bin/env -S node --import tsx
/**
 * Executable entry point for `vtt-transcript`.
 */

import { readFile } from 'node:fs/promises'
import { type CliIo, runCli } from './run.ts'

const io: CliIo = {
	readFile: (path) => readFile(path, 'utf8'),
	stdout: (text) => {
		process.stdout.write(text)
	},
	stderr: (text) => {
		process.stderr.write(text)
	},
}

process.exitCode = await runCli(process.argv.slice(2), { io })
