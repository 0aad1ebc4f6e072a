import fs from 'fs-extra'
import path from 'path'
import { SetupError } from '../types/index.js'
import { logger } from './logger.js'

export const DEFAULT_COMMAND_FILE = 'commands.txt'

const COMMENT_MARKER = '#'

/**
 * Extract the commands from the text of a command file.
 *
 * One command per line. Lines that are blank after trimming, or whose first
 * non-space character is `#`, are skipped. File order is kept; the remaining
 * lines are trimmed and otherwise passed through untouched.
 */
export function parseCommandLines(content: string): string[] {
	return content
		.replace(/^\uFEFF/, '')
		.split(/\r?\n/)
		.map(line => line.trim())
		.filter(line => line !== '' && !line.startsWith(COMMENT_MARKER))
}

/**
 * Read a command file from disk
 * @throws SetupError when the file is missing or unreadable
 */
export async function readCommandFile(filePath: string): Promise<string[]> {
	const resolved = path.resolve(filePath)
	logger.debug(`Reading commands from ${resolved}`)

	let content: string
	try {
		content = await fs.readFile(resolved, 'utf8')
	} catch (error) {
		if ((error as { code?: string }).code === 'ENOENT') {
			throw new SetupError(`File '${filePath}' not found.`, [
				'Please make sure the file exists, or pass its path as the first argument.',
			])
		}
		const message = error instanceof Error ? error.message : 'Unknown error'
		throw new SetupError(`Error reading file: ${message}`)
	}

	const commands = parseCommandLines(content)
	logger.debug(`Parsed ${commands.length} command(s) from ${resolved}`)
	return commands
}
