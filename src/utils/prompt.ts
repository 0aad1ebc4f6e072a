import * as readline from 'node:readline'
import { logger } from './logger.js'
import { UserCancelledError } from '../types/index.js'

/** Longest delay a Node.js timer can wait, in whole seconds */
export const MAX_DELAY_SECONDS = Math.floor(2 ** 31 / 1000)

export interface PromptStreams {
	input?: NodeJS.ReadableStream
	output?: NodeJS.WritableStream
	/** Force terminal mode on or off (default: detected from the output stream) */
	terminal?: boolean
}

interface PendingAnswer {
	resolve: (answer: string) => void
	reject: (error: Error) => void
}

/**
 * One readline interface shared by every prompt of a run.
 *
 * Lines that arrive before they are asked for (piped or pasted answers) are
 * queued rather than dropped. Ctrl+C during a question and end of input
 * both reject the pending question with UserCancelledError; questions asked
 * after end of input are answered from the queue until it runs dry.
 */
class PromptSession {
	private readonly rl: readline.Interface
	private readonly lines: string[] = []
	private pending: PendingAnswer | undefined
	private ended = false

	constructor(
		input: NodeJS.ReadableStream,
		private readonly output: NodeJS.WritableStream,
		terminal?: boolean
	) {
		this.rl = readline.createInterface({
			input,
			output,
			...(terminal !== undefined ? { terminal } : {}),
		})
		this.rl.on('line', (line) => this.receive(line))
		this.rl.on('close', () => this.end())
		this.rl.on('SIGINT', () => this.interrupt())
	}

	ask(message: string): Promise<string> {
		if (this.ended) {
			this.output.write(message)
		} else {
			this.rl.setPrompt(message)
			this.rl.prompt()
		}

		const queued = this.lines.shift()
		if (queued !== undefined) {
			return Promise.resolve(queued)
		}

		if (this.ended) {
			this.output.write('\n')
			return Promise.reject(new UserCancelledError())
		}

		return new Promise<string>((resolve, reject) => {
			this.pending = { resolve, reject }
		})
	}

	write(text: string): void {
		this.output.write(text)
	}

	close(): void {
		this.rl.close()
	}

	private receive(line: string): void {
		const pending = this.pending
		if (pending) {
			this.pending = undefined
			pending.resolve(line)
			return
		}
		this.lines.push(line)
	}

	private end(): void {
		this.ended = true
		const pending = this.pending
		if (pending) {
			this.pending = undefined
			this.output.write('\n')
			pending.reject(new UserCancelledError())
		}
	}

	private interrupt(): void {
		if (this.pending) {
			this.rl.close()
			return
		}
		// Ctrl+C between questions (e.g. while waiting between launches)
		if (process.listenerCount('SIGINT') > 0) {
			process.emit('SIGINT', 'SIGINT')
		} else {
			this.rl.close()
		}
	}
}

let activeSession: PromptSession | undefined

/**
 * Start a prompt session on the given streams (default: stdin/stdout).
 * Any session already open is closed first.
 */
export function openPrompts(streams: PromptStreams = {}): void {
	closePrompts()
	activeSession = new PromptSession(
		streams.input ?? process.stdin,
		streams.output ?? process.stdout,
		streams.terminal
	)
}

/**
 * Close the shared session so stdin no longer holds the process open
 */
export function closePrompts(): void {
	activeSession?.close()
	activeSession = undefined
}

function session(): PromptSession {
	if (!activeSession) {
		openPrompts()
	}
	if (!activeSession) {
		throw new Error('Prompt session could not be opened')
	}
	return activeSession
}

function ask(message: string): Promise<string> {
	return session().ask(message)
}

/**
 * Prompt user for confirmation (yes/no)
 * @param message The question to ask the user
 * @param defaultValue Default value if user just presses enter (default: false)
 */
export async function promptConfirmation(
	message: string,
	defaultValue = false
): Promise<boolean> {
	const suffix = defaultValue ? '[Y/n]' : '[y/N]'
	const fullMessage = `${message} ${suffix}: `

	while (true) {
		const answer = await ask(fullMessage)
		const normalized = answer.trim().toLowerCase()

		if (normalized === '') {
			return defaultValue
		}

		if (normalized === 'y' || normalized === 'yes') {
			return true
		}

		if (normalized === 'n' || normalized === 'no') {
			return false
		}

		logger.warn('Invalid input. Please enter y/yes or n/no.')
	}
}

/**
 * Prompt user for text input
 * @param message The prompt message
 * @param defaultValue Returned when the answer is blank
 */
export async function promptInput(
	message: string,
	defaultValue?: string
): Promise<string> {
	const suffix = defaultValue ? ` (default: ${defaultValue})` : ''
	const answer = await ask(`${message}${suffix}: `)
	const trimmed = answer.trim()

	if (trimmed === '' && defaultValue !== undefined) {
		return defaultValue
	}

	return trimmed
}

/**
 * Parse a whole decimal integer, rejecting partial matches like "3s" or "1.5"
 */
export function parseInteger(value: string): number | null {
	const trimmed = value.trim()
	if (!/^[+-]?\d+$/.test(trimmed)) {
		return null
	}
	return parseInt(trimmed, 10)
}

/**
 * Prompt for a non-negative integer no larger than MAX_DELAY_SECONDS,
 * re-prompting until one is given
 * @param defaultValue Returned when the answer is blank
 */
export async function promptNonNegativeInteger(
	message: string,
	defaultValue: number
): Promise<number> {
	while (true) {
		const answer = (await ask(`${message} (default: ${defaultValue}): `)).trim()

		if (answer === '') {
			return defaultValue
		}

		const value = parseInteger(answer)
		if (value === null) {
			logger.warn('Invalid input. Please enter a number.')
			continue
		}

		if (value < 0) {
			logger.warn('Delay must be non-negative.')
			continue
		}

		if (value > MAX_DELAY_SECONDS) {
			logger.warn(`Delay must be at most ${MAX_DELAY_SECONDS} seconds.`)
			continue
		}

		return value
	}
}

/**
 * Print a numbered list and ask for a 1-based index until a valid one is given.
 * @param heading Printed above the list
 * @param noun What is being chosen, used in the question ("distribution", "user")
 * @returns The chosen item
 */
export async function promptSelection<T extends string>(
	heading: string,
	noun: string,
	items: readonly T[]
): Promise<T> {
	if (items.length === 0) {
		throw new Error(`Nothing to select: no ${noun} available`)
	}

	const prompts = session()
	prompts.write(`\n${heading}\n`)
	items.forEach((item, index) => {
		prompts.write(`[${index + 1}] ${item}\n`)
	})

	while (true) {
		const answer = await ask(`\nEnter the number of the ${noun} (1-${items.length}): `)
		const selection = parseInteger(answer)

		if (selection === null) {
			logger.warn('Invalid input. Please enter a number.')
			continue
		}

		const item = items[selection - 1]
		if (selection < 1 || item === undefined) {
			logger.warn(`Invalid selection. Please enter a number between 1 and ${items.length}.`)
			continue
		}

		return item
	}
}
