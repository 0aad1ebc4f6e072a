import { execa } from 'execa'
import { SetupError } from '../types/index.js'
import { logger } from '../utils/logger.js'

/** Accounts with this name are never offered, even though some distros give it uid 65534 */
export const RESERVED_ACCOUNT = 'nobody'
/** First uid handed out to regular human accounts on Debian/Ubuntu/Fedora style distros */
export const FIRST_REGULAR_UID = 1000

export const DEFAULT_USER_DISCOVERY_TIMEOUT_MS = 10_000

export interface WSLServiceOptions {
	/** Executable used to reach WSL (wsl on Windows, wsl.exe from inside WSL) */
	wslExecutable?: string
	userDiscoveryTimeoutMs?: number
}

export interface PasswdEntry {
	name: string
	uid: number
}

/**
 * Decode `wsl -l` output.
 *
 * Older wsl.exe builds write UTF-16LE regardless of the console, newer ones
 * write UTF-8 when WSL_UTF8=1 is set. NUL padding in the bytes gives UTF-16 away.
 */
export function decodeWslOutput(output: Uint8Array | string): string {
	if (typeof output === 'string') {
		return output.replace(/\0/g, '').replace(/^\uFEFF/, '')
	}

	const buffer = Buffer.from(output)
	const looksUtf16 = buffer.length >= 2 && buffer.includes(0)
	const text = looksUtf16 ? buffer.toString('utf16le') : buffer.toString('utf8')
	return text.replace(/\0/g, '').replace(/^\uFEFF/, '')
}

/**
 * Split command output into trimmed, non-empty lines
 */
export function splitLines(output: string): string[] {
	return output
		.split(/\r?\n/)
		.map(line => line.trim())
		.filter(line => line !== '')
}

/**
 * Parse /etc/passwd content. Lines without a numeric uid field are skipped.
 */
export function parsePasswd(content: string): PasswdEntry[] {
	const entries: PasswdEntry[] = []

	for (const line of splitLines(content)) {
		if (line.startsWith('#')) continue

		const [name, , uidField] = line.split(':')
		if (!name || uidField === undefined || !/^\d+$/.test(uidField)) continue

		entries.push({ name, uid: parseInt(uidField, 10) })
	}

	return entries
}

/**
 * Keep root and regular human accounts (uid 0 or uid >= 1000), never the
 * reserved placeholder account. Order follows the account database.
 */
export function filterLoginAccounts(entries: readonly PasswdEntry[]): string[] {
	return entries
		.filter(entry => (entry.uid === 0 || entry.uid >= FIRST_REGULAR_UID) && entry.name !== RESERVED_ACCOUNT)
		.map(entry => entry.name)
}

function errorCode(value: unknown): string | undefined {
	if (typeof value === 'object' && value !== null && 'code' in value && typeof value.code === 'string') {
		return value.code
	}
	return undefined
}

/**
 * WSLService - discovers distributions and the accounts inside them
 */
export class WSLService {
	private readonly wslExecutable: string
	private readonly userDiscoveryTimeoutMs: number

	constructor(options: WSLServiceOptions = {}) {
		this.wslExecutable = options.wslExecutable ?? 'wsl'
		this.userDiscoveryTimeoutMs = options.userDiscoveryTimeoutMs ?? DEFAULT_USER_DISCOVERY_TIMEOUT_MS
	}

	/**
	 * List installed distributions (`wsl -l -q`)
	 * @throws SetupError when wsl is missing or the listing fails
	 */
	async listDistributions(): Promise<string[]> {
		logger.debug(`Listing distributions: ${this.wslExecutable} -l -q`)

		try {
			const result = await execa(this.wslExecutable, ['-l', '-q'], {
				encoding: 'buffer',
				env: { WSL_UTF8: '1' },
				stdin: 'ignore',
			})
			const distros = splitLines(decodeWslOutput(result.stdout))
			logger.debug(`Found distributions: ${distros.join(', ') || '(none)'}`)
			return distros
		} catch (error) {
			if (errorCode(error) === 'ENOENT') {
				throw new SetupError(`\`${this.wslExecutable}\` command not found.`, [
					'Please ensure WSL is installed and in your PATH.',
				])
			}
			const message = error instanceof Error ? error.message : 'Unknown error'
			throw new SetupError(`Error getting WSL distributions: ${message}`, [
				`Please ensure WSL is installed and \`${this.wslExecutable} -l -q\` runs correctly in your terminal.`,
			])
		}
	}

	/**
	 * List accounts a command may run as inside the distribution.
	 *
	 * Whatever could be parsed is returned even when the distribution also
	 * wrote warnings to stderr. An empty list means nothing usable was found.
	 * @throws SetupError on timeout or when wsl is missing
	 */
	async listUsers(distro: string): Promise<string[]> {
		logger.info(`Detecting users in ${distro}...`)

		const result = await execa(this.wslExecutable, ['-d', distro, '--exec', 'cat', '/etc/passwd'], {
			timeout: this.userDiscoveryTimeoutMs,
			stdin: 'ignore',
			reject: false,
		})

		if (result.timedOut) {
			const seconds = Math.round(this.userDiscoveryTimeoutMs / 1000)
			throw new SetupError(`The command to detect users in ${distro} timed out (${seconds}s).`, [
				'This may be an issue with WSL. Try restarting WSL (`wsl --shutdown`) or your computer.',
			])
		}

		if (result.failed && errorCode(result) === 'ENOENT') {
			throw new SetupError(`\`${this.wslExecutable}\` command not found.`, [
				'Please ensure WSL is installed and in your PATH.',
			])
		}

		const stderr = decodeWslOutput(result.stderr).trim()
		if (stderr) {
			logger.warn(`Warning detecting users: ${stderr}`)
		}

		const users = filterLoginAccounts(parsePasswd(result.stdout))

		if (users.length === 0 && stderr) {
			logger.error(`Could not detect users. Raw error: ${stderr}`)
			return []
		}

		logger.debug(`Found users in ${distro}: ${users.join(', ') || '(none)'}`)
		return users
	}
}
