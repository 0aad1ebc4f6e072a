import { readFileSync } from 'node:fs'

/**
 * Host environment types.
 * 'win32' = native Windows, 'wsl' = inside a WSL distribution, 'darwin' = macOS, 'linux' = native Linux
 */
export type TerminalEnvironment = 'darwin' | 'wsl' | 'linux' | 'win32' | 'unsupported'

export interface HostExecutables {
	wsl: string
	terminal: string
}

let cachedIsWSL: boolean | undefined

/**
 * Detect if running inside Windows Subsystem for Linux.
 *
 * Detection strategy (in order):
 * 1. Check WSL_DISTRO_NAME env var (always set in WSL2)
 * 2. Fallback: read /proc/version for "microsoft" or "WSL" signature
 *
 * Result is cached to avoid repeated /proc reads.
 */
export function isWSL(): boolean {
	if (cachedIsWSL !== undefined) {
		return cachedIsWSL
	}

	if (process.platform !== 'linux') {
		cachedIsWSL = false
		return false
	}

	if (process.env.WSL_DISTRO_NAME) {
		cachedIsWSL = true
		return true
	}

	try {
		const procVersion = readFileSync('/proc/version', 'utf-8')
		cachedIsWSL = /microsoft|wsl/i.test(procVersion)
		return cachedIsWSL
	} catch {
		// Unreadable /proc/version: not WSL
		cachedIsWSL = false
		return false
	}
}

/**
 * Detect the host environment, distinguishing WSL from plain Linux.
 */
export function detectTerminalEnvironment(): TerminalEnvironment {
	const platform = process.platform
	if (platform === 'darwin') return 'darwin'
	if (platform === 'win32') return 'win32'
	if (platform === 'linux') {
		return isWSL() ? 'wsl' : 'linux'
	}
	return 'unsupported'
}

/**
 * Get the WSL distribution name from the environment.
 * Returns undefined when not running in WSL or when the variable is not set.
 */
export function detectWSLDistro(): string | undefined {
	const distro = process.env.WSL_DISTRO_NAME
	// Empty string means unset; nullish coalescing won't catch it
	if (!distro) return undefined
	return distro
}

/**
 * Executable names for wsl and Windows Terminal on a supported host.
 * Inside WSL the Windows binaries are only reachable through interop with
 * their .exe suffix. Returns null on hosts that cannot reach either.
 */
export function getDefaultExecutables(env: TerminalEnvironment = detectTerminalEnvironment()): HostExecutables | null {
	switch (env) {
		case 'win32':
			return { wsl: 'wsl', terminal: 'wt' }
		case 'wsl':
			return { wsl: 'wsl.exe', terminal: 'wt.exe' }
		default:
			return null
	}
}

/**
 * Reset the cached WSL detection result.
 * Exposed for testing only.
 */
export function _resetWSLCache(): void {
	cachedIsWSL = undefined
}
