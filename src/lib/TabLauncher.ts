import { once } from 'node:events'
import { randomBytes } from 'crypto'
import path from 'path'
import os from 'os'
import fs from 'fs-extra'
import { execa } from 'execa'
import type { LaunchOptions, LaunchRequest } from '../types/index.js'
import { logger } from '../utils/logger.js'
import { toWslPath } from '../utils/wsl-path.js'
import { buildLaunchScript } from '../utils/terminal-backends/script-builder.js'
import { formatInvocation } from '../utils/terminal-backends/windows-terminal.js'
import type { TerminalBackend, TerminalInvocation } from '../utils/terminal-backends/types.js'

export const SCRIPT_PREFIX = 'wsl-tabs-'

export interface TabLauncherOptions {
	/** Directory the launch scripts are written to (default: OS temp directory) */
	scriptDirectory?: string
}

/**
 * TabLauncher - opens one Windows Terminal tab per command
 *
 * Each launch writes a small bash script, then asks the terminal to run it
 * inside the distribution as the chosen account. The terminal process is
 * detached and never observed again. Scripts of successful launches are kept
 * on disk; only a failed launch removes its script.
 */
export class TabLauncher {
	readonly scriptDirectory: string

	constructor(
		private readonly backend: TerminalBackend,
		options: TabLauncherOptions = {}
	) {
		this.scriptDirectory = options.scriptDirectory ?? os.tmpdir()
	}

	/**
	 * Launch one command. Never throws: failures are logged and reported as false.
	 */
	async launch(request: LaunchRequest, options: LaunchOptions = {}): Promise<boolean> {
		const scriptPath = this.createScriptPath()
		const invocation = this.backend.buildInvocation({
			distro: request.distro,
			user: request.user,
			scriptPath: toWslPath(scriptPath),
			newWindow: request.isFirst,
		})

		if (options.dryRun) {
			logger.info(`[dry-run] Would write ${scriptPath}`)
			logger.info(`[dry-run] Would run: ${formatInvocation(invocation)}`)
			return true
		}

		try {
			await fs.writeFile(scriptPath, buildLaunchScript(request.command), { encoding: 'utf8', mode: 0o755 })
		} catch (error) {
			logger.error(
				`Could not create temporary script file: ${error instanceof Error ? error.message : 'Unknown error'}`
			)
			return false
		}

		logger.debug(`Script written to ${scriptPath}`)
		logger.debug(`Executing: ${formatInvocation(invocation)}`)

		try {
			await this.spawnDetached(invocation)
			return true
		} catch (error) {
			this.reportSpawnFailure(invocation, error)
			await this.removeScript(scriptPath)
			return false
		}
	}

	/**
	 * Start the terminal without waiting for it. Resolves once the OS has
	 * created the process, rejects if it could not be created.
	 */
	private async spawnDetached(invocation: TerminalInvocation): Promise<void> {
		// The result promise is never awaited, so it must not reject
		const subprocess = execa(invocation.file, invocation.args, {
			stdio: 'ignore',
			detached: true,
			reject: false,
		})

		// A process that could not be created at all emits neither 'spawn' nor
		// 'error'; only the result promise settles, with failed set
		const exited = subprocess.then((result) => {
			if (result.failed) {
				throw result instanceof Error ? result : new Error(`Could not start ${invocation.file}`)
			}
		})

		// 'error' before 'spawn' makes once() reject with that error
		await Promise.race([once(subprocess, 'spawn'), exited])

		subprocess.unref()
	}

	private reportSpawnFailure(invocation: TerminalInvocation, error: unknown): void {
		const message = error instanceof Error ? error.message : 'Unknown error'
		if (message.includes('ENOENT') || message.includes('not found')) {
			logger.error(`\`${invocation.file}\` (Windows Terminal) command not found.`)
			logger.info('Please ensure Windows Terminal is installed and in your PATH: https://aka.ms/terminal')
			return
		}
		logger.error(`Error executing command: ${message}`)
	}

	private async removeScript(scriptPath: string): Promise<void> {
		try {
			await fs.remove(scriptPath)
		} catch (error) {
			logger.debug(
				`Could not remove ${scriptPath}: ${error instanceof Error ? error.message : 'Unknown error'}`
			)
		}
	}

	private createScriptPath(): string {
		return path.join(this.scriptDirectory, `${SCRIPT_PREFIX}${randomBytes(6).toString('hex')}.sh`)
	}
}
