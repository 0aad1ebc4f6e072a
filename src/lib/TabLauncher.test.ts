import { describe, it, expect, vi, beforeEach } from 'vitest'
import { EventEmitter } from 'node:events'
import fs from 'fs-extra'
import path from 'path'
import { execa } from 'execa'
import { TabLauncher, SCRIPT_PREFIX } from './TabLauncher.js'
import { WindowsTerminalBackend } from '../utils/terminal-backends/windows-terminal.js'
import { logger } from '../utils/logger.js'
import type { TerminalBackend } from '../utils/terminal-backends/types.js'

vi.mock('execa')
vi.mock('fs-extra')
vi.mock('../utils/logger.js', () => ({
	logger: {
		info: vi.fn(),
		error: vi.fn(),
		warn: vi.fn(),
		debug: vi.fn(),
		success: vi.fn(),
	},
}))

type FakeSubprocess = EventEmitter & { unref: ReturnType<typeof vi.fn> }

/**
 * Stand-in for the detached terminal process: emits 'spawn', or 'error'
 * when given one, on the next tick like a real child process. Its result
 * promise stays pending, as it does while the terminal runs.
 */
function fakeSubprocess(error?: Error): FakeSubprocess {
	const result = new Promise<unknown>(() => {})
	const subprocess = Object.assign(new EventEmitter(), {
		unref: vi.fn(),
		then: result.then.bind(result),
	})
	process.nextTick(() => {
		if (error) {
			subprocess.emit('error', error)
		} else {
			subprocess.emit('spawn')
		}
	})
	return subprocess
}

/**
 * A process the OS refused to create synchronously: no events at all,
 * only a failed result
 */
function unstartableSubprocess(error: Error): FakeSubprocess {
	const result = Promise.resolve(Object.assign(error, { failed: true }))
	return Object.assign(new EventEmitter(), {
		unref: vi.fn(),
		then: result.then.bind(result),
	})
}

const request = {
	distro: 'Ubuntu',
	user: 'alice',
	command: 'npm run dev',
	isFirst: true,
}

describe('TabLauncher', () => {
	let launcher: TabLauncher

	beforeEach(() => {
		launcher = new TabLauncher(
			new WindowsTerminalBackend({ wsl: 'wsl', terminal: 'wt' }),
			{ scriptDirectory: 'C:\\Users\\alice\\AppData\\Local\\Temp' }
		)
		vi.mocked(fs.writeFile).mockResolvedValue(undefined as never)
		vi.mocked(fs.remove).mockResolvedValue(undefined as never)
	})

	const writtenScriptPath = (): string => String(vi.mocked(fs.writeFile).mock.calls[0]?.[0])
	const spawnedArgs = (): string[] => {
		const args = vi.mocked(execa).mock.calls[0]?.[1]
		return Array.isArray(args) ? args.map(String) : []
	}

	it('should write a launch script for the command', async () => {
		vi.mocked(execa).mockImplementation(() => fakeSubprocess() as never)

		await launcher.launch(request)

		const [, content] = vi.mocked(fs.writeFile).mock.calls[0] ?? []
		expect(String(content).split('\n')).toContain('npm run dev')
		expect(writtenScriptPath()).toMatch(new RegExp(`${SCRIPT_PREFIX}[0-9a-f]{12}\\.sh$`))
	})

	it('should open the first launch in a new window', async () => {
		vi.mocked(execa).mockImplementation(() => fakeSubprocess() as never)

		const result = await launcher.launch(request)

		expect(result).toBe(true)
		expect(vi.mocked(execa).mock.calls[0]?.[0]).toBe('wt')
		expect(spawnedArgs().slice(0, 3)).toEqual(['-w', '-1', 'new-tab'])
	})

	it('should open later launches as tabs in the existing window', async () => {
		vi.mocked(execa).mockImplementation(() => fakeSubprocess() as never)

		await launcher.launch({ ...request, isFirst: false })

		expect(spawnedArgs().slice(0, 3)).toEqual(['-w', '0', 'new-tab'])
	})

	it('should run the script as the selected user through an interactive shell', async () => {
		vi.mocked(execa).mockImplementation(() => fakeSubprocess() as never)

		await launcher.launch(request)

		const scriptName = path.basename(writtenScriptPath())
		expect(spawnedArgs().slice(3)).toEqual([
			'wsl', '-d', 'Ubuntu', '-u', 'alice', 'bash', '-i',
			`/mnt/c/Users/alice/AppData/Local/Temp/${scriptName}`,
		])
	})

	it('should launch through any backend that builds an invocation', async () => {
		const backend: TerminalBackend = {
			buildInvocation: (tab) => ({ file: 'wt-preview', args: ['new-tab', tab.scriptPath] }),
		}
		launcher = new TabLauncher(backend, { scriptDirectory: '/tmp/wsl-tabs' })
		vi.mocked(execa).mockImplementation(() => fakeSubprocess() as never)

		const result = await launcher.launch(request)

		expect(result).toBe(true)
		expect(vi.mocked(execa).mock.calls[0]?.[0]).toBe('wt-preview')
		expect(spawnedArgs()).toEqual(['new-tab', writtenScriptPath()])
	})

	it('should detach the terminal process and not wait for it', async () => {
		let subprocess: FakeSubprocess | undefined
		vi.mocked(execa).mockImplementation(() => {
			subprocess = fakeSubprocess()
			return subprocess as never
		})

		await launcher.launch(request)

		expect(vi.mocked(execa).mock.calls[0]?.[2]).toEqual(
			expect.objectContaining({ detached: true, stdio: 'ignore', reject: false })
		)
		expect(subprocess?.unref).toHaveBeenCalled()
	})

	it('should keep the script after a successful launch', async () => {
		vi.mocked(execa).mockImplementation(() => fakeSubprocess() as never)

		await launcher.launch(request)

		expect(fs.remove).not.toHaveBeenCalled()
	})

	it('should return false and remove the script when the terminal is missing', async () => {
		vi.mocked(execa).mockImplementation(() =>
			fakeSubprocess(Object.assign(new Error('spawn wt ENOENT'), { code: 'ENOENT' })) as never
		)

		const result = await launcher.launch(request)

		expect(result).toBe(false)
		expect(fs.remove).toHaveBeenCalledWith(writtenScriptPath())
		expect(logger.error).toHaveBeenCalledWith('`wt` (Windows Terminal) command not found.')
	})

	it('should report other spawn errors', async () => {
		vi.mocked(execa).mockImplementation(() => fakeSubprocess(new Error('spawn EPERM')) as never)

		const result = await launcher.launch(request)

		expect(result).toBe(false)
		expect(logger.error).toHaveBeenCalledWith('Error executing command: spawn EPERM')
	})

	it('should return false when the process cannot be created at all', async () => {
		vi.mocked(execa).mockImplementation(() => unstartableSubprocess(new Error('spawn EINVAL')) as never)

		const result = await launcher.launch(request)

		expect(result).toBe(false)
		expect(fs.remove).toHaveBeenCalledWith(writtenScriptPath())
		expect(logger.error).toHaveBeenCalledWith('Error executing command: spawn EINVAL')
	})

	it('should return false when the script cannot be written', async () => {
		vi.mocked(fs.writeFile).mockRejectedValue(new Error('ENOSPC: no space left on device'))

		const result = await launcher.launch(request)

		expect(result).toBe(false)
		expect(execa).not.toHaveBeenCalled()
		expect(logger.error).toHaveBeenCalledWith(
			'Could not create temporary script file: ENOSPC: no space left on device'
		)
	})

	it('should not write or spawn anything in dry-run mode', async () => {
		const result = await launcher.launch(request, { dryRun: true })

		expect(result).toBe(true)
		expect(fs.writeFile).not.toHaveBeenCalled()
		expect(execa).not.toHaveBeenCalled()
		expect(logger.info).toHaveBeenCalledWith(
			expect.stringMatching(/^\[dry-run\] Would run: wt -w -1 new-tab wsl -d Ubuntu -u alice bash -i \/mnt\/c\//)
		)
	})
})
