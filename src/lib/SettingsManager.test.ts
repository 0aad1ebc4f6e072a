import { describe, it, expect, vi, beforeEach } from 'vitest'
import os from 'os'
import path from 'path'
import { readFile } from 'fs/promises'
import { SettingsManager } from './SettingsManager.js'

vi.mock('fs/promises')
vi.mock('../utils/logger.js', () => ({
	logger: {
		debug: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
	},
}))

const projectRoot = '/test/project'
const basePath = path.join(projectRoot, '.wsl-tabs', 'settings.json')
const localPath = path.join(projectRoot, '.wsl-tabs', 'settings.local.json')

const notFound = (): Error => Object.assign(new Error('ENOENT: no such file or directory'), { code: 'ENOENT' })

/**
 * Serve settings files from an in-memory map; anything else is ENOENT
 */
function withFiles(files: Record<string, string>): void {
	vi.mocked(readFile).mockImplementation(async (file) => {
		const content = files[String(file)]
		if (content === undefined) {
			throw notFound()
		}
		return content as never
	})
}

describe('SettingsManager', () => {
	let settingsManager: SettingsManager

	beforeEach(() => {
		settingsManager = new SettingsManager()
	})

	describe('loadSettings', () => {
		it('should return defaults when no settings files exist', async () => {
			withFiles({})

			const settings = await settingsManager.loadSettings(projectRoot)

			expect(settings).toEqual({
				commandFile: 'commands.txt',
				delaySeconds: 3,
				startDelaySeconds: 3,
				userDiscoveryTimeoutMs: 10000,
			})
		})

		it('should read settings.json from the .wsl-tabs directory', async () => {
			withFiles({ [basePath]: JSON.stringify({ delaySeconds: 5, distro: 'Ubuntu' }) })

			const settings = await settingsManager.loadSettings(projectRoot)

			expect(settings.delaySeconds).toBe(5)
			expect(settings.distro).toBe('Ubuntu')
			expect(readFile).toHaveBeenCalledWith(basePath, 'utf-8')
		})

		it('should let settings.local.json override settings.json', async () => {
			withFiles({
				[basePath]: JSON.stringify({ delaySeconds: 5, executables: { wsl: 'wsl', terminal: 'wt' } }),
				[localPath]: JSON.stringify({ delaySeconds: 1, executables: { terminal: 'wt-preview' } }),
			})

			const settings = await settingsManager.loadSettings(projectRoot)

			expect(settings.delaySeconds).toBe(1)
			expect(settings.executables).toEqual({ wsl: 'wsl', terminal: 'wt-preview' })
		})

		it('should give CLI overrides the highest priority', async () => {
			withFiles({
				[basePath]: JSON.stringify({ delaySeconds: 5, user: 'root' }),
				[localPath]: JSON.stringify({ delaySeconds: 1 }),
			})

			const settings = await settingsManager.loadSettings(projectRoot, { delaySeconds: 0, user: 'alice' })

			expect(settings.delaySeconds).toBe(0)
			expect(settings.user).toBe('alice')
		})

		it('should throw for malformed JSON', async () => {
			withFiles({ [basePath]: 'invalid json {' })

			await expect(settingsManager.loadSettings(projectRoot)).rejects.toThrow(
				/Failed to parse settings file/,
			)
		})

		it('should reject unknown keys in a settings file', async () => {
			withFiles({ [basePath]: JSON.stringify({ dealy: 4 }) })

			await expect(settingsManager.loadSettings(projectRoot)).rejects.toThrow(
				`Settings validation failed at ${basePath}`,
			)
		})

		it('should list every validation issue', async () => {
			withFiles({ [basePath]: JSON.stringify({ delaySeconds: -1, startDelaySeconds: 1.5 }) })

			await expect(settingsManager.loadSettings(projectRoot)).rejects.toThrow(
				`Settings validation failed at ${basePath}:\n` +
					'  - delaySeconds: delaySeconds must be non-negative\n' +
					'  - startDelaySeconds: startDelaySeconds must be a whole number of seconds',
			)
		})

		it('should reject delays longer than a timer can wait', async () => {
			withFiles({ [basePath]: JSON.stringify({ startDelaySeconds: 2147484 }) })

			await expect(settingsManager.loadSettings(projectRoot)).rejects.toThrow(
				'startDelaySeconds: startDelaySeconds must be at most 2147483 seconds',
			)
		})

		it('should mention CLI overrides when they make settings invalid', async () => {
			withFiles({})

			await expect(settingsManager.loadSettings(projectRoot, { delaySeconds: -2 })).rejects.toThrow(
				/CLI overrides were applied/,
			)
		})

		it('should rethrow read errors other than ENOENT', async () => {
			vi.mocked(readFile).mockRejectedValue(
				Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' }),
			)

			await expect(settingsManager.loadSettings(projectRoot)).rejects.toThrow('EACCES: permission denied')
		})
	})

	describe('resolveScriptDirectory', () => {
		it('should default to the OS temp directory', async () => {
			withFiles({})
			const settings = await settingsManager.loadSettings(projectRoot)

			expect(settingsManager.resolveScriptDirectory(settings)).toBe(os.tmpdir())
		})

		it('should resolve a configured directory', async () => {
			withFiles({ [basePath]: JSON.stringify({ scriptDirectory: 'scripts' }) })
			const settings = await settingsManager.loadSettings(projectRoot)

			expect(settingsManager.resolveScriptDirectory(settings)).toBe(path.resolve('scripts'))
		})
	})
})
