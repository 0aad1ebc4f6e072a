import { readFile } from 'fs/promises'
import os from 'os'
import path from 'path'
import { z } from 'zod'
import deepmerge from 'deepmerge'
import { logger } from '../utils/logger.js'
import { DEFAULT_COMMAND_FILE } from '../utils/command-file.js'
import { MAX_DELAY_SECONDS } from '../utils/prompt.js'

export const SETTINGS_DIRECTORY = '.wsl-tabs'

const nonNegativeSeconds = (what: string) =>
	z
		.number()
		.int(`${what} must be a whole number of seconds`)
		.min(0, `${what} must be non-negative`)
		.max(MAX_DELAY_SECONDS, `${what} must be at most ${MAX_DELAY_SECONDS} seconds`)

/**
 * Zod schema for executable overrides
 */
export const ExecutablesSettingsSchema = z
	.object({
		wsl: z
			.string()
			.min(1, 'WSL executable cannot be empty')
			.optional()
			.describe('Command used to reach WSL (default: wsl on Windows, wsl.exe inside WSL)'),
		terminal: z
			.string()
			.min(1, 'Terminal executable cannot be empty')
			.optional()
			.describe('Windows Terminal command (default: wt on Windows, wt.exe inside WSL)'),
	})
	.optional()

/**
 * Zod schema for wsl-tabs settings
 */
export const WslTabsSettingsSchema = z.object({
	commandFile: z
		.string()
		.min(1, "Settings 'commandFile' cannot be empty")
		.default(DEFAULT_COMMAND_FILE)
		.describe('Command file offered as the default at the prompt'),
	delaySeconds: nonNegativeSeconds('delaySeconds')
		.default(3)
		.describe('Delay offered as the default between launches'),
	startDelaySeconds: nonNegativeSeconds('startDelaySeconds')
		.default(3)
		.describe('Pause before the first launch; 0 disables it'),
	userDiscoveryTimeoutMs: z
		.number()
		.int()
		.positive('userDiscoveryTimeoutMs must be positive')
		.default(10_000)
		.describe('Timeout for reading the account list of a distribution'),
	scriptDirectory: z
		.string()
		.min(1, "Settings 'scriptDirectory' cannot be empty")
		.optional()
		.describe('Where launch scripts are written (default: the OS temp directory)'),
	distro: z
		.string()
		.min(1)
		.optional()
		.describe('Distribution to use without prompting'),
	user: z
		.string()
		.min(1)
		.optional()
		.describe('Account to run as without prompting'),
	executables: ExecutablesSettingsSchema,
})

/**
 * Non-defaulting variant for pre-merge validation
 * This prevents Zod from polluting partial settings with default values before merge
 */
export const WslTabsSettingsSchemaNoDefaults = z.object({
	commandFile: z.string().min(1, "Settings 'commandFile' cannot be empty").optional(),
	delaySeconds: nonNegativeSeconds('delaySeconds').optional(),
	startDelaySeconds: nonNegativeSeconds('startDelaySeconds').optional(),
	userDiscoveryTimeoutMs: z.number().int().positive('userDiscoveryTimeoutMs must be positive').optional(),
	scriptDirectory: z.string().min(1, "Settings 'scriptDirectory' cannot be empty").optional(),
	distro: z.string().min(1).optional(),
	user: z.string().min(1).optional(),
	executables: ExecutablesSettingsSchema,
})

export type WslTabsSettings = z.infer<typeof WslTabsSettingsSchema>
export type PartialWslTabsSettings = z.infer<typeof WslTabsSettingsSchemaNoDefaults>

export class SettingsManager {
	/**
	 * Load settings from <PROJECT_ROOT>/.wsl-tabs/settings.json and settings.local.json
	 * Merges settings.local.json over settings.json with priority
	 * CLI overrides have highest priority if provided
	 * Missing files are not an error; defaults fill the gaps
	 */
	async loadSettings(
		projectRoot?: string,
		cliOverrides?: PartialWslTabsSettings,
	): Promise<WslTabsSettings> {
		const root = this.getProjectRoot(projectRoot)

		const baseSettings = await this.loadSettingsFile(root, 'settings.json')
		const localSettings = await this.loadSettingsFile(root, 'settings.local.json')

		let merged = this.mergeSettings(baseSettings, localSettings)
		logger.debug('After merging base + local settings:', merged)

		if (cliOverrides && Object.keys(cliOverrides).length > 0) {
			logger.debug('CLI overrides to apply:', cliOverrides)
			merged = this.mergeSettings(merged, cliOverrides)
		}

		const result = WslTabsSettingsSchema.safeParse(merged)
		if (!result.success) {
			const error = this.formatAllZodErrors(result.error, '<merged settings>')
			if (cliOverrides && Object.keys(cliOverrides).length > 0) {
				throw new Error(`${error.message}\n\nNote: CLI overrides were applied. Check your command-line options.`)
			}
			throw error
		}

		logger.debug('Final merged configuration:', result.data)
		return result.data
	}

	/**
	 * Directory launch scripts are written to
	 */
	resolveScriptDirectory(settings: WslTabsSettings): string {
		return settings.scriptDirectory ? path.resolve(settings.scriptDirectory) : os.tmpdir()
	}

	/**
	 * Load and parse a single settings file
	 * Returns empty object if file doesn't exist (not an error)
	 */
	private async loadSettingsFile(
		projectRoot: string,
		filename: string,
	): Promise<PartialWslTabsSettings> {
		const settingsPath = path.join(projectRoot, SETTINGS_DIRECTORY, filename)

		let content: string
		try {
			content = await readFile(settingsPath, 'utf-8')
		} catch (error) {
			if ((error as { code?: string }).code === 'ENOENT') {
				logger.debug(`No settings file found at ${settingsPath}, using defaults`)
				return {}
			}
			throw error
		}

		let parsed: unknown
		try {
			parsed = JSON.parse(content)
		} catch (error) {
			throw new Error(
				`Failed to parse settings file at ${settingsPath}: ${error instanceof Error ? error.message : 'Invalid JSON'}`,
			)
		}

		// Strict per file so typos in keys are reported instead of silently ignored
		const result = WslTabsSettingsSchemaNoDefaults.strict().safeParse(parsed)
		if (!result.success) {
			throw this.formatAllZodErrors(result.error, settingsPath)
		}

		logger.debug(`Settings from ${settingsPath}:`, result.data)
		return result.data
	}

	/**
	 * Deep merge two settings objects with priority to override
	 * Uses deepmerge library with array replacement strategy
	 */
	private mergeSettings(
		base: PartialWslTabsSettings,
		override: PartialWslTabsSettings,
	): PartialWslTabsSettings {
		return deepmerge<PartialWslTabsSettings>(base, override, {
			arrayMerge: (_destinationArray, sourceArray) => sourceArray,
		})
	}

	/**
	 * Format all Zod validation errors into a single error message
	 */
	private formatAllZodErrors(error: z.ZodError, settingsPath: string): Error {
		const errorMessages = error.issues.map(issue => {
			const issuePath = issue.path.length > 0 ? issue.path.join('.') : 'root'
			return `  - ${issuePath}: ${issue.message}`
		})

		return new Error(
			`Settings validation failed at ${settingsPath}:\n${errorMessages.join('\n')}`,
		)
	}

	private getProjectRoot(projectRoot?: string): string {
		return projectRoot ?? process.cwd()
	}
}
