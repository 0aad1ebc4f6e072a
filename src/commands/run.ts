import { setTimeout } from 'timers/promises'
import chalk from 'chalk'
import {
	SettingsManager,
	type PartialWslTabsSettings,
	type WslTabsSettings,
} from '../lib/SettingsManager.js'
import { LauncherFactory, type LauncherServices } from '../lib/LauncherFactory.js'
import type { WSLService } from '../lib/WSLService.js'
import type { TabLauncher } from '../lib/TabLauncher.js'
import { SetupError, type RunCommandInput, type RunOptions, type RunSummary } from '../types/index.js'
import { readCommandFile } from '../utils/command-file.js'
import { detectWSLDistro } from '../utils/platform-detect.js'
import {
	promptConfirmation,
	promptInput,
	promptNonNegativeInteger,
	promptSelection,
} from '../utils/prompt.js'
import { isDistroLocalPath } from '../utils/wsl-path.js'
import { logger } from '../utils/logger.js'

export type LauncherServicesFactory = (settings: WslTabsSettings, scriptDirectory: string) => LauncherServices
export type Sleep = (ms: number) => Promise<void>

interface LaunchPlan {
	distro: string
	user: string
	commands: string[]
	delaySeconds: number
	dryRun: boolean
}

const BANNER_WIDTH = 60

/**
 * RunCommand - launch every command of a command file in its own terminal tab
 *
 * select distribution → select user → command file and delay → load → launch loop
 */
export class RunCommand {
	constructor(
		private settingsManager = new SettingsManager(),
		private createServices: LauncherServicesFactory = LauncherFactory.create,
		private sleep: Sleep = (ms) => setTimeout(ms)
	) {}

	async execute(input: RunCommandInput): Promise<RunSummary> {
		const settings = await this.settingsManager.loadSettings(undefined, this.buildOverrides(input.options))
		const scriptDirectory = this.settingsManager.resolveScriptDirectory(settings)
		const { wslService, tabLauncher } = this.createServices(settings, scriptDirectory)

		this.printBanner('WSL Tabs - Windows Terminal launcher')

		// 1. Distribution
		const distro = await this.selectDistribution(wslService, settings.distro)
		logger.info(`Selected distribution: ${distro}`)

		// 2. Account inside it
		const user = await this.selectUser(wslService, distro, settings.user)
		logger.info(`Will run commands as user: ${user}`)

		this.warnIfScriptsUnreachable(distro, scriptDirectory)

		// 3. Command file and delay
		const commandFile =
			input.commandFile ?? (await promptInput('Enter the name of the command file', settings.commandFile))
		const delaySeconds =
			input.options.delay ??
			(await promptNonNegativeInteger('Enter the delay in seconds between commands', settings.delaySeconds))

		// 4. Commands
		const commands = await readCommandFile(commandFile)
		if (commands.length === 0) {
			throw new SetupError(`No valid commands found in ${commandFile}.`, [
				'Add one command per line. Blank lines and lines starting with # are ignored.',
			])
		}

		logger.info(`Found ${commands.length} command(s) to execute.`)
		logger.info(`Delay between commands: ${delaySeconds} second(s)`)

		const dryRun = input.options.dryRun ?? false
		if (dryRun) {
			logger.warn('Dry run: no scripts are written and no tabs are opened.')
		} else if (settings.startDelaySeconds > 0) {
			logger.info(`Starting execution in ${settings.startDelaySeconds} seconds...`)
			await this.sleep(settings.startDelaySeconds * 1000)
		}

		// 5. Launch loop
		const counts = await this.launchAll(tabLauncher, { distro, user, commands, delaySeconds, dryRun })

		this.printBanner('Execution complete!')
		if (!dryRun && counts.launched > 0) {
			logger.info(`Note: Temporary script files are left in ${scriptDirectory}`)
		}

		return { distro, user, total: commands.length, scriptDirectory, ...counts }
	}

	/**
	 * Launch commands in file order. The first one opens a new window, the
	 * rest become tabs in it. A failed launch asks whether to go on.
	 */
	private async launchAll(
		tabLauncher: TabLauncher,
		plan: LaunchPlan
	): Promise<Pick<RunSummary, 'launched' | 'failed' | 'skipped'>> {
		const total = plan.commands.length
		let launched = 0
		let failed = 0

		for (const [index, command] of plan.commands.entries()) {
			const position = index + 1
			logger.info(`[${position}/${total}] Launching command: ${command}`)

			const ok = await tabLauncher.launch(
				{ distro: plan.distro, user: plan.user, command, isFirst: index === 0 },
				{ dryRun: plan.dryRun }
			)

			if (ok) {
				launched++
				if (position < total && !plan.dryRun) {
					logger.info(`    ... waiting ${plan.delaySeconds} second(s)...`)
					await this.sleep(plan.delaySeconds * 1000)
				}
				continue
			}

			failed++
			logger.error(`Failed to launch command: ${command}`)

			const keepGoing = await promptConfirmation('Continue with remaining commands?', false)
			if (!keepGoing) {
				logger.warn('Stopping execution.')
				return { launched, failed, skipped: total - position }
			}
		}

		return { launched, failed, skipped: 0 }
	}

	private async selectDistribution(wslService: WSLService, preferred: string | undefined): Promise<string> {
		const distros = await wslService.listDistributions()
		if (distros.length === 0) {
			throw new SetupError('No WSL distributions found.', [
				'Please ensure WSL is installed and you have at least one distro.',
			])
		}

		if (preferred !== undefined) {
			return this.requireListed(preferred, distros, 'Distribution')
		}

		return promptSelection('Available WSL distributions:', 'distribution', distros)
	}

	private async selectUser(wslService: WSLService, distro: string, preferred: string | undefined): Promise<string> {
		const users = await wslService.listUsers(distro)
		if (users.length === 0) {
			throw new SetupError(`No valid users found in ${distro}.`, [
				"A valid user (like 'root' or a user with UID >= 1000) must exist.",
			])
		}

		if (preferred !== undefined) {
			return this.requireListed(preferred, users, 'User')
		}

		return promptSelection(`Available users in ${distro}:`, 'user', users)
	}

	private requireListed(name: string, available: readonly string[], kind: 'Distribution' | 'User'): string {
		if (!available.includes(name)) {
			throw new SetupError(`${kind} '${name}' not found.`, [`Available: ${available.join(', ')}`])
		}
		return name
	}

	/**
	 * Running inside one distribution with scripts in its own filesystem means
	 * another distribution cannot read them.
	 */
	private warnIfScriptsUnreachable(distro: string, scriptDirectory: string): void {
		const current = detectWSLDistro()
		if (current === undefined || current === distro || !isDistroLocalPath(scriptDirectory)) {
			return
		}

		logger.warn(
			`Launch scripts are written to ${scriptDirectory} inside ${current}, which ${distro} cannot read.`
		)
		logger.info('Set scriptDirectory in .wsl-tabs/settings.json to a Windows drive path such as /mnt/c/Temp.')
	}

	/**
	 * CLI options as settings overrides. Keys left out stay out: deepmerge copies undefined values.
	 */
	private buildOverrides(options: RunOptions): PartialWslTabsSettings {
		const overrides: PartialWslTabsSettings = {}
		if (options.distro !== undefined) overrides.distro = options.distro
		if (options.user !== undefined) overrides.user = options.user
		if (options.delay !== undefined) overrides.delaySeconds = options.delay
		return overrides
	}

	private printBanner(title: string): void {
		const rule = '='.repeat(BANNER_WIDTH)
		// eslint-disable-next-line no-console
		console.log(`\n${rule}\n${chalk.bold(title)}\n${rule}`)
	}
}
