import { SettingsManager, type WslTabsSettings } from '../lib/SettingsManager.js'
import { LauncherFactory } from '../lib/LauncherFactory.js'
import type { WSLService } from '../lib/WSLService.js'
import { SetupError, type ListCommandInput } from '../types/index.js'
import { logger } from '../utils/logger.js'

export type WSLServiceFactory = (settings: WslTabsSettings) => WSLService

/**
 * ListCommand - print distributions, or the accounts of one distribution,
 * without prompting. Names go to stdout one per line so they can be piped.
 */
export class ListCommand {
	constructor(
		private settingsManager = new SettingsManager(),
		private createWSLService: WSLServiceFactory = LauncherFactory.createWSLService
	) {}

	async execute(input: ListCommandInput): Promise<string[]> {
		const settings = await this.settingsManager.loadSettings()
		const wslService = this.createWSLService(settings)

		const names = input.distro
			? await this.listUsers(wslService, input.distro)
			: await wslService.listDistributions()

		if (names.length === 0 && !input.distro) {
			throw new SetupError('No WSL distributions found.', [
				'Please ensure WSL is installed and you have at least one distro.',
			])
		}

		for (const name of names) {
			process.stdout.write(`${name}\n`)
		}

		logger.debug(`Listed ${names.length} name(s)`)
		return names
	}

	private async listUsers(wslService: WSLService, distro: string): Promise<string[]> {
		const distros = await wslService.listDistributions()
		if (!distros.includes(distro)) {
			throw new SetupError(`Distribution '${distro}' not found.`, [`Available: ${distros.join(', ') || '(none)'}`])
		}

		const users = await wslService.listUsers(distro)
		if (users.length === 0) {
			throw new SetupError(`No valid users found in ${distro}.`, [
				"A valid user (like 'root' or a user with UID >= 1000) must exist.",
			])
		}
		return users
	}
}
