// LauncherFactory - wires WSLService and TabLauncher from settings and the host platform

import { WSLService } from './WSLService.js'
import { TabLauncher } from './TabLauncher.js'
import type { WslTabsSettings } from './SettingsManager.js'
import { SetupError } from '../types/index.js'
import {
	detectTerminalEnvironment,
	getDefaultExecutables,
	type HostExecutables,
} from '../utils/platform-detect.js'
import { WindowsTerminalBackend } from '../utils/terminal-backends/windows-terminal.js'
import { logger } from '../utils/logger.js'

export interface LauncherServices {
	wslService: WSLService
	tabLauncher: TabLauncher
}

/**
 * Factory for the services a run needs
 *
 * Usage:
 *   const { wslService, tabLauncher } = LauncherFactory.create(settings, scriptDirectory)
 */
export class LauncherFactory {
	/**
	 * Executables to use on this host. Settings win over platform defaults;
	 * an unsupported host is only accepted when settings name both.
	 *
	 * @throws SetupError on a host that cannot reach wsl or Windows Terminal
	 */
	static resolveExecutables(settings: WslTabsSettings): HostExecutables {
		const configured = settings.executables
		if (configured?.wsl && configured.terminal) {
			return { wsl: configured.wsl, terminal: configured.terminal }
		}

		const environment = detectTerminalEnvironment()
		const defaults = getDefaultExecutables(environment)
		if (!defaults) {
			throw new SetupError(`Unsupported platform: ${environment}. wsl-tabs runs on Windows or inside WSL.`, [
				'Set executables.wsl and executables.terminal in .wsl-tabs/settings.json to use other binaries.',
			])
		}

		const executables = {
			wsl: configured?.wsl ?? defaults.wsl,
			terminal: configured?.terminal ?? defaults.terminal,
		}
		logger.debug(`LauncherFactory: using executables for ${environment}:`, JSON.stringify(executables))
		return executables
	}

	static createWSLService(
		settings: WslTabsSettings,
		executables: HostExecutables = LauncherFactory.resolveExecutables(settings)
	): WSLService {
		return new WSLService({
			wslExecutable: executables.wsl,
			userDiscoveryTimeoutMs: settings.userDiscoveryTimeoutMs,
		})
	}

	static create(settings: WslTabsSettings, scriptDirectory: string): LauncherServices {
		const executables = LauncherFactory.resolveExecutables(settings)

		return {
			wslService: LauncherFactory.createWSLService(settings, executables),
			tabLauncher: new TabLauncher(new WindowsTerminalBackend(executables), { scriptDirectory }),
		}
	}
}
