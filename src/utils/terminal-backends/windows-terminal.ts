import type { HostExecutables } from '../platform-detect.js'
import type { TabSpec, TerminalBackend, TerminalInvocation } from './types.js'
import { quoteShellArg } from './script-builder.js'

/** `wt -w -1` always opens a new window */
const NEW_WINDOW_TARGET = '-1'
/** `wt -w 0` targets the most recently used window */
const LAST_WINDOW_TARGET = '0'

/**
 * Build wt arguments for a single tab.
 *
 * The tab runs `wsl -d <distro> -u <user> bash -i <script>`: the script is
 * started by an interactive bash so the account's ~/.bashrc is honoured.
 */
export function buildTabArgs(tab: TabSpec, wslExecutable: string): string[] {
	return [
		'-w',
		tab.newWindow ? NEW_WINDOW_TARGET : LAST_WINDOW_TARGET,
		'new-tab',
		wslExecutable,
		'-d',
		tab.distro,
		'-u',
		tab.user,
		'bash',
		'-i',
		tab.scriptPath,
	]
}

/**
 * Render an invocation as a single command line, for logs and dry runs
 */
export function formatInvocation(invocation: TerminalInvocation): string {
	return [invocation.file, ...invocation.args].map(quoteShellArg).join(' ')
}

/**
 * Windows Terminal backend: opens WSL sessions as wt tabs.
 */
export class WindowsTerminalBackend implements TerminalBackend {
	constructor(private readonly executables: HostExecutables) {}

	buildInvocation(tab: TabSpec): TerminalInvocation {
		return {
			file: this.executables.terminal,
			args: buildTabArgs(tab, this.executables.wsl),
		}
	}
}
