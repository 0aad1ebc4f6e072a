/**
 * One tab to open: which distribution, as whom, and which script to run there.
 */
export interface TabSpec {
	distro: string
	user: string
	/** Script path as seen from inside the distribution */
	scriptPath: string
	/** Open a new top-level window instead of a tab in the most recent one */
	newWindow: boolean
}

export interface TerminalInvocation {
	file: string
	args: string[]
}

/**
 * Backend interface for the terminal that hosts the launched sessions.
 */
export interface TerminalBackend {
	buildInvocation(tab: TabSpec): TerminalInvocation
}
