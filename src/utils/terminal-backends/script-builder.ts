/**
 * Lines appended after the user's command. The tab must stay usable once the
 * command exits, so the script ends by replacing itself with an interactive shell.
 */
const KEEP_OPEN_TRAILER = [
	'echo ""',
	'echo "-------------------------------------------------------------------"',
	'echo "Command completed. Press Ctrl+D to close or continue using the shell."',
	'echo "-------------------------------------------------------------------"',
	'exec bash',
]

/**
 * Build the throw-away script a tab runs.
 *
 * The script is started with `bash -i`, so ~/.bashrc (and whatever PATH setup
 * lives there) is loaded before the command runs. The command text is
 * inserted as-is; lines are joined with `\n` regardless of host platform.
 */
export function buildLaunchScript(command: string): string {
	const lines = [
		'#!/bin/bash',
		'# Generated by wsl-tabs. Started with `bash -i` so ~/.bashrc is loaded.',
		'cd ~',
		'',
		command,
		'',
		...KEEP_OPEN_TRAILER,
	]

	return `${lines.join('\n')}\n`
}

/**
 * Escape single quotes for use inside a single-quoted shell string.
 * 'it'\''s' → ends quote, adds escaped quote, resumes quote
 */
export function escapeSingleQuotes(s: string): string {
	return s.replace(/'/g, "'\\''")
}

/**
 * Quote one argument for display as part of a copy-pasteable command line
 */
export function quoteShellArg(arg: string): string {
	if (arg !== '' && /^[\w@%+=:,./\\-]+$/.test(arg)) {
		return arg
	}
	return `'${escapeSingleQuotes(arg)}'`
}
