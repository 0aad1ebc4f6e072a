// Launch types
export interface LaunchRequest {
  /** WSL distribution the tab runs in */
  distro: string
  /** Linux account the command runs as */
  user: string
  /** Shell command text, passed through verbatim */
  command: string
  /** First launch of a run opens a new window instead of a tab */
  isFirst: boolean
}

export interface LaunchOptions {
  dryRun?: boolean
}

// Run command types
export interface RunOptions {
  distro?: string
  user?: string
  delay?: number
  dryRun?: boolean
}

export interface RunCommandInput {
  commandFile?: string | undefined
  options: RunOptions
}

export interface RunSummary {
  distro: string
  user: string
  total: number
  launched: number
  failed: number
  skipped: number
  scriptDirectory: string
}

export interface ListCommandInput {
  distro?: string | undefined
}

/**
 * Unrecoverable error during setup (discovery, settings, reading the command file).
 * Hints are printed after the message to tell the operator what to check.
 */
export class SetupError extends Error {
  readonly hints: string[]

  constructor(message: string, hints: string[] = []) {
    super(message)
    this.name = 'SetupError'
    this.hints = hints
  }
}

/**
 * Error thrown when the operator interrupts a prompt (Ctrl+C or end of input)
 * The CLI treats this as a normal exit, not a failure
 */
export class UserCancelledError extends Error {
  constructor(message = 'Operation cancelled.') {
    super(message)
    this.name = 'UserCancelledError'
  }
}
