// Main library exports
export * from './lib/WSLService.js'
export * from './lib/TabLauncher.js'
export * from './lib/LauncherFactory.js'
export * from './lib/SettingsManager.js'
export * from './commands/run.js'
export * from './commands/list.js'

// Type exports
export * from './types/index.js'

// Utility exports
export * from './utils/command-file.js'
export * from './utils/wsl-path.js'
export * from './utils/platform-detect.js'
export * from './utils/terminal-backends/windows-terminal.js'
export * from './utils/terminal-backends/script-builder.js'
export type * from './utils/terminal-backends/types.js'
export { logger, createLogger } from './utils/logger.js'
export type { Logger, LoggerOptions } from './utils/logger.js'
