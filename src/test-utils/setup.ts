import { beforeEach } from 'vitest'

// Global test setup
// Note: Mock cleanup (clearMocks, resetMocks, restoreMocks) is handled by vitest.config.ts
beforeEach(() => {
  // Reset environment variables to clean state
  delete process.env.WSL_TABS_DEBUG
  delete process.env.WSL_DISTRO_NAME
})
