// vitest.config.ts
import os from 'os';
import path from 'path';
import { defineConfig } from 'vitest/config';

export default defineConfig(() => {
  const isCI = process.env.CI === 'true';

  return {
    test: {
      globals: false,
      environment: 'node',
      env: {
        NODE_ENV: 'test',
        // Keep test output readable; warnings and errors still reach the log file
        LOG_LEVEL: process.env.LOG_LEVEL || 'warn',
        PHASE_STATE_LOG_FILE: path.join(os.tmpdir(), 'phase-state-mcp-test.log')
      },
      include: [
        'src/**/__tests__/**/*.test.ts',
        'src/**/__integration__/**/*.test.ts'
      ],
      exclude: [
        'node_modules',
        'dist'
      ],
      coverage: {
        enabled: false,
        provider: 'v8',
        reporter: ['text'],
        exclude: [
          'node_modules',
          'dist',
          '**/__tests__/**',
          '**/__integration__/**',
          '**/*.d.ts'
        ],
      },
      testTimeout: isCI ? 15000 : 20000,
      hookTimeout: 15000,
      teardownTimeout: 10000,

      pool: 'forks',
      poolOptions: {
        forks: {
          singleFork: true
        }
      },

      retry: 0,
      watch: false,
      clearMocks: true,
      restoreMocks: true
    }
  };
});
