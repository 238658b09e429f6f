import { defineConfig } from 'vitest/config';

// FORCE_COLOR is set for tests below; an inherited NO_COLOR makes Node emit a
// conflict warning on every child process's stderr, so drop it for the run.
delete process.env.NO_COLOR;

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    env: {
      // Force color output for consistent test behavior (chalk output length varies with/without colors)
      FORCE_COLOR: '1',
      NODE_ENV: 'test',
    },

    // Tests mock the shared exec module, so keep every file in its own context
    isolate: true,
    pool: 'threads',

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/',
        'dist/',
        '**/*.test.ts',
        '**/types.ts',
      ],
    },
    testTimeout: 30000,
    hookTimeout: 10000,
  },
});
