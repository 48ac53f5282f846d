import { mkdirSync } from 'node:fs';
import { defineConfig } from 'vitest/config';

// Ensure a stable, writable temp directory for vitest internals and the
// snapshot file tests.
const fallbackTmpDir = '/tmp';
const resolvedTmpDir =
  process.env.TMPDIR && process.env.TMPDIR.trim().length > 0
    ? process.env.TMPDIR
    : fallbackTmpDir;
process.env.TMPDIR = resolvedTmpDir;
process.env.TMP = resolvedTmpDir;
process.env.TEMP = resolvedTmpDir;
try {
  mkdirSync(resolvedTmpDir, { recursive: true });
} catch {
  // If we cannot create it, let vitest surface the error normally.
}

/**
 * Vitest Configuration for spanlog
 *
 * Worker count can be overridden with SPANLOG_TEST_WORKERS.
 */
export default defineConfig(() => {
  const envWorkers = parseInt(process.env.SPANLOG_TEST_WORKERS ?? '', 10);
  const maxWorkers = !isNaN(envWorkers) && envWorkers > 0 ? envWorkers : 2;

  return {
    test: {
      globals: true,
      environment: 'node',
      include: ['src/**/*.test.ts'],
      setupFiles: ['./vitest.setup.ts'],
      testTimeout: 30000,
      hookTimeout: 10000,
      pool: 'forks' as const,
      poolOptions: {
        forks: {
          maxForks: maxWorkers,
          minForks: 1,
          isolate: true,
        },
      },
    },
  };
});
