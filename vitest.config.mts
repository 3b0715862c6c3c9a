import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', 'cdk.out/**', 'dist/**'],
    // CDK synth (asset staging) を含むため長めに設定
    testTimeout: 60_000,
  },
});
