import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Command tests share process.env and console spies.
    fileParallelism: false,
    // Exclude compiled output from test discovery
    exclude: ['dist/**', 'node_modules/**'],
  },
});
