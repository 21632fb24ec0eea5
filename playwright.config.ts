import { defineConfig } from '@playwright/test';

// keep test output free of engine logs unless asked for
process.env.LOG_LEVEL = process.env.LOG_LEVEL || 'silent';

export default defineConfig({
  testDir: './tests',
  projects: [
    { name: 'engine' }
  ]
});
