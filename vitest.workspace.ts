import { defineWorkspace } from 'vitest/config';

export default defineWorkspace([
  {
    test: {
      name: 'shared',
      root: './shared',
      environment: 'node',
    },
  },
  {
    test: {
      name: 'backend',
      root: './backend',
      environment: 'node',
    },
  },
  './frontend/vite.config.ts',
]);
