import { defineWorkspace } from 'vitest/config';

export default defineWorkspace([
  'packages/core/vitest.config.ts',
  'packages/cas/vitest.config.ts',
  'packages/csv/vitest.config.ts',
  'packages/state-sequelize/vitest.config.ts',
]);
