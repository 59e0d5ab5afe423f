import { defineWorkspace } from 'vitest/config';

export default defineWorkspace([
  'packages/launcher-core/vitest.config.ts',
  'apps/desktop/vitest.unit.config.ts',
]);
