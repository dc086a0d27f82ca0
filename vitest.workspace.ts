import { defineWorkspace } from 'vitest/config';

export default defineWorkspace([
  'packages/core',
  'packages/library',
  'packages/model',
  'packages/hypothesis',
  'packages/report',
  'packages/cli',
]);
