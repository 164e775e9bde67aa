import { defineWorkspace } from 'vitest/config'

export default defineWorkspace([
  {
    test: {
      name: 'gateway-core',
      include: ['packages/gateway-core/src/__tests__/**/*.test.ts'],
    },
  },
  {
    test: {
      name: 'observability',
      include: ['packages/observability/src/__tests__/**/*.test.ts'],
    },
  },
  {
    test: {
      name: 'datasets',
      include: ['modules/datasets/src/__tests__/**/*.test.ts'],
    },
  },
  {
    test: {
      name: 'dataset-api',
      include: ['apps/dataset-api/src/__tests__/**/*.test.ts'],
    },
  },
])
