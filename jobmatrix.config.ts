import type { JobMatrixConfig } from '@jobmatrix/cli'

export default {
  matrix: {
    axes: [{ name: 'node', values: ['20', '22'], envVar: 'NODE_VERSION' }],
    include: [{ name: 'bundle', values: { node: '20' }, env: { BUILD_DOC: '1' } }],
    allowFailures: [{ values: { node: '22' } }],
  },
  env: { CI: 'true' },
  setup: [{ id: 'install', name: 'Install', command: 'npm ci' }],
  scripts: {
    default: {
      script: [
        { id: 'typecheck', name: 'Typecheck', command: 'npm run typecheck' },
        { id: 'test', name: 'Test', command: 'npm test' },
      ],
    },
    'doc-build': {
      script: [{ id: 'bundle', name: 'Bundle CLI', command: 'npm run bundle' }],
    },
  },
  cache: { directories: ['node_modules'], prune: ['node_modules/.vite', 'node_modules/.cache'] },
  branches: { except: ['gh-pages'] },
  jobTimeoutMs: 15 * 60_000,
  maxParallel: 2,
} satisfies JobMatrixConfig
