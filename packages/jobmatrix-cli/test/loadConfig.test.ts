import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { resolve } from 'node:path'

import { ConfigurationError } from '@jobmatrix/core'
import { afterEach, describe, expect, it } from 'vitest'

import { loadJobMatrixConfig, parseJobMatrixConfig } from '../src/config/loadConfig.js'

const createdDirectories: string[] = []

afterEach(async () => {
  for (const directory of createdDirectories.splice(0)) {
    await rm(directory, { recursive: true, force: true })
  }
})

const createDirectory = async (prefix: string): Promise<string> => {
  const directory = await mkdtemp(resolve(tmpdir(), prefix))
  createdDirectories.push(directory)
  return directory
}

const minimalConfig = {
  matrix: { axes: [{ name: 'toolchain', values: ['stable', 'beta'] }] },
  scripts: { default: { script: [{ id: 'test', name: 'Test', command: 'npm test' }] } },
}

describe('loadJobMatrixConfig', () => {
  it('loads jobmatrix.config.json', async () => {
    const directory = await createDirectory('jobmatrix-cli-json-')
    await writeFile(
      resolve(directory, 'jobmatrix.config.json'),
      JSON.stringify({
        ...minimalConfig,
        env: { CI: 'true' },
        modeFlags: { coverage: 'COVERAGE' },
        cache: { directories: ['target'], prune: ['target/tmp'] },
      }),
      'utf8'
    )

    const loaded = await loadJobMatrixConfig(directory)

    expect(loaded.configFilePath).toBe(resolve(directory, 'jobmatrix.config.json'))
    expect(loaded.config.matrix.axes).toEqual([
      { name: 'toolchain', values: ['stable', 'beta'], envVar: undefined },
    ])
    expect(loaded.config.env).toEqual({ CI: 'true' })
    expect(loaded.config.modeFlags).toEqual({ coverage: 'COVERAGE' })
    expect(loaded.config.scripts.default.script[0]?.command).toBe('npm test')
    expect(loaded.config.cache?.directories).toEqual(['target'])
  })

  it('prefers jobmatrix.config.ts and reads its default export', async () => {
    const directory = await createDirectory('jobmatrix-cli-ts-')
    await writeFile(
      resolve(directory, 'jobmatrix.config.ts'),
      [
        'const toolchains: string[] = ["stable"]',
        'export default {',
        '  matrix: { axes: [{ name: "toolchain", values: toolchains }] },',
        '  scripts: { default: { script: [{ id: "lint", name: "Lint", command: "npm run lint" }] } },',
        '}',
      ].join('\n'),
      'utf8'
    )
    await writeFile(resolve(directory, 'jobmatrix.config.json'), '{}', 'utf8')

    const loaded = await loadJobMatrixConfig(directory)

    expect(loaded.configFilePath).toBe(resolve(directory, 'jobmatrix.config.ts'))
    expect(loaded.config.matrix.axes[0]?.values).toEqual(['stable'])
    expect(loaded.config.scripts.default.script[0]?.id).toBe('lint')
  })

  it('reads a named config export', async () => {
    const directory = await createDirectory('jobmatrix-cli-named-')
    await writeFile(
      resolve(directory, 'pipeline.config.ts'),
      `export const config = ${JSON.stringify(minimalConfig)}\n`,
      'utf8'
    )

    const loaded = await loadJobMatrixConfig(directory, 'pipeline.config.ts')

    expect(loaded.config.matrix.axes[0]?.name).toBe('toolchain')
  })

  it('throws when no config file exists', async () => {
    const directory = await createDirectory('jobmatrix-cli-missing-')

    await expect(loadJobMatrixConfig(directory)).rejects.toThrow(
      'No config file found. Expected jobmatrix.config.ts or jobmatrix.config.json'
    )
  })

  it('throws a configuration error for invalid JSON', async () => {
    const directory = await createDirectory('jobmatrix-cli-invalid-json-')
    await writeFile(resolve(directory, 'jobmatrix.config.json'), '{ "matrix": ', 'utf8')

    await expect(loadJobMatrixConfig(directory)).rejects.toBeInstanceOf(ConfigurationError)
  })
})

describe('parseJobMatrixConfig', () => {
  const invalidConfigs: [unknown, string][] = [
    [[], 'Config must be an object'],
    [{ scripts: minimalConfig.scripts }, 'matrix must be an object'],
    [{ ...minimalConfig, matrix: { axes: {} } }, 'matrix.axes must be an array'],
    [
      { ...minimalConfig, matrix: { axes: [{ name: 'toolchain', values: ['stable', 3] }] } },
      'matrix.axes[0].values[1] must be a non-empty string',
    ],
    [
      { ...minimalConfig, matrix: { ...minimalConfig.matrix, include: [{ allowFailure: 'yes' }] } },
      'matrix.include[0].allowFailure must be a boolean',
    ],
    [
      { ...minimalConfig, matrix: { ...minimalConfig.matrix, exclude: [{ env: { CI: 1 } }] } },
      'matrix.exclude[0].env.CI must be a string',
    ],
    [{ ...minimalConfig, modeFlags: { nightly: 'NIGHTLY' } }, 'modeFlags.nightly is not a known mode'],
    [{ matrix: minimalConfig.matrix, scripts: {} }, 'scripts.default is required'],
    [
      { ...minimalConfig, scripts: { ...minimalConfig.scripts, bench: { script: [] } } },
      'scripts.bench is not a known mode',
    ],
    [
      { ...minimalConfig, scripts: { default: { prepare: [] } } },
      'scripts.default.script must be an array',
    ],
    [
      {
        ...minimalConfig,
        setup: [
          { id: 'fetch', name: 'Fetch', command: 'npm ci' },
          { id: 'fetch', name: 'Fetch again', command: 'npm ci' },
        ],
      },
      'setup must use unique ids (duplicate: fetch)',
    ],
    [
      { ...minimalConfig, setup: [{ id: 'fetch', name: 'Fetch', command: '' }] },
      'setup[0].command must be a non-empty string',
    ],
    [{ ...minimalConfig, cache: {} }, 'cache.directories must be an array'],
    [
      { ...minimalConfig, deploy: { provider: 'pages', command: 'true', localDir: 'docs' } },
      'deploy.on must be an object',
    ],
    [{ ...minimalConfig, jobTimeoutMs: '10s' }, 'jobTimeoutMs must be a valid number'],
    [{ ...minimalConfig, output: { format: 'xml' } }, 'output.format must be "pretty" or "json"'],
  ]

  it.each(invalidConfigs)('rejects invalid config %#', (config, message) => {
    expect(() => parseJobMatrixConfig(config)).toThrow(message)
  })

  it('parses deploy and branch sections', () => {
    const config = parseJobMatrixConfig({
      ...minimalConfig,
      deploy: {
        provider: 'pages',
        command: './deploy.sh',
        localDir: 'target/doc',
        tokenEnv: 'DEPLOY_TOKEN',
        on: { branch: 'main', trigger: { env: { BUILD_DOC: '1' } }, tags: false },
      },
      branches: { except: ['gh-pages'] },
    })

    expect(config.deploy).toEqual({
      provider: 'pages',
      command: './deploy.sh',
      localDir: 'target/doc',
      tokenEnv: 'DEPLOY_TOKEN',
      timeoutMs: undefined,
      on: {
        branch: 'main',
        trigger: { values: undefined, env: { BUILD_DOC: '1' } },
        tags: false,
        requiredEnv: undefined,
      },
    })
    expect(config.branches).toEqual({ only: undefined, except: ['gh-pages'] })
  })
})
