import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import { afterEach, beforeEach, describe, expect, it } from 'vitest'

import { FileSystemCacheStore } from '../src/index.js'

describe('FileSystemCacheStore', () => {
  let root = ''

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'jobmatrix-store-'))
  })

  afterEach(async () => {
    await rm(root, { recursive: true, force: true })
  })

  it('reports a miss for unknown entries', async () => {
    const store = new FileSystemCacheStore(join(root, 'store'))

    expect(await store.restore('stable-abc', 'target', join(root, 'work', 'target'))).toBe(false)
  })

  it('persists a directory tree and restores it into another location', async () => {
    const store = new FileSystemCacheStore(join(root, 'store'))
    const source = join(root, 'job-a', 'target')
    await mkdir(join(source, 'release'), { recursive: true })
    await writeFile(join(source, 'release', 'app.bin'), 'binary')

    await store.persist('stable-abc', 'target', source)
    const destination = join(root, 'job-b', 'target')
    const restored = await store.restore('stable-abc', 'target', destination)

    expect(restored).toBe(true)
    expect(await readFile(join(destination, 'release', 'app.bin'), 'utf8')).toBe('binary')
    expect(await readdir(join(root, 'store', 'stable-abc'))).toEqual(['target'])
  })

  it('replaces the previous entry instead of merging into it', async () => {
    const store = new FileSystemCacheStore(join(root, 'store'))
    const source = join(root, 'job', 'target')
    await mkdir(source, { recursive: true })
    await writeFile(join(source, 'old.txt'), 'old')
    await store.persist('stable-abc', 'target', source)

    await rm(join(source, 'old.txt'))
    await writeFile(join(source, 'new.txt'), 'new')
    await store.persist('stable-abc', 'target', source)

    expect(await readdir(join(root, 'store', 'stable-abc', 'target'))).toEqual(['new.txt'])
  })
})
