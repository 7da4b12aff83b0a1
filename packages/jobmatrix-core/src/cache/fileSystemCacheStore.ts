import { randomUUID } from 'node:crypto'
import { cp, mkdir, rename, rm, stat } from 'node:fs/promises'
import { dirname, resolve } from 'node:path'

import type { CacheStore } from '../contracts/cache.js'

/**
 * Cache store keeping one directory tree per cache key below a root directory.
 *
 * Layout: `<root>/<cacheKey>/<directory>`.
 */
export class FileSystemCacheStore implements CacheStore {
  private readonly root: string

  /**
   * Creates a file system cache store.
   *
   * @param root Store root directory.
   */
  public constructor(root: string) {
    this.root = root
  }

  /**
   * Copies a stored directory into the target path.
   *
   * @param cacheKey Job cache key.
   * @param directory Configured directory name.
   * @param targetPath Job-local destination.
   * @returns False when nothing is stored yet.
   */
  public async restore(cacheKey: string, directory: string, targetPath: string): Promise<boolean> {
    const entryPath = this.entryPath(cacheKey, directory)
    if (!(await isDirectory(entryPath))) {
      return false
    }

    await mkdir(dirname(targetPath), { recursive: true })
    await cp(entryPath, targetPath, { recursive: true })
    return true
  }

  /**
   * Replaces the stored directory. The copy lands beside the entry first and is renamed
   * into place, so readers see either the old or the new tree.
   *
   * @param cacheKey Job cache key.
   * @param directory Configured directory name.
   * @param sourcePath Job-local source.
   */
  public async persist(cacheKey: string, directory: string, sourcePath: string): Promise<void> {
    const entryPath = this.entryPath(cacheKey, directory)
    const stagingPath = `${entryPath}.staging-${randomUUID()}`

    await mkdir(dirname(entryPath), { recursive: true })

    try {
      await cp(sourcePath, stagingPath, { recursive: true })
      await rm(entryPath, { recursive: true, force: true })
      await rename(stagingPath, entryPath)
    } finally {
      await rm(stagingPath, { recursive: true, force: true })
    }
  }

  private entryPath(cacheKey: string, directory: string): string {
    return resolve(this.root, cacheKey, directory)
  }
}

const isDirectory = async (path: string): Promise<boolean> => {
  try {
    return (await stat(path)).isDirectory()
  } catch (error) {
    if (isMissingPathError(error)) {
      return false
    }
    throw error
  }
}

export const isMissingPathError = (error: unknown): boolean => {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}
