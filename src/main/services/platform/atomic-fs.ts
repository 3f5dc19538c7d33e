import { readFile, writeFile, rename, copyFile, unlink, open, mkdir, stat } from 'fs/promises'
import { dirname, join, basename } from 'path'
import { randomBytes } from 'crypto'
import { platform } from 'os'
import lockfile from 'proper-lockfile'
import type { VaultFileSystem } from '../vault/types'

const WINDOWS_RETRY_COUNT = 3
const WINDOWS_MAX_JITTER_MS = 2000
const DEFAULT_FILE_MODE = 0o600

/**
 * Generates a temporary file path adjacent to the target,
 * using a random suffix to avoid collisions.
 */
function getTmpPath(targetPath: string): string {
  const suffix = randomBytes(8).toString('hex')
  return join(dirname(targetPath), `.${basename(targetPath)}.tmp-${suffix}`)
}

/**
 * Sleeps for a random duration between 0 and `maxMs` milliseconds.
 * Used as jitter between Windows rename retries.
 */
function randomJitter(maxMs: number): Promise<void> {
  const ms = Math.floor(Math.random() * maxMs)
  return new Promise((resolve) => setTimeout(resolve, ms))
}

function errnoCode(err: unknown): string | undefined {
  return err instanceof Error && 'code' in err && typeof err.code === 'string' ? err.code : undefined
}

/**
 * Flushes a file's contents to the underlying storage device via fsync.
 *
 * @param filePath - Path to the file to sync.
 */
async function fsyncFile(filePath: string): Promise<void> {
  const handle = await open(filePath, 'r')
  try {
    await handle.sync()
  } finally {
    await handle.close()
  }
}

/**
 * Attempts an atomic rename with Windows-specific retry logic.
 *
 * On Windows, antivirus and indexing services can briefly lock files,
 * causing rename to fail with EPERM/EACCES. This function retries
 * with random jitter before falling back to a copy+unlink strategy.
 *
 * @param tmpPath - Source temporary file path.
 * @param targetPath - Destination file path.
 */
async function atomicRename(tmpPath: string, targetPath: string): Promise<void> {
  if (platform() !== 'win32') {
    await rename(tmpPath, targetPath)
    return
  }

  for (let attempt = 1; attempt <= WINDOWS_RETRY_COUNT; attempt++) {
    try {
      await rename(tmpPath, targetPath)
      return
    } catch (err) {
      const code = errnoCode(err)
      if (code !== 'EPERM' && code !== 'EACCES') {
        throw err
      }

      if (attempt < WINDOWS_RETRY_COUNT) {
        await randomJitter(WINDOWS_MAX_JITTER_MS)
      }
    }
  }

  try {
    await copyFile(tmpPath, targetPath)
    await unlink(tmpPath)
  } catch (fallbackErr) {
    throw new Error(
      `Atomic rename failed after ${WINDOWS_RETRY_COUNT} retries and copy+unlink fallback also failed: ` +
        `${fallbackErr instanceof Error ? fallbackErr.message : String(fallbackErr)}`,
      { cause: fallbackErr }
    )
  }
}

/**
 * Takes the cross-process write lock for `targetPath`. The target itself
 * need not exist yet.
 */
async function acquireLock(targetPath: string): Promise<() => Promise<void>> {
  try {
    return await lockfile.lock(targetPath, {
      realpath: false,
      retries: { retries: 5, minTimeout: 100, maxTimeout: 1000 },
      lockfilePath: `${targetPath}.lock`
    })
  } catch (lockErr) {
    throw new Error(
      `Failed to acquire lock for "${targetPath}": ${lockErr instanceof Error ? lockErr.message : String(lockErr)}`,
      { cause: lockErr }
    )
  }
}

/**
 * Writes content to a file atomically: write to temp file -> fsync -> rename.
 *
 * Readers never see a partially-written file: the target is either the old
 * version or the new one. A `<target>.lock` directory held through
 * proper-lockfile keeps other processes from writing at the same time, and
 * is taken for first-time creation too.
 *
 * @param targetPath - Absolute path to the destination file.
 * @param content - String or Buffer content to write.
 * @param mode - Permission bits for the written file (default 0600).
 *
 * @example
 * ```ts
 * await atomicWriteFile('/data/vault.dat', packEnvelope(sealed))
 * ```
 */
export async function atomicWriteFile(
  targetPath: string,
  content: string | Buffer,
  mode: number = DEFAULT_FILE_MODE
): Promise<void> {
  await mkdir(dirname(targetPath), { recursive: true })

  const release = await acquireLock(targetPath)

  const tmpPath = getTmpPath(targetPath)

  try {
    await writeFile(tmpPath, content, { mode })
    await fsyncFile(tmpPath)
    await atomicRename(tmpPath, targetPath)
  } catch (err) {
    await unlink(tmpPath).catch(() => undefined)
    throw new Error(
      `Atomic write to "${targetPath}" failed: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err }
    )
  } finally {
    await release().catch(() => undefined)
  }
}

/**
 * Reads a whole file with structured error handling.
 *
 * @param filePath - Absolute path to the file to read.
 * @returns The raw file contents.
 * @throws If the file does not exist or cannot be read.
 */
export async function atomicReadFile(filePath: string): Promise<Buffer> {
  try {
    return await readFile(filePath)
  } catch (err) {
    const code = errnoCode(err)

    if (code === 'ENOENT') {
      throw new Error(`File not found: "${filePath}"`, { cause: err })
    }
    if (code === 'EACCES') {
      throw new Error(`Permission denied reading "${filePath}"`, { cause: err })
    }

    throw new Error(
      `Failed to read "${filePath}": ${err instanceof Error ? err.message : String(err)}`,
      { cause: err }
    )
  }
}

/**
 * Moves a file, copying then unlinking when the rename crosses devices.
 */
export async function moveFile(from: string, to: string): Promise<void> {
  try {
    await rename(from, to)
  } catch (err) {
    if (errnoCode(err) !== 'EXDEV') {
      throw err
    }
    await copyFile(from, to)
    await unlink(from)
  }
}

/** Resolves to false only when nothing exists at `filePath`. */
async function pathExists(filePath: string): Promise<boolean> {
  try {
    await stat(filePath)
    return true
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') {
      return false
    }
    throw err
  }
}

/**
 * The {@link VaultFileSystem} backed by the local disk.
 */
export function createNodeFileSystem(): VaultFileSystem {
  return {
    readFile: atomicReadFile,
    writeFileAtomic: atomicWriteFile,
    rename: moveFile,
    unlink: (filePath) => unlink(filePath),
    exists: pathExists,
    isDirectory: async (filePath) => {
      try {
        return (await stat(filePath)).isDirectory()
      } catch (err) {
        if (errnoCode(err) === 'ENOENT') {
          return false
        }
        throw err
      }
    },
    mkdirp: async (dirPath) => {
      await mkdir(dirPath, { recursive: true })
    }
  }
}
