import { readFile, writeFile, rename, copyFile, unlink, open } from 'fs/promises'
import { dirname, join } from 'path'
import { randomBytes } from 'crypto'
import { platform } from 'os'
import { mkdirSync } from 'fs'
import lockfile from 'proper-lockfile'

const WINDOWS_RETRY_COUNT = 3
const WINDOWS_MAX_JITTER_MS = 2000
const DEFAULT_FILE_MODE = 0o600

/** Options for {@link writeFileAtomic} and {@link atomicWriteFile}. */
export interface AtomicWriteOptions {
  /** Permission bits of the written file. Defaults to owner read/write. */
  mode?: number
}

/** Tail of the in-process lock queue per target path. */
const lockQueues = new Map<string, Promise<void>>()

/**
 * Generates a temporary file path adjacent to the target,
 * using a random suffix to avoid collisions.
 */
function getTmpPath(targetPath: string): string {
  const suffix = randomBytes(8).toString('hex')
  return join(dirname(targetPath), `.tmp-${suffix}`)
}

/**
 * Sleeps for a random duration between 0 and `maxMs` milliseconds.
 * Used as jitter between Windows rename retries.
 */
function randomJitter(maxMs: number): Promise<void> {
  const ms = Math.floor(Math.random() * maxMs)
  return new Promise((resolve) => setTimeout(resolve, ms))
}

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code
  }
  return undefined
}

/**
 * Flushes a file's contents to the underlying storage device via fsync.
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
      const code = errorCode(err)
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
        `${fallbackErr instanceof Error ? fallbackErr.message : String(fallbackErr)}`
    )
  }
}

/**
 * Writes content atomically without taking the file lock: write to a temp
 * file created with `mode` -> fsync -> rename over the target.
 *
 * Readers never see a partially-written file. Callers that already hold the
 * lock from {@link withFileLock} use this directly.
 *
 * @param targetPath - Absolute path to the destination file.
 * @param content - String (written as UTF-8) or Buffer content.
 */
export async function writeFileAtomic(
  targetPath: string,
  content: string | Buffer,
  options: AtomicWriteOptions = {}
): Promise<void> {
  mkdirSync(dirname(targetPath), { recursive: true })

  const tmpPath = getTmpPath(targetPath)
  const mode = options.mode ?? DEFAULT_FILE_MODE

  try {
    await writeFile(tmpPath, content, { mode, flag: 'wx' })
    await fsyncFile(tmpPath)
    await atomicRename(tmpPath, targetPath)
  } catch (err) {
    try {
      await unlink(tmpPath)
    } catch {
      // the temp file may never have been created
    }
    throw new Error(
      `Atomic write to "${targetPath}" failed: ${err instanceof Error ? err.message : String(err)}`
    )
  }
}

/**
 * Runs `fn` while holding an exclusive lock on `targetPath`.
 *
 * Callers in the same process are queued in order; other processes are
 * excluded through a proper-lockfile lock directory next to the target.
 * The target file itself does not need to exist.
 *
 * @example
 * ```ts
 * const next = await withFileLock('/data/usage.json', async () => {
 *   const current = JSON.parse(await atomicReadFile('/data/usage.json'))
 *   await writeFileAtomic('/data/usage.json', JSON.stringify({ count: current.count + 1 }))
 *   return current.count + 1
 * })
 * ```
 */
export async function withFileLock<T>(targetPath: string, fn: () => Promise<T>): Promise<T> {
  const previous = lockQueues.get(targetPath) ?? Promise.resolve()
  let releaseQueue: () => void = () => undefined
  const current = new Promise<void>((resolve) => {
    releaseQueue = resolve
  })
  const tail = previous.then(() => current)
  lockQueues.set(targetPath, tail)

  await previous

  try {
    return await runUnderFileLock(targetPath, fn)
  } finally {
    releaseQueue()
    if (lockQueues.get(targetPath) === tail) {
      lockQueues.delete(targetPath)
    }
  }
}

async function runUnderFileLock<T>(targetPath: string, fn: () => Promise<T>): Promise<T> {
  mkdirSync(dirname(targetPath), { recursive: true })

  let release: () => Promise<void>

  try {
    release = await lockfile.lock(targetPath, {
      realpath: false,
      stale: 10_000,
      retries: { retries: 10, factor: 1.5, minTimeout: 25, maxTimeout: 500, randomize: true },
      lockfilePath: `${targetPath}.lock`
    })
  } catch (lockErr) {
    throw new Error(
      `Failed to acquire lock for "${targetPath}": ${lockErr instanceof Error ? lockErr.message : String(lockErr)}`
    )
  }

  try {
    return await fn()
  } finally {
    await release()
  }
}

/**
 * Writes content to a file atomically while holding the file lock.
 *
 * @example
 * ```ts
 * await atomicWriteFile('/data/usage.json', JSON.stringify(record, null, 2))
 * ```
 */
export async function atomicWriteFile(
  targetPath: string,
  content: string | Buffer,
  options: AtomicWriteOptions = {}
): Promise<void> {
  await withFileLock(targetPath, () => writeFileAtomic(targetPath, content, options))
}

function describeReadError(filePath: string, err: unknown): Error {
  const code = errorCode(err)

  if (code === 'ENOENT') {
    return new Error(`File not found: "${filePath}"`)
  }
  if (code === 'EACCES') {
    return new Error(`Permission denied reading "${filePath}"`)
  }

  return new Error(
    `Failed to read "${filePath}": ${err instanceof Error ? err.message : String(err)}`
  )
}

/**
 * Reads a UTF-8 file with structured error handling.
 *
 * @throws If the file does not exist or cannot be read.
 */
export async function atomicReadFile(filePath: string): Promise<string> {
  try {
    return await readFile(filePath, { encoding: 'utf-8' })
  } catch (err) {
    throw describeReadError(filePath, err)
  }
}

/**
 * Reads a binary file with the same error handling as {@link atomicReadFile}.
 */
export async function atomicReadBuffer(filePath: string): Promise<Buffer> {
  try {
    return await readFile(filePath)
  } catch (err) {
    throw describeReadError(filePath, err)
  }
}
