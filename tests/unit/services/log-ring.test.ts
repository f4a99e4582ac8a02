import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, rmSync, readFileSync } from 'fs'
import { join } from 'path'
import { tmpdir } from 'os'
import { LogRing } from '../../../src/main/services/diagnostics/log-ring'
import { redactSecret } from '../../../src/main/services/diagnostics/redact'

describe('LogRing', () => {
  beforeEach(() => {
    ;(LogRing as unknown as { instance: null }).instance = null
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true)
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('should return the same instance', () => {
    expect(LogRing.getInstance()).toBe(LogRing.getInstance())
  })

  it('should return entries oldest-first and honor the count', () => {
    const logger = LogRing.getInstance()
    logger.info('one')
    logger.warn('two')
    logger.error('three')

    expect(logger.getEntries().map((e) => e.message)).toEqual(['one', 'two', 'three'])
    expect(logger.getEntries(2).map((e) => e.message)).toEqual(['two', 'three'])
  })

  it('should keep only the last 1000 entries', () => {
    const logger = LogRing.getInstance()
    logger.configure({ mirrorLevel: 'silent' })
    for (let i = 0; i < 1005; i++) {
      logger.debug(`m${i}`)
    }

    const entries = logger.getEntries()
    expect(entries).toHaveLength(1000)
    expect(entries[0].message).toBe('m5')
    expect(entries[999].message).toBe('m1004')
  })

  it('should serialize attached errors', () => {
    const logger = LogRing.getInstance()
    logger.error('failed', new Error('boom'))

    expect(logger.getEntries(1)[0].data).toMatchObject({ name: 'Error', message: 'boom' })
  })

  it('should mirror entries at or above the threshold to stderr as JSON lines', () => {
    const logger = LogRing.getInstance()
    logger.configure({ mirrorLevel: 'warn' })

    logger.info('quiet')
    logger.warn('loud', { jobId: 'job-1' })

    const stderrWrite = vi.mocked(process.stderr.write)
    expect(stderrWrite).toHaveBeenCalledTimes(1)
    const line = String(stderrWrite.mock.calls[0][0])
    expect(line.endsWith('\n')).toBe(true)
    expect(JSON.parse(line)).toMatchObject({ level: 'warn', message: 'loud', data: { jobId: 'job-1' } })
  })

  it('should mirror nothing when silent', () => {
    const logger = LogRing.getInstance()
    logger.configure({ mirrorLevel: 'silent' })

    logger.error('hidden')

    expect(vi.mocked(process.stderr.write)).not.toHaveBeenCalled()
  })

  describe('flush', () => {
    let dir: string

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'logs-test-'))
    })

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true })
    })

    it('should refuse to flush without a logs directory', () => {
      expect(() => LogRing.getInstance().flush()).toThrow('Cannot flush log ring: no logs directory configured')
    })

    it('should write the buffer to a timestamped file', () => {
      const logger = LogRing.getInstance()
      logger.configure({ logsDir: join(dir, 'logs'), mirrorLevel: 'silent' })
      logger.info('persisted')

      const path = logger.flush()

      expect(path.startsWith(join(dir, 'logs', 'log-ring-'))).toBe(true)
      const written = JSON.parse(readFileSync(path, 'utf-8'))
      expect(written).toHaveLength(1)
      expect(written[0].message).toBe('persisted')
    })
  })
})

describe('redactSecret', () => {
  it('should keep a short prefix and the length', () => {
    expect(redactSecret('pat_0123456789abcdef')).toBe('pat_…(20 chars)')
  })

  it('should hide short values entirely', () => {
    expect(redactSecret('abc')).toBe('[redacted]')
    expect(redactSecret('1234567')).toBe('[redacted]')
  })

  it('should reveal the prefix from eight characters on', () => {
    expect(redactSecret('12345678')).toBe('1234…(8 chars)')
  })
})
