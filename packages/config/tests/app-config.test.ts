import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import {
  getEnvBool,
  getEnvNumber,
  getEnvVar,
  isProductionEnv,
  JsonFileError,
  loadOptionalJson,
} from '../index'

describe('env helpers', () => {
  const originalEnv = { ...process.env }

  beforeEach(() => {
    delete process.env.PKGSHELF_TEST_VALUE
  })

  afterEach(() => {
    process.env = { ...originalEnv }
  })

  it('returns the default when a variable is unset or empty', () => {
    expect(getEnvVar('PKGSHELF_TEST_VALUE')).toBeUndefined()
    expect(getEnvVar('PKGSHELF_TEST_VALUE', 'fallback')).toBe('fallback')

    process.env.PKGSHELF_TEST_VALUE = ''
    expect(getEnvVar('PKGSHELF_TEST_VALUE', 'fallback')).toBe('fallback')
  })

  it('parses booleans', () => {
    process.env.PKGSHELF_TEST_VALUE = 'TRUE'
    expect(getEnvBool('PKGSHELF_TEST_VALUE')).toBe(true)

    process.env.PKGSHELF_TEST_VALUE = '0'
    expect(getEnvBool('PKGSHELF_TEST_VALUE', true)).toBe(false)

    process.env.PKGSHELF_TEST_VALUE = 'maybe'
    expect(getEnvBool('PKGSHELF_TEST_VALUE')).toBeUndefined()
  })

  it('parses integers and ignores garbage', () => {
    process.env.PKGSHELF_TEST_VALUE = '9090'
    expect(getEnvNumber('PKGSHELF_TEST_VALUE')).toBe(9090)

    process.env.PKGSHELF_TEST_VALUE = 'port'
    expect(getEnvNumber('PKGSHELF_TEST_VALUE', 8080)).toBe(8080)
  })

  it('detects production', () => {
    process.env.NODE_ENV = 'production'
    expect(isProductionEnv()).toBe(true)

    process.env.NODE_ENV = 'test'
    expect(isProductionEnv()).toBe(false)
  })
})

describe('loadOptionalJson', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'pkgshelf-config-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('returns undefined for a missing file', async () => {
    expect(await loadOptionalJson('missing.json', dir)).toBeUndefined()
  })

  it('parses an existing file relative to the base dir', async () => {
    await writeFile(join(dir, 'config.json'), '{"server":{"port":9000}}')
    expect(await loadOptionalJson('config.json', dir)).toEqual({
      server: { port: 9000 },
    })
  })

  it('throws JsonFileError for malformed JSON', async () => {
    const path = join(dir, 'broken.json')
    await writeFile(path, '{ not json')
    await expect(loadOptionalJson(path)).rejects.toBeInstanceOf(JsonFileError)
  })
})
