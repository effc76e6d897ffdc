import { describe, it, expect, vi, beforeEach } from 'vitest'
import { existsSync, readFileSync } from 'fs'
import {
  loadDroverConfig,
  parseDroverConfig,
  applyEnvOverrides,
  getTargetFromEnv,
  getMaxConcurrencyFromEnv,
} from './drover-config.js'
import { ConfigurationError } from '../errors.js'

vi.mock('fs', () => ({
  existsSync: vi.fn(),
  readFileSync: vi.fn(),
}))

const mockExistsSync = vi.mocked(existsSync)
const mockReadFileSync = vi.mocked(readFileSync)

const MINIMAL = `apiVersion: v1
kind: DroverConfig
tracker:
  defaultRepo: web
`

describe('loadDroverConfig', () => {
  beforeEach(() => {
    vi.clearAllMocks()
  })

  it('fails when the config file is missing', () => {
    mockExistsSync.mockReturnValue(false)
    expect(() => loadDroverConfig('/srv/drover', {})).toThrow(ConfigurationError)
    expect(mockExistsSync).toHaveBeenCalledWith('/srv/drover/.drover/config.yaml')
  })

  it('fills defaults and resolves the workspace root', () => {
    mockExistsSync.mockReturnValue(true)
    mockReadFileSync.mockReturnValue(MINIMAL)

    const config = loadDroverConfig('/srv/drover', {})

    expect(config.workspace).toEqual({ root: '/srv/drover/.drover/workspaces', branchPrefix: 'agent' })
    expect(config.liveness).toMatchObject({
      pollIntervalSeconds: 30,
      nudgeAfterSeconds: 900,
      nudgeIntervalSeconds: 300,
      maxNudges: 3,
      maxRestarts: 1,
    })
    expect(config.cleanup).toEqual({ retentionHours: 72, onlyDone: true })
    expect(config.backends.default).toBe('claude')
    expect(config.pool).toEqual({ maxConcurrency: 2, target: 'any' })
    expect(config.completion).toEqual({ status: 'Done', openMergeRequest: true })
  })

  it('keeps an absolute workspace root as written', () => {
    mockExistsSync.mockReturnValue(true)
    mockReadFileSync.mockReturnValue(`${MINIMAL}workspace:\n  root: /var/lib/drover\n`)

    expect(loadDroverConfig('/srv/drover', {}).workspace.root).toBe('/var/lib/drover')
  })

  it('reports YAML syntax errors as configuration errors', () => {
    mockExistsSync.mockReturnValue(true)
    mockReadFileSync.mockReturnValue('tracker: [unclosed')

    expect(() => loadDroverConfig('/srv/drover', {})).toThrow(/Could not parse/)
  })

  it('applies environment overrides', () => {
    mockExistsSync.mockReturnValue(true)
    mockReadFileSync.mockReturnValue(MINIMAL)

    const config = loadDroverConfig('/srv/drover', {
      DROVER_MAX_CONCURRENCY: '5',
      DROVER_TARGET: 'remote',
      DROVER_REVIEWER: 'lead@example.com',
      DROVER_LOG_LEVEL: 'debug',
    })

    expect(config.pool).toEqual({ maxConcurrency: 5, target: 'remote' })
    expect(config.tracker.reviewer).toBe('lead@example.com')
    expect(config.logLevel).toBe('debug')
  })
})

describe('parseDroverConfig', () => {
  it('lists every problem', () => {
    try {
      parseDroverConfig({ apiVersion: 'v2', kind: 'DroverConfig', tracker: {} })
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError)
      expect(error).toMatchObject({
        context: {
          problems: expect.arrayContaining([
            expect.stringContaining('apiVersion'),
            expect.stringContaining('tracker.defaultRepo'),
          ]),
        },
      })
    }
  })

  it('rejects difficulty routes to unknown backends', () => {
    expect(() =>
      parseDroverConfig({
        apiVersion: 'v1',
        kind: 'DroverConfig',
        tracker: { defaultRepo: 'web' },
        backends: { difficulty: { hard: { backend: 'gemini' } } },
      })
    ).toThrow(/backends\.difficulty\.hard\.backend: no command configured for backend "gemini"/)
  })

  it('rejects unknown status keys', () => {
    expect(() =>
      parseDroverConfig({
        apiVersion: 'v1',
        kind: 'DroverConfig',
        tracker: { defaultRepo: 'web', statusNames: { Todo: 'Todo' } },
      })
    ).toThrow(ConfigurationError)
  })
})

describe('environment helpers', () => {
  it('ignores malformed values', () => {
    expect(getMaxConcurrencyFromEnv({ DROVER_MAX_CONCURRENCY: '0' })).toBeUndefined()
    expect(getMaxConcurrencyFromEnv({ DROVER_MAX_CONCURRENCY: 'many' })).toBeUndefined()
    expect(getTargetFromEnv({ DROVER_TARGET: 'cloud' })).toBeUndefined()
    expect(getTargetFromEnv({ DROVER_TARGET: ' Local ' })).toBe('local')
  })

  it('leaves the config untouched without overrides', () => {
    const config = parseDroverConfig({ apiVersion: 'v1', kind: 'DroverConfig', tracker: { defaultRepo: 'web' } })
    expect(applyEnvOverrides(config, {})).toEqual(config)
  })
})
