/**
 * `site-health run` end to end, in process, against a snapshot
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdirSync, readFileSync, rmSync, writeFileSync } from 'fs'
import { join } from 'path'
import { tmpdir } from 'os'
import { buildOverrides, executeRun } from '../src/cli/commands/run.js'
import { createProgram } from '../src/cli/program.js'
import { printCatalogue } from '../src/cli/commands/checks.js'
import { CheckRegistry, defineCheck, defineManualCheck } from '../src/healthcheck/registry.js'
import { createSnapshotConnection } from '../src/connection/snapshot.js'
import { CONFIG_FILENAME } from '../src/config/loadConfig.js'
import { HEALTHY_SNAPSHOT_PATH, snapshotWith } from './helpers/snapshot.js'

const TEST_DIR = join(tmpdir(), `site-health-run-test-${Date.now()}`)
const HOME_DIR = join(TEST_DIR, 'home')
const PROJECT_DIR = join(TEST_DIR, 'project')

const deps = { cwd: PROJECT_DIR, home: HOME_DIR, env: {}, now: () => new Date(2026, 0, 15, 9, 30, 0) }

beforeEach(() => {
  mkdirSync(HOME_DIR, { recursive: true })
  mkdirSync(PROJECT_DIR, { recursive: true })
  vi.spyOn(console, 'log').mockImplementation(() => {})
  vi.spyOn(console, 'error').mockImplementation(() => {})
  vi.spyOn(console, 'warn').mockImplementation(() => {})
})

afterEach(() => {
  vi.restoreAllMocks()
  rmSync(TEST_DIR, { recursive: true, force: true })
})

describe('executeRun', () => {
  it('writes the report and exits 0', async () => {
    const code = await executeRun({ snapshot: HEALTHY_SNAPSHOT_PATH, output: 'out.html' }, deps)
    expect(code).toBe(0)
    expect(readFileSync(join(PROJECT_DIR, 'out.html'), 'utf-8')).toContain('<h1>Site Health Report</h1>')
  })

  it('exits 0 with critical rows unless --strict is set', async () => {
    const failing = snapshotWith({ 'Get-CMSoftwareUpdateSyncStatus': { error: 'Access denied' } })
    const connect = async () => createSnapshotConnection(failing)

    expect(await executeRun({ output: 'r.html', siteCode: 'PS1' }, { ...deps, connect })).toBe(0)
    expect(await executeRun({ output: 'r.html', siteCode: 'PS1', strict: true }, { ...deps, connect })).toBe(2)
  })

  it('exits 1 and writes the error page when the connection fails', async () => {
    const code = await executeRun(
      { output: 'r.html', siteCode: 'PS1' },
      {
        ...deps,
        connect: async () => {
          throw new Error('pwsh exited with code 1')
        },
      }
    )
    expect(code).toBe(1)
    expect(readFileSync(join(PROJECT_DIR, 'r.html'), 'utf-8')).toContain('The report could not be generated.')
  })

  it('exits 1 on an invalid config without writing a report', async () => {
    writeFileSync(join(PROJECT_DIR, CONFIG_FILENAME), 'thresholds:\n  memoryPercent: -5\n')
    const code = await executeRun({ output: 'r.html' }, deps)
    expect(code).toBe(1)
    expect(() => readFileSync(join(PROJECT_DIR, 'r.html'))).toThrow()
  })

  it('exits 1 on an invalid --format', async () => {
    expect(await executeRun({ snapshot: HEALTHY_SNAPSHOT_PATH, format: 'pdf' }, deps)).toBe(1)
  })
})

describe('buildOverrides', () => {
  it('maps flags onto config keys', () => {
    expect(
      buildOverrides({ siteCode: 'PS1', provider: 'cm01', output: 'r.json', format: 'json', snapshot: 's.json' })
    ).toEqual({
      site: { code: 'PS1', providerMachine: 'cm01' },
      output: { path: 'r.json', format: 'json' },
      connection: { type: 'snapshot', snapshotPath: 's.json' },
    })
  })

  it('is empty without flags', () => {
    expect(buildOverrides({ strict: true })).toEqual({})
  })
})

describe('printCatalogue', () => {
  it('labels checks by their manual flag rather than their remote call', () => {
    const registry = new CheckRegistry()
      .register(
        defineCheck({
          section: 'Boundaries',
          name: 'Named none',
          remoteCall: 'none',
          query: async () => 1,
          classify: () => ({ status: 'healthy', note: 'ok' }),
        })
      )
      .register(defineManualCheck({ section: 'Boundaries', name: 'Coverage', instruction: 'Check the groups' }))

    printCatalogue(registry)

    const lines = vi.mocked(console.log).mock.calls.map(call => String(call[0]))
    const automated = lines.find(line => line.includes('Named none'))
    const manual = lines.find(line => line.includes('Coverage'))
    expect(automated).not.toContain('manual')
    expect(manual).toContain('manual')
  })
})

describe('createProgram', () => {
  it('registers run, checks and init', () => {
    const names = createProgram().commands.map(c => c.name())
    expect(names).toEqual(['run', 'checks', 'init'])
  })
})
