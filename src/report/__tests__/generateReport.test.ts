import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdirSync, readFileSync, rmSync, writeFileSync, existsSync } from 'fs'
import { join } from 'path'
import { tmpdir } from 'os'
import { generateReport, exitCodeFor, type GenerateOutcome } from '../generateReport.js'
import { writeReport } from '../writeReport.js'
import { formatReportForTerminal } from '../formatTerminal.js'
import { parseConfig } from '../../config/loadConfig.js'
import { createSnapshotConnection } from '../../connection/snapshot.js'
import { AppError } from '../../shared/error.js'
import { HEALTHY_SNAPSHOT_PATH, loadHealthySnapshot, snapshotWith } from '../../../tests/helpers/snapshot.js'

const TEST_DIR = join(tmpdir(), `site-health-generate-test-${Date.now()}`)
const fixedNow = () => new Date(2026, 0, 15, 9, 30, 0)

beforeEach(() => {
  mkdirSync(TEST_DIR, { recursive: true })
})

afterEach(() => {
  rmSync(TEST_DIR, { recursive: true, force: true })
})

describe('generateReport', () => {
  it('writes an HTML report for a reachable site', async () => {
    const config = parseConfig({
      connection: { type: 'snapshot', snapshotPath: HEALTHY_SNAPSHOT_PATH },
      output: { path: 'reports/ps1.html' },
    })

    const outcome = await generateReport({ config, cwd: TEST_DIR, now: fixedNow })

    expect(outcome.kind).toBe('report')
    expect(outcome.outputPath).toBe(join(TEST_DIR, 'reports/ps1.html'))
    const html = readFileSync(outcome.outputPath, 'utf-8')
    expect(html).toContain('<h1>Site Health Report</h1>')
    expect(html.match(/<tr class="status-/g)).toHaveLength(16)
  })

  it('writes JSON when configured', async () => {
    const config = parseConfig({ output: { path: 'ps1.json', format: 'json' } })

    const outcome = await generateReport({
      config,
      cwd: TEST_DIR,
      now: fixedNow,
      connect: async () => createSnapshotConnection(loadHealthySnapshot()),
    })

    const document: unknown = JSON.parse(readFileSync(join(TEST_DIR, 'ps1.json'), 'utf-8'))
    expect(outcome.kind).toBe('report')
    expect(document).toMatchObject({ summary: { total: 16, healthy: 12, manual: 4 } })
  })

  it('replaces a stale report with an error page when the connection fails', async () => {
    const outputPath = join(TEST_DIR, 'site-health-report.html')
    writeFileSync(outputPath, '<tr class="status-healthy">stale</tr>')
    const config = parseConfig({ site: { code: 'PS1' } })

    const outcome = await generateReport({
      config,
      cwd: TEST_DIR,
      now: fixedNow,
      connect: async () => {
        throw AppError.moduleMissing('not installed')
      },
    })

    expect(outcome.kind).toBe('fatal')
    const html = readFileSync(outputPath, 'utf-8')
    expect(html).toContain(
      '<p class="error">CONNECTION_MODULE_MISSING: ConfigurationManager module could not be loaded: not installed</p>'
    )
    expect(html).not.toContain('stale')
    expect(html).not.toContain('<tr')
  })

  it('writes a JSON error document in json mode', async () => {
    const config = parseConfig({ site: { code: 'PS1' }, output: { path: 'r.json', format: 'json' } })

    await generateReport({
      config,
      cwd: TEST_DIR,
      now: fixedNow,
      connect: async () => {
        throw new Error('spawn pwsh ENOENT')
      },
    })

    const document: unknown = JSON.parse(readFileSync(join(TEST_DIR, 'r.json'), 'utf-8'))
    expect(document).toMatchObject({
      target: { siteCode: 'PS1', providerMachine: null },
      error: { code: 'ERR_FILE_NOT_FOUND', message: 'spawn pwsh ENOENT' },
    })
  })

  it('still reports every check when some queries fail', async () => {
    const config = parseConfig({ output: { path: 'r.html' } })
    const snapshot = snapshotWith({
      'Get-CMSite': { error: 'Access denied' },
      'Get-CimInstance Win32_Processor': undefined,
    })

    const outcome = await generateReport({
      config,
      cwd: TEST_DIR,
      now: fixedNow,
      connect: async () => createSnapshotConnection(snapshot),
    })

    if (outcome.kind !== 'report') throw new Error('expected a report')
    expect(outcome.report.summary).toEqual({ healthy: 11, warning: 0, critical: 2, manual: 3, unknown: 0, total: 16 })
    expect(outcome.report.hasFailed).toBe(true)
  })
})

describe('exitCodeFor', () => {
  const report = (hasFailed: boolean): GenerateOutcome => ({
    kind: 'report',
    outputPath: '/tmp/r.html',
    report: {
      generatedAt: fixedNow(),
      target: { siteCode: 'PS1', providerMachine: 'cm01' },
      sections: [],
      summary: { healthy: 0, warning: 0, critical: hasFailed ? 1 : 0, manual: 0, unknown: 0, total: hasFailed ? 1 : 0 },
      hasFailed,
      hasWarning: false,
    },
  })

  it('is 0 for any produced report by default', () => {
    expect(exitCodeFor(report(true))).toBe(0)
  })

  it('is 2 under --strict when a row failed', () => {
    expect(exitCodeFor(report(true), true)).toBe(2)
    expect(exitCodeFor(report(false), true)).toBe(0)
  })

  it('is 1 when no report was produced', () => {
    expect(exitCodeFor({ kind: 'fatal', error: AppError.siteNotFound('PS1'), outputPath: '/tmp/r.html' })).toBe(1)
  })
})

describe('writeReport', () => {
  it('creates missing directories and returns the absolute path', async () => {
    const path = await writeReport('a/b/report.html', '<html></html>', TEST_DIR)
    expect(path).toBe(join(TEST_DIR, 'a/b/report.html'))
    expect(existsSync(path)).toBe(true)
  })
})

describe('formatReportForTerminal', () => {
  it('lists sections and the status totals', async () => {
    const config = parseConfig({ output: { path: 'r.html' } })
    const outcome = await generateReport({
      config,
      cwd: TEST_DIR,
      now: fixedNow,
      connect: async () => createSnapshotConnection(loadHealthySnapshot()),
    })
    if (outcome.kind !== 'report') throw new Error('expected a report')

    const text = formatReportForTerminal(outcome.report)
    expect(text).toContain('Site PS1 (cm01.corp.test)')
    expect(text).toContain('Generated 2026-01-15 09:30:00')
    expect(text).toContain('Client Health')
    expect(text).toContain('12 healthy')
    expect(text).toContain('4 manual')
  })
})
