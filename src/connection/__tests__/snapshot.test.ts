import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdirSync, writeFileSync, rmSync } from 'fs'
import { join } from 'path'
import { tmpdir } from 'os'
import { z } from 'zod'
import { connectSnapshot, createSnapshotConnection } from '../snapshot.js'
import { openConnection } from '../index.js'
import { configSchema } from '../../config/schema.js'
import { HEALTHY_SNAPSHOT_PATH, loadHealthySnapshot } from '../../../tests/helpers/snapshot.js'

const TEST_DIR = join(tmpdir(), `site-health-snapshot-test-${Date.now()}`)

const siteCall = {
  name: 'Get-CMSite',
  script: 'Get-CMSite',
  schema: z.array(z.object({ SiteCode: z.string() })),
}

beforeEach(() => {
  mkdirSync(TEST_DIR, { recursive: true })
})

afterEach(() => {
  rmSync(TEST_DIR, { recursive: true, force: true })
})

describe('createSnapshotConnection', () => {
  it('returns recorded values parsed by the call schema', async () => {
    const connection = createSnapshotConnection(loadHealthySnapshot())
    await expect(connection.query(siteCall)).resolves.toEqual([{ SiteCode: 'PS1' }])
    expect(connection.kind).toBe('snapshot')
    expect(connection.target).toEqual({ siteCode: 'PS1', providerMachine: 'cm01.corp.test' })
  })

  it('refuses a call whose signal is already aborted', async () => {
    const connection = createSnapshotConnection(loadHealthySnapshot())
    const controller = new AbortController()
    controller.abort()
    await expect(connection.query(siteCall, { signal: controller.signal })).rejects.toMatchObject({
      code: 'QUERY_CANCELLED',
      message: 'Get-CMSite: cancelled',
    })
  })

  it('fails a call with no recorded value', async () => {
    const connection = createSnapshotConnection({ target: { siteCode: 'PS1', providerMachine: 'cm01' }, calls: {} })
    await expect(connection.query(siteCall)).rejects.toMatchObject({
      code: 'QUERY_FAILED',
      message: 'Get-CMSite: no recorded value in snapshot',
    })
  })

  it('replays a recorded failure', async () => {
    const connection = createSnapshotConnection({
      target: { siteCode: 'PS1', providerMachine: 'cm01' },
      calls: { 'Get-CMSite': { error: 'Access denied' } },
    })
    await expect(connection.query(siteCall)).rejects.toMatchObject({
      code: 'QUERY_FAILED',
      message: 'Get-CMSite: Access denied',
    })
  })

  it('rejects values that do not match the call schema', async () => {
    const connection = createSnapshotConnection({
      target: { siteCode: 'PS1', providerMachine: 'cm01' },
      calls: { 'Get-CMSite': [{ SiteCode: 7 }] },
    })
    await expect(connection.query(siteCall)).rejects.toMatchObject({ code: 'QUERY_UNEXPECTED_SHAPE' })
  })
})

describe('connectSnapshot', () => {
  it('loads a snapshot file', async () => {
    const connection = await connectSnapshot(HEALTHY_SNAPSHOT_PATH)
    expect(connection.target.siteCode).toBe('PS1')
  })

  it('fails the connection for a missing file', async () => {
    await expect(connectSnapshot(join(TEST_DIR, 'missing.json'))).rejects.toMatchObject({
      code: 'CONNECTION_FAILED',
    })
  })

  it('fails the connection for a malformed file', async () => {
    const path = join(TEST_DIR, 'bad.json')
    writeFileSync(path, JSON.stringify({ calls: {} }))
    await expect(connectSnapshot(path)).rejects.toMatchObject({ code: 'CONNECTION_FAILED' })
  })
})

describe('openConnection', () => {
  it('opens a snapshot connection relative to cwd', async () => {
    writeFileSync(join(TEST_DIR, 'site.json'), JSON.stringify(loadHealthySnapshot()))
    const config = configSchema.parse({ connection: { type: 'snapshot', snapshotPath: 'site.json' } })
    const connection = await openConnection(config, { cwd: TEST_DIR })
    expect(connection.kind).toBe('snapshot')
  })

  it('requires a snapshot path for snapshot connections', async () => {
    const config = configSchema.parse({ connection: { type: 'snapshot' } })
    await expect(openConnection(config)).rejects.toMatchObject({ code: 'CONFIG_INVALID' })
  })

  it('requires a site code for PowerShell connections', async () => {
    const config = configSchema.parse({})
    await expect(openConnection(config)).rejects.toMatchObject({
      code: 'CONFIG_INVALID',
      message: 'Invalid config: site.code is required',
    })
  })
})
