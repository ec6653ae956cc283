import { describe, it, expect, vi, type Mock } from 'vitest'
import { z } from 'zod'
import { buildCallScript, connectPowerShell, psQuote, toQueryError, type ScriptRunner } from '../powershell.js'
import { AppError } from '../../shared/error.js'

const PROBE_OK = JSON.stringify({ module: true, moduleError: '', drive: true })

const connection = { pwshPath: 'pwsh', modulePath: undefined }

const processorCall = {
  name: 'Get-CimInstance Win32_Processor',
  script: 'Get-CimInstance Win32_Processor',
  schema: z.array(z.object({ LoadPercentage: z.number() })),
}

/** Runner answering the probe first, then each call from the queue */
function scriptedRunner(probe: string, ...outputs: string[]): Mock<ScriptRunner> {
  const queue = [...outputs]
  return vi.fn<ScriptRunner>(async script => {
    if (script.includes('Get-PSDrive')) return probe
    const next = queue.shift()
    if (next === undefined) throw new Error('no scripted output left')
    return next
  })
}

describe('psQuote', () => {
  it('doubles embedded single quotes', () => {
    expect(psQuote("O'Brien")).toBe("'O''Brien'")
  })
})

describe('buildCallScript', () => {
  it('wraps the call so its output is one JSON document', () => {
    expect(buildCallScript('PRE', 'Get-CMSite')).toBe(
      'PRE\n$__result = @(Get-CMSite)\nConvertTo-Json -InputObject $__result -Depth 5 -Compress'
    )
  })
})

describe('connectPowerShell', () => {
  it('connects when the module loads and the site drive exists', async () => {
    const runScript = scriptedRunner(PROBE_OK)
    const conn = await connectPowerShell({ siteCode: 'PS1', connection, queryTimeoutMs: 1000, runScript })
    expect(conn.kind).toBe('powershell')
    expect(conn.target).toEqual({ siteCode: 'PS1', providerMachine: 'localhost' })
  })

  it('bounds the probe by the configured query timeout', async () => {
    const runScript = scriptedRunner(PROBE_OK)
    await connectPowerShell({ siteCode: 'PS1', connection, queryTimeoutMs: 2500, runScript })
    expect(runScript.mock.calls[0]?.[1]).toEqual({ timeoutMs: 2500 })
  })

  it('fails with CONNECTION_MODULE_MISSING when the module does not load', async () => {
    const runScript = scriptedRunner(JSON.stringify({ module: false, moduleError: 'not found', drive: false }))
    await expect(
      connectPowerShell({ siteCode: 'PS1', connection, queryTimeoutMs: 1000, runScript })
    ).rejects.toMatchObject({
      code: 'CONNECTION_MODULE_MISSING',
      message: 'ConfigurationManager module could not be loaded: not found',
    })
  })

  it('fails with CONNECTION_SITE_NOT_FOUND when the drive is missing', async () => {
    const runScript = scriptedRunner(JSON.stringify({ module: true, moduleError: '', drive: false }))
    await expect(
      connectPowerShell({ siteCode: 'XYZ', connection, queryTimeoutMs: 1000, runScript })
    ).rejects.toMatchObject({ code: 'CONNECTION_SITE_NOT_FOUND', message: 'Site drive XYZ: not found' })
  })

  it('fails with CONNECTION_FAILED when pwsh cannot run', async () => {
    const runScript: ScriptRunner = async () => {
      throw new Error('spawn pwsh ENOENT')
    }
    await expect(
      connectPowerShell({ siteCode: 'PS1', connection, queryTimeoutMs: 1000, runScript })
    ).rejects.toMatchObject({
      code: 'CONNECTION_FAILED',
      message: 'Management connection failed: connection probe: spawn pwsh ENOENT',
    })
  })

  it('fails with CONNECTION_FAILED when the probe prints garbage', async () => {
    const runScript = scriptedRunner('WARNING: something')
    await expect(
      connectPowerShell({ siteCode: 'PS1', connection, queryTimeoutMs: 1000, runScript })
    ).rejects.toMatchObject({ code: 'CONNECTION_FAILED' })
  })

  it('decodes and validates query output', async () => {
    const runScript = scriptedRunner(PROBE_OK, '[{"LoadPercentage":12}]')
    const conn = await connectPowerShell({
      siteCode: 'PS1',
      providerMachine: 'cm01',
      connection,
      queryTimeoutMs: 1000,
      runScript,
    })
    await expect(conn.query(processorCall)).resolves.toEqual([{ LoadPercentage: 12 }])

    const call = runScript.mock.calls[1]
    expect(call?.[0]).toContain("Set-Location 'PS1:'")
    expect(call?.[0]).toContain('Import-Module ConfigurationManager -ErrorAction Stop')
    expect(call?.[1]).toEqual({ timeoutMs: 1000 })
  })

  it('imports the module from an explicit path', async () => {
    const runScript = scriptedRunner(PROBE_OK, '[]')
    const conn = await connectPowerShell({
      siteCode: 'PS1',
      connection: { pwshPath: 'pwsh', modulePath: 'C:\\CM\\ConfigurationManager.psd1' },
      queryTimeoutMs: 1000,
      runScript,
    })
    await conn.query({ ...processorCall, schema: z.array(z.unknown()) })
    expect(runScript.mock.calls[1]?.[0]).toContain("Import-Module 'C:\\CM\\ConfigurationManager.psd1' -ErrorAction Stop")
  })

  it('rejects output that is not JSON', async () => {
    const runScript = scriptedRunner(PROBE_OK, 'not json')
    const conn = await connectPowerShell({ siteCode: 'PS1', connection, queryTimeoutMs: 1000, runScript })
    await expect(conn.query(processorCall)).rejects.toMatchObject({ code: 'QUERY_UNEXPECTED_SHAPE' })
  })

  it('passes the abort signal to the runner and reports the call as cancelled', async () => {
    const runScript = vi.fn<ScriptRunner>((script, { signal }) => {
      if (script.includes('Get-PSDrive')) return Promise.resolve(PROBE_OK)
      return new Promise<string>((_, reject) => {
        signal?.addEventListener('abort', () => reject(new Error('pwsh killed')), { once: true })
      })
    })
    const conn = await connectPowerShell({ siteCode: 'PS1', connection, queryTimeoutMs: 1000, runScript })
    const controller = new AbortController()

    const pending = conn.query(processorCall, { signal: controller.signal })
    controller.abort()

    await expect(pending).rejects.toMatchObject({
      code: 'QUERY_CANCELLED',
      message: 'Get-CimInstance Win32_Processor: cancelled',
    })
    expect(runScript.mock.calls[1]?.[1].signal).toBe(controller.signal)
  })

  it('does not start pwsh for an already aborted call', async () => {
    const runScript = scriptedRunner(PROBE_OK, '[]')
    const conn = await connectPowerShell({ siteCode: 'PS1', connection, queryTimeoutMs: 1000, runScript })
    const controller = new AbortController()
    controller.abort()

    await expect(conn.query(processorCall, { signal: controller.signal })).rejects.toMatchObject({
      code: 'QUERY_CANCELLED',
    })
    expect(runScript).toHaveBeenCalledTimes(1)
  })

  it('maps runner failures to QUERY_FAILED', async () => {
    const runScript = scriptedRunner(PROBE_OK)
    const conn = await connectPowerShell({ siteCode: 'PS1', connection, queryTimeoutMs: 1000, runScript })
    await expect(conn.query(processorCall)).rejects.toMatchObject({
      code: 'QUERY_FAILED',
      message: 'Get-CimInstance Win32_Processor: no scripted output left',
    })
  })
})

describe('toQueryError', () => {
  it('keeps an AppError', () => {
    const original = AppError.timeout('x', 5)
    expect(toQueryError(original, 'call', 5)).toBe(original)
  })

  it('wraps other errors as QUERY_FAILED', () => {
    const error = toQueryError(new Error('boom'), 'Get-CMSite', 1000)
    expect(error.code).toBe('QUERY_FAILED')
    expect(error.message).toBe('Get-CMSite: boom')
  })
})
