import { z } from 'zod'
import { defineCheck } from '../registry.js'
import type { Check } from '../types.js'
import { sqlServerHost } from './remote.js'

export const SITE_DATABASE = 'Site Database'

const sqlServiceSchema = z
  .array(z.object({ Host: z.string(), Name: z.string(), State: z.string() }))
  .min(1, 'no SQL Server service found on the site database host')

const siteSchema = z.array(z.object({ SiteCode: z.string(), SiteName: z.string().nullable(), Type: z.number() }))

export const sqlServiceCheck = defineCheck({
  section: SITE_DATABASE,
  name: 'SQL Server service',
  remoteCall: 'Get-CimInstance Win32_Service (MSSQL)',
  query: connection =>
    connection.query({
      name: 'Get-CimInstance Win32_Service (MSSQL)',
      script: [
        `$sqlHost = ${sqlServerHost(connection.target)}`,
        "Get-CimInstance -ComputerName $sqlHost -ClassName Win32_Service -Filter \"Name='MSSQLSERVER' OR Name LIKE 'MSSQL`$%'\" |",
        "  Select-Object @{ n = 'Host'; e = { $sqlHost } }, Name, State",
      ].join('\n'),
      schema: sqlServiceSchema,
    }),
  classify: services => {
    const stopped = services.filter(s => s.State !== 'Running')
    if (stopped.length > 0) {
      return {
        status: 'warning',
        note: stopped.map(s => `${s.Name} on ${s.Host} is ${s.State}`).join(', '),
      }
    }
    return {
      status: 'healthy',
      note: services.map(s => `${s.Name} on ${s.Host} running`).join(', '),
    }
  },
})

export const replicationTopologyCheck = defineCheck({
  section: SITE_DATABASE,
  name: 'Replication topology',
  remoteCall: 'Get-CMSite',
  query: connection =>
    connection.query({
      name: 'Get-CMSite',
      script: 'Get-CMSite | Select-Object SiteCode, SiteName, Type',
      schema: siteSchema,
    }),
  classify: sites => ({
    status: 'manual',
    note:
      sites.length > 1
        ? `${sites.length} sites in the hierarchy (${sites.map(s => s.SiteCode).join(', ')}); verify database replication links in the Monitoring workspace`
        : 'Standalone site; confirm no replication links are expected',
  }),
})

export const siteDatabaseChecks: Check[] = [sqlServiceCheck, replicationTopologyCheck]
