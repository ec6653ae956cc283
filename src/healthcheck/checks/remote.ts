/**
 * PowerShell snippets shared by the catalogue checks
 */

import type { SiteTarget } from '../../connection/types.js'
import { psQuote } from '../../connection/powershell.js'

export function siteNamespace(target: SiteTarget): string {
  return `root/SMS/site_${target.siteCode}`
}

export interface CimQuery {
  className: string
  namespace?: string
  filter?: string
  /** Select-Object property list; calculated properties allowed */
  select: string[]
}

export function cimQuery(computerName: string, query: CimQuery): string {
  const parts = [
    'Get-CimInstance',
    `-ComputerName ${psQuote(computerName)}`,
    query.namespace ? `-Namespace ${psQuote(query.namespace)}` : '',
    `-ClassName ${query.className}`,
    query.filter ? `-Filter ${psQuote(query.filter)}` : '',
  ].filter(Boolean)
  return `${parts.join(' ')} | Select-Object ${query.select.join(', ')}`
}

/** Host of the site database, from the SQL Server site role */
export function sqlServerHost(target: SiteTarget): string {
  return `((Get-CMSiteRole -SiteCode ${psQuote(target.siteCode)} -RoleName 'SMS SQL Server' | Select-Object -First 1).NetworkOSPath -replace '^\\\\\\\\', '')`
}
