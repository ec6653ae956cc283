import { z } from 'zod'
import { HEALTH_STATUSES } from '../types/healthStatus.js'

/** Site codes are three alphanumerics; they end up inside PowerShell scripts */
const siteCodeSchema = z
  .string()
  .regex(/^[A-Za-z0-9]{3}$/, 'site code must be three letters or digits')
  .transform(code => code.toUpperCase())

const hostnameSchema = z
  .string()
  .regex(/^[A-Za-z0-9]([A-Za-z0-9.-]{0,252})$/, 'provider machine must be a host name')

const hexColorSchema = z.string().regex(/^#[0-9a-fA-F]{3}([0-9a-fA-F]{3})?$/, 'expected a hex colour like #1e7e34')

const percentSchema = z.number().min(0).max(100)

export const siteConfigSchema = z.object({
  /** Site code, e.g. PS1 */
  code: siteCodeSchema.optional(),
  /** SMS provider host; defaults to the local machine */
  providerMachine: hostnameSchema.optional(),
})

export const thresholdsConfigSchema = z.object({
  /** Site server CPU load above this is a warning */
  cpuPercent: percentSchema.default(80),
  /** Site server memory used above this is a warning */
  memoryPercent: percentSchema.default(85),
  /** Any fixed drive with free space below this is a warning */
  diskFreePercent: percentSchema.default(15),
  /** Collection full evaluation longer than this is a warning */
  evaluationSeconds: z.number().nonnegative().default(300),
  /** Share of active clients below this is a warning */
  activeClientPercent: percentSchema.default(90),
  /** Site components in error above this count is a warning */
  componentErrorCount: z.number().int().nonnegative().default(0),
  /** Last successful backup older than this is a warning */
  backupAgeHours: z.number().nonnegative().default(26),
  /** Content packages still pending distribution above this is a warning */
  pendingContentCount: z.number().int().nonnegative().default(0),
})

export const outputConfigSchema = z.object({
  path: z.string().min(1).default('site-health-report.html'),
  format: z.enum(['html', 'json']).default('html'),
  title: z.string().min(1).default('Site Health Report'),
})

export const connectionConfigSchema = z.object({
  /** powershell: live site via pwsh; snapshot: recorded metrics from a JSON file */
  type: z.enum(['powershell', 'snapshot']).default('powershell'),
  pwshPath: z.string().min(1).default('pwsh'),
  /** Explicit path to ConfigurationManager.psd1 when it is not on PSModulePath */
  modulePath: z.string().optional(),
  snapshotPath: z.string().optional(),
})

export const statusStyleSchema = z.object({
  label: z.string().min(1).optional(),
  color: hexColorSchema.optional(),
  background: hexColorSchema.optional(),
})

export const styleConfigSchema = z
  .record(z.enum(HEALTH_STATUSES), statusStyleSchema)
  .default({})

export const configSchema = z.object({
  site: siteConfigSchema.default({}),
  thresholds: thresholdsConfigSchema.default({}),
  output: outputConfigSchema.default({}),
  connection: connectionConfigSchema.default({}),
  /** Per-check remote call timeout */
  queryTimeoutMs: z.number().int().positive().default(30_000),
  style: styleConfigSchema,
})

export type SiteConfig = z.infer<typeof siteConfigSchema>
export type ThresholdsConfig = z.infer<typeof thresholdsConfigSchema>
export type OutputConfig = z.infer<typeof outputConfigSchema>
export type ConnectionConfig = z.infer<typeof connectionConfigSchema>
export type StatusStyleOverride = z.infer<typeof statusStyleSchema>
export type StyleConfig = z.infer<typeof styleConfigSchema>
export type Config = z.infer<typeof configSchema>
