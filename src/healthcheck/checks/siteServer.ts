import { z } from 'zod'
import { AppError } from '../../shared/error.js'
import { defineCheck } from '../registry.js'
import { aboveThreshold, belowThreshold, formatPercent, percentOf } from '../classify.js'
import type { Check } from '../types.js'
import { cimQuery } from './remote.js'

export const SITE_SERVER = 'Site Server'

const CORE_SERVICES = ['SMS_EXECUTIVE', 'SMS_SITE_COMPONENT_MANAGER'] as const

const processorSchema = z
  .array(z.object({ DeviceID: z.string(), LoadPercentage: z.number().nullable() }))
  .min(1)

const operatingSystemSchema = z.tuple([
  z.object({ TotalVisibleMemorySize: z.number().positive(), FreePhysicalMemory: z.number().nonnegative() }),
])

const logicalDiskSchema = z.array(
  z.object({ DeviceID: z.string(), Size: z.number().nullable(), FreeSpace: z.number().nullable() })
)

const serviceSchema = z.array(z.object({ Name: z.string(), State: z.string() }))

export const cpuLoadCheck = defineCheck({
  section: SITE_SERVER,
  name: 'CPU load',
  remoteCall: 'Get-CimInstance Win32_Processor',
  query: async connection => {
    const processors = await connection.query({
      name: 'Get-CimInstance Win32_Processor',
      script: cimQuery(connection.target.providerMachine, {
        className: 'Win32_Processor',
        select: ['DeviceID', 'LoadPercentage'],
      }),
      schema: processorSchema,
    })
    // WMI reports null while a processor has no sample yet
    const loads = processors.flatMap(p => (p.LoadPercentage === null ? [] : [p.LoadPercentage]))
    if (loads.length === 0) {
      throw AppError.unexpectedShape('Get-CimInstance Win32_Processor', 'no processor reported a load')
    }
    return loads
  },
  classify: (loads, thresholds) => {
    const average = loads.reduce((sum, load) => sum + load, 0) / loads.length
    const status = aboveThreshold(average, thresholds.cpuPercent)
    return {
      status,
      note: `Average CPU load ${formatPercent(average)} across ${loads.length} processor(s) (threshold ${thresholds.cpuPercent}%)`,
    }
  },
})

export const memoryUsageCheck = defineCheck({
  section: SITE_SERVER,
  name: 'Memory usage',
  remoteCall: 'Get-CimInstance Win32_OperatingSystem',
  query: async connection => {
    const [os] = await connection.query({
      name: 'Get-CimInstance Win32_OperatingSystem',
      script: cimQuery(connection.target.providerMachine, {
        className: 'Win32_OperatingSystem',
        select: ['TotalVisibleMemorySize', 'FreePhysicalMemory'],
      }),
      schema: operatingSystemSchema,
    })
    return percentOf(os.TotalVisibleMemorySize - os.FreePhysicalMemory, os.TotalVisibleMemorySize)
  },
  classify: (usedPercent, thresholds) => ({
    status: aboveThreshold(usedPercent, thresholds.memoryPercent),
    note: `Memory in use ${formatPercent(usedPercent)} (threshold ${thresholds.memoryPercent}%)`,
  }),
})

export const diskFreeSpaceCheck = defineCheck({
  section: SITE_SERVER,
  name: 'Disk free space',
  remoteCall: 'Get-CimInstance Win32_LogicalDisk',
  query: async connection => {
    const disks = await connection.query({
      name: 'Get-CimInstance Win32_LogicalDisk',
      script: cimQuery(connection.target.providerMachine, {
        className: 'Win32_LogicalDisk',
        filter: 'DriveType=3',
        select: ['DeviceID', 'Size', 'FreeSpace'],
      }),
      schema: logicalDiskSchema,
    })
    const drives = disks.flatMap(disk =>
      disk.Size && disk.Size > 0
        ? [{ drive: disk.DeviceID, freePercent: percentOf(disk.FreeSpace ?? 0, disk.Size) }]
        : []
    )
    if (drives.length === 0) {
      throw AppError.unexpectedShape('Get-CimInstance Win32_LogicalDisk', 'no fixed drives with a size were reported')
    }
    return drives
  },
  classify: (drives, thresholds) => {
    const low = drives.filter(d => belowThreshold(d.freePercent, thresholds.diskFreePercent) === 'warning')
    if (low.length > 0) {
      return {
        status: 'warning',
        note: `Low free space: ${low.map(d => `${d.drive} ${formatPercent(d.freePercent)}`).join(', ')} (threshold ${thresholds.diskFreePercent}%)`,
      }
    }
    const lowest = Math.min(...drives.map(d => d.freePercent))
    return {
      status: 'healthy',
      note: `${drives.length} drive(s), lowest free space ${formatPercent(lowest)} (threshold ${thresholds.diskFreePercent}%)`,
    }
  },
})

export const coreServicesCheck = defineCheck({
  section: SITE_SERVER,
  name: 'Core services',
  remoteCall: 'Get-CimInstance Win32_Service (site services)',
  query: connection =>
    connection.query({
      name: 'Get-CimInstance Win32_Service (site services)',
      script: cimQuery(connection.target.providerMachine, {
        className: 'Win32_Service',
        filter: CORE_SERVICES.map(name => `Name='${name}'`).join(' OR '),
        select: ['Name', 'State'],
      }),
      schema: serviceSchema,
    }),
  classify: services => {
    const problems = CORE_SERVICES.flatMap(name => {
      const service = services.find(s => s.Name.toUpperCase() === name)
      if (!service) return [`${name} not installed`]
      return service.State === 'Running' ? [] : [`${name} ${service.State}`]
    })
    if (problems.length > 0) {
      return { status: 'warning', note: problems.join(', ') }
    }
    return { status: 'healthy', note: `${CORE_SERVICES.join(', ')} running` }
  },
})

export const siteServerChecks: Check[] = [cpuLoadCheck, memoryUsageCheck, diskFreeSpaceCheck, coreServicesCheck]
