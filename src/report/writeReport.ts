import { mkdir, writeFile } from 'fs/promises'
import { dirname, resolve } from 'path'
import { createLogger } from '../shared/logger.js'

const logger = createLogger('report')

/**
 * Write the document, replacing any previous report at the same path
 *
 * @returns absolute path written
 */
export async function writeReport(path: string, content: string, cwd: string = process.cwd()): Promise<string> {
  const target = resolve(cwd, path)
  await mkdir(dirname(target), { recursive: true })
  await writeFile(target, content, 'utf-8')
  logger.debug(`Wrote ${content.length} chars to ${target}`)
  return target
}
