import { mkdir, writeFile } from 'fs/promises'
import { dirname, join } from 'path'
import type { CompletedRun } from '../simulation/experiment'
import type { MetricRecord } from '../analysis/metrics'
import { createLogger } from './logger'

const log = createLogger('disk')

/**
 *  ## Disk
 *
 *  Shared utilities for reading and saving files to disk.
 */
export namespace Disk {
  /**
   *  Simple help for saving JSON, parent directories are created.
   */
  export async function saveJsonFile<T extends {}>(filePath: string, jsonData: T): Promise<string> {
    await mkdir(dirname(filePath), { recursive: true })
    await writeFile(filePath, JSON.stringify(jsonData, null, 2))
    log.debug('saved:', filePath)
    return filePath
  }

  /**
   *  Save the run result and its dense matrices under the output directory.
   */
  export async function saveRunResult(outputDir: string, run: CompletedRun): Promise<string[]> {
    const prefix = join(outputDir, `run-${run.runIndex}-seed-${run.seed}`)
    return Promise.all([
      saveJsonFile(`${prefix}.json`, run),
      saveJsonFile(`${prefix}-reviews.json`, run.reviewMatrix),
      saveJsonFile(`${prefix}-utilities.json`, run.utilityMatrix),
    ])
  }

  export async function saveMetrics(outputDir: string, averages: MetricRecord): Promise<string> {
    return saveJsonFile(join(outputDir, 'metrics.json'), averages)
  }
}
