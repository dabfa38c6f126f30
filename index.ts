import { getCliArgs } from './src/cli/get-cli-args'
import { runExperiments } from './src/simulation/experiment'
import { Report } from './src/report/report'
import { Disk } from './src/utils/disk'
import { createLogger, resolveLogLevel } from './src/utils/logger'
import { describeError } from './src/core/errors'

/**
 *  Parse the command line, run every repetition and print the results.
 */
async function main() {
  const config = getCliArgs()
  const level = resolveLogLevel({ verbose: config.VERBOSE })
  const log = createLogger('experiment', level)
  const tickLog = createLogger('tick', level)

  log.info('config:', config)

  const summary = runExperiments(config, {
    hooks: {
      onRunStart: ({ runIndex, seed }) => log.debug(`run ${runIndex} starting with seed ${seed}`),
      onTickEnd: (progress) =>
        tickLog.debug(
          `tick ${progress.tick + 1}/${progress.numberOfTicks}: ${progress.reviewsWritten} reviews from ${progress.usersProcessed} users`
        ),
      onRunEnd: (record) => {
        const lines = Report.runSummary(record)
        if (record.status === 'failed') lines.forEach((line) => log.warn(line))
        else lines.forEach((line) => log.info(line))
        if (record.status === 'completed') record.users.forEach((line) => log.debug(Report.userLine(line)))
      },
    },
  })

  if (config.OUTPUT_DIR) {
    for (const run of summary.runs) {
      if (run.status === 'completed') await Disk.saveRunResult(config.OUTPUT_DIR, run)
    }
    const path = await Disk.saveMetrics(config.OUTPUT_DIR, summary.averages)
    log.info('saved metrics:', path)
  }

  console.log('====================== ✉️ ======================')
  Report.experimentSummary(summary).forEach((line) => console.log(line))
  console.log('====================== - ======================')

  if (summary.completed === 0) process.exitCode = 1
}

await main().catch((e) => {
  console.error('[experiment]', describeError(e))
  process.exitCode = 1
})
