import process from 'node:process'
import {resolve} from 'node:path'
import type {Command} from 'commander'
import * as cron from 'node-cron'
import pino from 'pino'
import {ConsoleReporter, Stepline, TriggerEngine, scheduledTrigger, type ScheduledRun} from '@stepline/core'
import {loadConfig, loadConfiguredTasks} from '../config.js'
import {UsageError} from '../errors.js'
import {getGlobalOptions, resolvePipelineFile} from '../utils.js'

export function registerScheduleCommand(program: Command): void {
  program
    .command('schedule')
    .description('Run a pipeline on its cron schedules until interrupted')
    .argument('[pipeline]', 'Pipeline file or directory (default: current directory)')
    .option('--at <time>', 'Evaluate the schedules once at this ISO time, run what is due and exit')
    .action(async (pipelineArg: string | undefined, options: {at?: string}, cmd: Command) => {
      const {workdir} = getGlobalOptions(cmd)
      const cwd = process.cwd()
      const config = await loadConfig(cwd)
      const logger = pino({level: 'info'})

      const stepline = new Stepline({
        reporter: new ConsoleReporter(logger),
        workdir: resolve(workdir),
        shell: config.shell,
        toolCache: config.toolCache === undefined ? undefined : resolve(cwd, config.toolCache),
        tasks: await loadConfiguredTasks(config, cwd),
        cwd
      })
      const pipeline = await stepline.load(await resolvePipelineFile(pipelineArg))

      // Due runs are executed one after another, in the order they were enqueued
      let queue = Promise.resolve()
      const runScheduled = async (run: ScheduledRun) => {
        try {
          const result = await stepline.run(run.pipeline, {trigger: scheduledTrigger(run), concurrency: config.concurrency})
          logger.info({runId: result.runId, status: result.status, schedule: run.schedule.displayName, branch: run.branch}, 'scheduled run finished')
        } catch (error) {
          logger.error({err: error, schedule: run.schedule.displayName}, 'scheduled run failed')
        }
      }

      const engine = new TriggerEngine(run => {
        queue = queue.then(async () => runScheduled(run))
      })
      engine.register(pipeline)

      if (options.at) {
        const at = new Date(options.at)
        if (Number.isNaN(at.getTime())) {
          throw new UsageError(`Invalid time '${options.at}': expected an ISO 8601 date`)
        }

        const runs = engine.tick(at)
        logger.info({at: at.toISOString(), due: runs.length}, 'schedules evaluated')
        await queue
        return
      }

      for (const {schedule, next} of engine.upcoming(new Date())) {
        logger.info({pipeline: pipeline.name, schedule, next: next?.toISOString()}, 'schedule registered')
      }

      const task = cron.schedule('* * * * *', () => {
        engine.tick(new Date())
      }, {timezone: 'UTC'})

      await new Promise<void>(resolve => {
        process.once('SIGINT', () => {
          resolve()
        })
        process.once('SIGTERM', () => {
          resolve()
        })
      })

      task.stop()
      logger.info('scheduler stopped, waiting for running pipelines')
      await queue
    })
}
