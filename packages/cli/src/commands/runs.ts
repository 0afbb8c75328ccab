import {resolve} from 'node:path'
import chalk from 'chalk'
import type {Command} from 'commander'
import {RunStore, formatDuration, type PipelineRunResult, type Trigger} from '@stepline/core'
import {getGlobalOptions} from '../utils.js'

function describeTrigger(trigger: Trigger): string {
  if (trigger.type === 'manual') {
    return 'manual'
  }

  return trigger.branch ? `${trigger.schedule} (${trigger.branch})` : trigger.schedule
}

function colorStatus(status: string, width = 0): string {
  const text = status.padEnd(width)
  switch (status) {
    case 'Succeeded': {
      return chalk.green(text)
    }

    case 'Failed': {
      return chalk.red(text)
    }

    case 'Cancelled': {
      return chalk.yellow(text)
    }

    default: {
      return chalk.gray(text)
    }
  }
}

function durationOf(item: {startedAt: string; finishedAt: string}): string {
  return formatDuration(Date.parse(item.finishedAt) - Date.parse(item.startedAt))
}

function printRun(run: PipelineRunResult): void {
  console.log(chalk.bold(`Run ${run.runId}`) + `  ${run.pipeline}  ${colorStatus(run.status)}  ${chalk.gray(describeTrigger(run.trigger))}`)
  for (const job of Object.values(run.jobs)) {
    console.log(`  ${colorStatus(job.status, 9)}  ${job.displayName} ${chalk.gray(`(${durationOf(job)})`)}`)
    for (const step of job.steps) {
      const detail = step.error ? chalk.gray(` ${step.error.message}`) : ''
      console.log(`      ${colorStatus(step.status, 9)}  ${step.displayName}${detail}`)
    }
  }
}

export function registerRunsCommand(program: Command): void {
  program
    .command('runs')
    .description('List recorded runs, or show one run in detail')
    .argument('[run]', 'Run ID')
    .action(async (runId: string | undefined, _options: Record<string, unknown>, cmd: Command) => {
      const {workdir, json} = getGlobalOptions(cmd)
      const store = new RunStore(resolve(workdir))

      if (runId) {
        const run = await store.loadResult(runId)
        if (json) {
          console.log(JSON.stringify(run))
          return
        }

        printRun(run)
        return
      }

      const runs = await store.list()
      if (json) {
        console.log(JSON.stringify(runs.map(run => ({runId: run.runId, pipeline: run.pipeline, status: run.status, startedAt: run.startedAt}))))
        return
      }

      if (runs.length === 0) {
        console.log(chalk.gray('No runs found.'))
        return
      }

      const idWidth = Math.max('RUN'.length, ...runs.map(run => run.runId.length))
      const nameWidth = Math.max('PIPELINE'.length, ...runs.map(run => run.pipeline.length))
      console.log(chalk.bold(`${'RUN'.padEnd(idWidth)}  ${'PIPELINE'.padEnd(nameWidth)}  ${'STATUS'.padEnd(9)}  ${'STARTED'.padEnd(24)}  DURATION  TRIGGER`))
      for (const run of runs) {
        console.log(`${run.runId.padEnd(idWidth)}  ${run.pipeline.padEnd(nameWidth)}  ${colorStatus(run.status, 9)}  ${run.startedAt.padEnd(24)}  ${durationOf(run).padStart(8)}  ${describeTrigger(run.trigger)}`)
      }
    })
}
