import chalk from 'chalk'
import type {Command} from 'commander'
import {PipelineLoader, expandPipeline, nextMatch, parseCron} from '@stepline/core'
import {getGlobalOptions, resolvePipelineFile} from '../utils.js'

export function registerValidateCommand(program: Command): void {
  program
    .command('validate')
    .description('Check a pipeline definition and list its job instances and schedules')
    .argument('[pipeline]', 'Pipeline file or directory (default: current directory)')
    .action(async (pipelineArg: string | undefined, _options: Record<string, unknown>, cmd: Command) => {
      const {json} = getGlobalOptions(cmd)
      const pipeline = await new PipelineLoader().load(await resolvePipelineFile(pipelineArg))
      const instances = expandPipeline(pipeline)
      const now = new Date()
      const schedules = pipeline.schedules.map(schedule => ({
        displayName: schedule.displayName,
        cron: schedule.cron,
        branches: schedule.branches.include,
        next: nextMatch(parseCron(schedule.cron), now)?.toISOString()
      }))

      if (json) {
        console.log(JSON.stringify({
          pipeline: pipeline.name,
          instances: instances.map(instance => ({id: instance.id, displayName: instance.displayName, assignment: instance.assignment})),
          schedules
        }))
        return
      }

      console.log(chalk.bold(`Pipeline ${chalk.cyan(pipeline.name)}: ${instances.length} job instance${instances.length === 1 ? '' : 's'}`))
      const idWidth = Math.max(...instances.map(instance => instance.id.length))
      for (const instance of instances) {
        console.log(`  ${instance.id.padEnd(idWidth)}  ${chalk.gray(`${instance.job.steps.length} steps`)}  ${instance.displayName}`)
      }

      if (schedules.length > 0) {
        console.log(chalk.bold('\nSchedules:'))
        for (const schedule of schedules) {
          const branches = schedule.branches.length > 0 ? ` on ${schedule.branches.join(', ')}` : ''
          console.log(`  ${schedule.cron.padEnd(15)}  ${schedule.displayName}${branches}  ${chalk.gray(`next: ${schedule.next ?? 'never'}`)}`)
        }
      }
    })
}
