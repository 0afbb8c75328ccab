import process from 'node:process'
import {resolve} from 'node:path'
import type {Command} from 'commander'
import {RunStore} from '@stepline/core'
import {getGlobalOptions} from '../utils.js'

export function registerLogsCommand(program: Command): void {
  program
    .command('logs')
    .description('Show the log of a job instance from a recorded run')
    .argument('<run>', 'Run ID')
    .argument('<job>', 'Job instance ID (e.g. Test.Python37)')
    .action(async (runId: string, jobId: string, _options: Record<string, unknown>, cmd: Command) => {
      const {workdir} = getGlobalOptions(cmd)
      const store = new RunStore(resolve(workdir))
      process.stdout.write(await store.readJobLog(runId, jobId))
    })
}
