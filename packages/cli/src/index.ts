#!/usr/bin/env -S node --import tsx
import 'dotenv/config'
import process from 'node:process'
import chalk from 'chalk'
import {Command, CommanderError} from 'commander'
import {registerLogsCommand} from './commands/logs.js'
import {registerRunCommand} from './commands/run.js'
import {registerRunsCommand} from './commands/runs.js'
import {registerScheduleCommand} from './commands/schedule.js'
import {registerValidateCommand} from './commands/validate.js'
import {exitCodeForError} from './exit-codes.js'

async function main() {
  const program = new Command()

  program
    .name('stepline')
    .description('Pipeline execution engine for declarative CI definitions')
    .version('0.1.0')
    .option('--workdir <path>', 'Run store root directory', process.env.STEPLINE_WORKDIR ?? './.stepline')
    .option('--json', 'Output structured JSON logs')
    .exitOverride()

  registerRunCommand(program)
  registerValidateCommand(program)
  registerScheduleCommand(program)
  registerRunsCommand(program)
  registerLogsCommand(program)

  await program.parseAsync()
}

try {
  await main()
} catch (error: unknown) {
  if (!(error instanceof CommanderError)) {
    console.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`))
  }

  process.exitCode = exitCodeForError(error)
}
