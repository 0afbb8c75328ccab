import process from 'node:process'
import {resolve} from 'node:path'
import chalk from 'chalk'
import type {Command} from 'commander'
import {ConsoleReporter, Stepline, loadEnvFiles, processEnv} from '@stepline/core'
import {InteractiveReporter} from '../interactive-reporter.js'
import {loadConfig, loadConfiguredTasks} from '../config.js'
import {exitCodeForRun} from '../exit-codes.js'
import {collect, collectMatrixFilter, getGlobalOptions, parsePositiveInt, resolvePipelineFile} from '../utils.js'

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Execute a pipeline')
    .argument('[pipeline]', 'Pipeline file or directory (default: current directory)')
    .option('-j, --job <name>', 'Run only this job (repeatable)', collect, [])
    .option('-m, --matrix-filter <variable=value>', 'Run only matrix instances with this assignment (repeatable)', collectMatrixFilter, [])
    .option('-c, --concurrency <number>', 'Max parallel job instances (default: all)', parsePositiveInt)
    .option('--env-file <path>', 'Load environment variables from a dotenv file for all jobs (repeatable)', collect, [])
    .option('--shell <shell>', 'Shell running script steps (default: bash)')
    .option('--verbose', 'Stream step logs in real-time (interactive mode)')
    .action(async (pipelineArg: string | undefined, options: {
      job: string[]; matrixFilter: Array<[string, string]>; concurrency?: number;
      envFile: string[]; shell?: string; verbose?: boolean;
    }, cmd: Command) => {
      const pipelineFile = await resolvePipelineFile(pipelineArg)
      const {workdir, json} = getGlobalOptions(cmd)
      const cwd = process.cwd()
      const config = await loadConfig(cwd)
      const reporter = json ? new ConsoleReporter() : new InteractiveReporter({verbose: options.verbose})

      const stepline = new Stepline({
        reporter,
        workdir: resolve(workdir),
        shell: options.shell ?? config.shell,
        toolCache: config.toolCache === undefined ? undefined : resolve(cwd, config.toolCache),
        tasks: await loadConfiguredTasks(config, cwd),
        cwd
      })

      const pipeline = await stepline.load(pipelineFile)
      const env = options.envFile.length > 0
        ? {...processEnv(), ...await loadEnvFiles(options.envFile)}
        : undefined

      const controller = new AbortController()
      const onSignal = () => {
        controller.abort()
      }

      process.once('SIGINT', onSignal)
      process.once('SIGTERM', onSignal)

      try {
        const result = await stepline.run(pipeline, {
          jobs: options.job,
          matrix: options.matrixFilter,
          concurrency: options.concurrency ?? config.concurrency,
          signal: controller.signal,
          env
        })

        if (json) {
          console.log(JSON.stringify({runId: result.runId, status: result.status}))
        } else {
          console.error(chalk.gray(`Run ${result.runId}`))
        }

        process.exitCode = exitCodeForRun(result)
      } finally {
        process.off('SIGINT', onSignal)
        process.off('SIGTERM', onSignal)
      }
    })
}
