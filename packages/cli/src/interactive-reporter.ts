import process from 'node:process'
import {createLogUpdate} from 'log-update'
import chalk from 'chalk'
import {type Reporter, type PipelineEvent, type JobFinishedEvent, type StepFailedEvent, formatDuration} from '@stepline/core'

type DisplayStatus = 'pending' | 'running' | 'done' | 'skipped' | 'failed' | 'cancelled'

type StepDisplayState = {
  displayName: string;
  status: DisplayStatus;
  detail?: string;
}

type JobDisplayState = {
  displayName: string;
  status: DisplayStatus;
  detail?: string;
  steps: Map<string, StepDisplayState>;
}

const spinnerFrames = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏']

/**
 * Reporter with interactive terminal UI using log-update for multi-job display.
 * Suitable for local development and manual execution.
 */
export class InteractiveReporter implements Reporter {
  private static get maxStderrLines() {
    return 20
  }

  private readonly verbose: boolean
  private readonly logUpdate = createLogUpdate(process.stderr)
  private readonly jobs = new Map<string, JobDisplayState>()
  private readonly stderrBuffers = new Map<string, string[]>()
  private frame = 0
  private timer: ReturnType<typeof setInterval> | undefined

  constructor(options?: {verbose?: boolean}) {
    this.verbose = options?.verbose ?? false
  }

  emit(event: PipelineEvent): void {
    switch (event.event) {
      case 'PIPELINE_START': {
        console.error(chalk.bold(`\n▶ Pipeline: ${chalk.cyan(event.pipelineName)}\n`))
        for (const job of event.jobs) {
          this.jobs.set(job.id, {displayName: job.displayName, status: 'pending', steps: new Map()})
        }

        this.startRendering()
        break
      }

      case 'JOB_STARTING': {
        const job = this.job(event.job.id, event.job.displayName)
        job.status = 'running'
        if (event.agent) {
          job.detail = chalk.gray(` [${event.agent}]`)
        }

        for (const step of event.steps) {
          job.steps.set(step.id, {displayName: step.displayName, status: 'pending'})
        }

        break
      }

      case 'JOB_FINISHED': {
        this.handleJobFinished(event)
        break
      }

      case 'STEP_STARTING': {
        this.step(event.job.id, event.step.id, event.step.displayName).status = 'running'
        break
      }

      case 'STEP_FINISHED': {
        const step = this.step(event.job.id, event.step.id, event.step.displayName)
        step.status = 'done'
        step.detail = ` (${formatDuration(event.durationMs)})`
        this.stderrBuffers.delete(`${event.job.id}/${event.step.id}`)
        break
      }

      case 'STEP_FAILED': {
        this.handleStepFailed(event)
        break
      }

      case 'STEP_SKIPPED': {
        const step = this.step(event.job.id, event.step.id, event.step.displayName)
        step.status = 'skipped'
        step.detail = ' (previous step failed)'
        break
      }

      case 'STEP_CANCELLED': {
        this.step(event.job.id, event.step.id, event.step.displayName).status = 'cancelled'
        break
      }

      case 'PIPELINE_FINISHED': {
        this.stopRendering()
        console.error(chalk.bold.green(`\n✓ Pipeline completed (${formatDuration(event.durationMs)})\n`))
        break
      }

      case 'PIPELINE_FAILED': {
        this.stopRendering()
        this.printFailedStderr()
        console.error(chalk.bold.red(`\n✗ Pipeline failed: ${event.failedJobs.join(', ')}\n`))
        break
      }

      case 'STEP_LOG': {
        if (this.verbose) {
          const prefix = chalk.gray(`  [${event.job.id}/${event.step.id}]`)
          this.logUpdate.clear()
          console.error(`${prefix} ${event.line}`)
          this.render()
        }

        if (event.stream === 'stderr') {
          const key = `${event.job.id}/${event.step.id}`
          let buffer = this.stderrBuffers.get(key)
          if (!buffer) {
            buffer = []
            this.stderrBuffers.set(key, buffer)
          }

          buffer.push(event.line)
          if (buffer.length > InteractiveReporter.maxStderrLines) {
            buffer.shift()
          }
        }

        break
      }
    }
  }

  private job(id: string, displayName: string): JobDisplayState {
    let job = this.jobs.get(id)
    if (!job) {
      job = {displayName, status: 'pending', steps: new Map()}
      this.jobs.set(id, job)
    }

    return job
  }

  private step(jobId: string, stepId: string, displayName: string): StepDisplayState {
    const {steps} = this.job(jobId, jobId)
    let step = steps.get(stepId)
    if (!step) {
      step = {displayName, status: 'pending'}
      steps.set(stepId, step)
    }

    return step
  }

  private render(): void {
    const lines: string[] = []
    for (const job of this.jobs.values()) {
      lines.push(`  ${this.symbolFor(job.status)} ${this.textFor(job.displayName, job.status)}${job.detail ?? ''}`)
      if (job.status === 'pending' || job.status === 'done') {
        continue
      }

      for (const step of job.steps.values()) {
        lines.push(`      ${this.symbolFor(step.status)} ${this.textFor(`${step.displayName}${step.detail ?? ''}`, step.status)}`)
      }
    }

    this.logUpdate(lines.join('\n'))
    this.frame++
  }

  private symbolFor(status: DisplayStatus): string {
    switch (status) {
      case 'pending': {
        return chalk.gray('○')
      }

      case 'running': {
        return chalk.cyan(spinnerFrames[this.frame % spinnerFrames.length])
      }

      case 'done': {
        return chalk.green('✓')
      }

      case 'skipped': {
        return chalk.gray('⊙')
      }

      case 'failed': {
        return chalk.red('✗')
      }

      case 'cancelled': {
        return chalk.yellow('⊘')
      }
    }
  }

  private textFor(text: string, status: DisplayStatus): string {
    switch (status) {
      case 'pending':
      case 'skipped': {
        return chalk.gray(text)
      }

      case 'running': {
        return text
      }

      case 'done': {
        return chalk.green(text)
      }

      case 'failed': {
        return chalk.red(text)
      }

      case 'cancelled': {
        return chalk.yellow(text)
      }
    }
  }

  private startRendering(): void {
    if (!this.timer) {
      this.render()
      this.timer = setInterval(() => {
        this.render()
      }, 80)
    }
  }

  private stopRendering(): void {
    if (this.timer) {
      clearInterval(this.timer)
      this.timer = undefined
    }

    this.render()
    this.logUpdate.done()
  }

  private handleJobFinished(event: JobFinishedEvent): void {
    const job = this.job(event.job.id, event.job.displayName)
    switch (event.status) {
      case 'Succeeded': {
        job.status = 'done'
        break
      }

      case 'Failed': {
        job.status = 'failed'
        break
      }

      case 'Cancelled': {
        job.status = 'cancelled'
        break
      }
    }

    job.detail = ` (${formatDuration(event.durationMs)})`
  }

  private handleStepFailed(event: StepFailedEvent): void {
    const step = this.step(event.job.id, event.step.id, event.step.displayName)
    step.status = 'failed'
    if (event.timedOut) {
      step.detail = ' (timed out)'
    } else if (event.exitCode === undefined) {
      step.detail = event.error ? ` (${event.error.code})` : ''
    } else {
      step.detail = ` (exit ${event.exitCode})`
    }
  }

  private printFailedStderr(): void {
    for (const [jobId, job] of this.jobs) {
      for (const [stepId, step] of job.steps) {
        if (step.status !== 'failed') {
          continue
        }

        const stderr = this.stderrBuffers.get(`${jobId}/${stepId}`)
        if (stderr?.length) {
          console.error(chalk.red(`  ── ${job.displayName} › ${step.displayName} stderr ──`))
          for (const line of stderr) {
            console.error(chalk.red(`  ${line}`))
          }
        }
      }
    }
  }
}
