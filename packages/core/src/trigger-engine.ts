import {matchesCron, nextMatch, parseCron, type CronSchedule} from './cron.js'
import type {BranchFilter, PipelineDefinition, ScheduleDefinition, Trigger} from './types.js'

/** A pipeline run that a schedule made due. */
export type ScheduledRun = {
  pipeline: PipelineDefinition;
  schedule: ScheduleDefinition;
  branch?: string;
  /** Start of the UTC minute the schedule matched */
  scheduledAt: string;
}

export type EnqueueRun = (run: ScheduledRun) => void

type Registration = {
  key: string;
  pipeline: PipelineDefinition;
  schedule: ScheduleDefinition;
  cron: CronSchedule;
}

const minuteMs = 60_000

export function scheduledTrigger(run: ScheduledRun): Trigger {
  return {
    type: 'schedule',
    schedule: run.schedule.displayName,
    scheduledAt: run.scheduledAt,
    ...(run.branch === undefined ? {} : {branch: run.branch})
  }
}

/** Branches a schedule runs for; a single branch-less run when no branch is included. */
export function scheduleBranches(filter: BranchFilter): Array<string | undefined> {
  if (filter.include.length === 0) {
    return [undefined]
  }

  return filter.include.filter(branch => !filter.exclude.includes(branch))
}

/**
 * Evaluates the cron schedules of registered pipelines.
 *
 * The engine has no clock of its own: callers invoke {@link tick} with the
 * current time. A schedule fires at most once per UTC minute, however many
 * times that minute is ticked.
 */
export class TriggerEngine {
  private readonly registrations: Registration[] = []
  private readonly lastFired = new Map<string, number>()

  constructor(private readonly enqueue?: EnqueueRun) {}

  get size(): number {
    return this.registrations.length
  }

  /** Registers every schedule of the pipeline, replacing a previous registration under the same name. */
  register(pipeline: PipelineDefinition): void {
    this.unregister(pipeline.name)
    for (const [index, schedule] of pipeline.schedules.entries()) {
      this.registrations.push({
        key: `${pipeline.name}#${index}`,
        pipeline,
        schedule,
        cron: parseCron(schedule.cron)
      })
    }
  }

  unregister(pipelineName: string): void {
    for (let i = this.registrations.length - 1; i >= 0; i--) {
      if (this.registrations[i].pipeline.name === pipelineName) {
        this.lastFired.delete(this.registrations[i].key)
        this.registrations.splice(i, 1)
      }
    }
  }

  tick(now: Date): ScheduledRun[] {
    const minute = Math.floor(now.getTime() / minuteMs)
    const scheduledAt = new Date(minute * minuteMs).toISOString()
    const runs: ScheduledRun[] = []

    for (const {key, pipeline, schedule, cron} of this.registrations) {
      if (!matchesCron(cron, now) || this.lastFired.get(key) === minute) {
        continue
      }

      this.lastFired.set(key, minute)
      for (const branch of scheduleBranches(schedule.branches)) {
        const run: ScheduledRun = {pipeline, schedule, scheduledAt}
        if (branch !== undefined) {
          run.branch = branch
        }

        runs.push(run)
        this.enqueue?.(run)
      }
    }

    return runs
  }

  /** Next firing time of every registered schedule. */
  upcoming(after: Date): Array<{pipeline: string; schedule: string; next?: Date}> {
    return this.registrations.map(({pipeline, schedule, cron}) => ({
      pipeline: pipeline.name,
      schedule: schedule.displayName,
      next: nextMatch(cron, after)
    }))
  }
}
