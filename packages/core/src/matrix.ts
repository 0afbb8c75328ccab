import {upperFirst} from 'lodash-es'
import type {JobDefinition, JobInstance, PipelineDefinition, Variables} from './types.js'

export type InstanceFilter = {
  /** Job names to keep; empty or absent keeps every job. */
  jobs?: string[];
  /** `[variable, value]` pairs the instance assignment must all match. */
  matrix?: Array<[string, string]>;
}

type Combination = {
  label: string;
  assignment: Variables;
}

/** `python.version` + `3.7` → `Python37`. */
export function axisLabel(axisName: string, value: string): string {
  const [head] = axisName.split('.')
  return upperFirst(head) + value.replaceAll(/[^A-Za-z\d]/g, '')
}

/**
 * Expands a job into its instances: the cartesian product of the axes in
 * declared order (first axis varying slowest), followed by the explicit legs.
 * A job without a matrix yields a single instance named after the job.
 */
export function expandJob(job: JobDefinition): JobInstance[] {
  const {axes, legs} = job.matrix
  const title = job.displayName ?? job.name

  if (axes.length === 0 && legs.length === 0) {
    return [{id: job.name, displayName: title, job, assignment: {}}]
  }

  const combinations: Combination[] = []

  if (axes.length > 0) {
    let partial: Array<{labels: string[]; assignment: Variables}> = [{labels: [], assignment: {}}]
    for (const axis of axes) {
      partial = partial.flatMap(({labels, assignment}) => axis.values.map(value => ({
        labels: [...labels, axisLabel(axis.name, value)],
        assignment: {...assignment, [axis.name]: value}
      })))
    }

    for (const {labels, assignment} of partial) {
      combinations.push({label: labels.join('-'), assignment})
    }
  }

  for (const leg of legs) {
    combinations.push({label: leg.name, assignment: {...leg.variables}})
  }

  const usedIds = new Set<string>()
  return combinations.map(({label, assignment}) => {
    const base = `${job.name}.${label}`
    let id = base
    for (let n = 2; usedIds.has(id); n++) {
      id = `${base}-${n}`
    }

    usedIds.add(id)
    return {id, displayName: `${title} (${label})`, job, label, assignment}
  })
}

/** Every instance of every job, in declaration order. */
export function expandPipeline(pipeline: PipelineDefinition): JobInstance[] {
  return pipeline.jobs.flatMap(job => expandJob(job))
}

export function filterInstances(instances: JobInstance[], filter: InstanceFilter): JobInstance[] {
  const jobs = filter.jobs ?? []
  const matrix = filter.matrix ?? []

  return instances.filter(instance => {
    if (jobs.length > 0 && !jobs.includes(instance.job.name)) {
      return false
    }

    return matrix.every(([name, value]) => instance.assignment[name] === value)
  })
}
