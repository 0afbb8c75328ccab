import {readFile} from 'node:fs/promises'
import {basename, extname} from 'node:path'
import {deburr} from 'lodash-es'
import {parse as parseYaml, stringify as stringifyYaml} from 'yaml'
import {parseCron} from './cron.js'
import {ParseError} from './errors.js'
import {
  pythonArchitectures,
  testResultsFormats,
  type JobDefinition,
  type MatrixAxis,
  type MatrixLeg,
  type MatrixSpec,
  type PipelineDefinition,
  type PublishTestResultsStep,
  type ScheduleDefinition,
  type ScriptStep,
  type StepDefinition,
  type TaskStep,
  type Variables
} from './types.js'

const jobNamePattern = /^[A-Za-z_]\w*$/
const stepNamePattern = /^[A-Za-z_]\w*$/
const matrixKeyPattern = /^[\w.-]+$/
// Mappings list integer-like keys first, which would reorder the axes
const numericKeyPattern = /^\d+$/
const taskIdPattern = /^[\w.-]+@\d+$/

/**
 * Loads pipeline definitions from YAML or JSON.
 *
 * Unknown keys are ignored at every level so that definitions written for
 * richer CI systems still load; missing required keys fail with a
 * {@link ParseError} naming the offending job or step.
 */
export class PipelineLoader {
  async load(filePath: string): Promise<PipelineDefinition> {
    const content = await readFile(filePath, 'utf8')
    return this.parse(content, filePath)
  }

  parse(content: string, filePath: string): PipelineDefinition {
    let raw: unknown
    try {
      raw = parsePipelineFile(content, filePath)
    } catch (error) {
      throw new ParseError(`Cannot parse ${filePath}: ${error instanceof Error ? error.message : String(error)}`, {cause: error})
    }

    return this.fromObject(raw, basename(filePath).replace(/\.[^.]+$/, ''))
  }

  fromObject(value: unknown, fallbackName = 'pipeline'): PipelineDefinition {
    if (!isRecord(value)) {
      throw new ParseError('Invalid pipeline: expected a mapping at the top level')
    }

    const rawJobs: unknown = value.jobs
    if (!Array.isArray(rawJobs) || rawJobs.length === 0) {
      throw new ParseError('Invalid pipeline: jobs must be a non-empty array')
    }

    const jobs = rawJobs.map((job: unknown, index) => parseJob(job, index))
    validateUniqueJobNames(jobs)

    const rawSchedules: unknown = value.schedules ?? []
    if (!Array.isArray(rawSchedules)) {
      throw new ParseError('Invalid pipeline: schedules must be an array')
    }

    const schedules = rawSchedules.map((schedule: unknown, index) => parseSchedule(schedule, index))
    const name = typeof value.name === 'string' && value.name !== '' ? value.name : fallbackName

    return {
      name,
      variables: parseVariables(value.variables, 'pipeline'),
      jobs,
      schedules
    }
  }
}

/** Convert a free-form name into a valid identifier. */
export function slugify(name: string): string {
  return deburr(name)
    .toLowerCase()
    .replaceAll(/[^\w-]/g, '-')
    .replaceAll(/-{2,}/g, '-')
    .replace(/^-/, '')
    .replace(/-$/, '')
}

export function parsePipelineFile(content: string, filePath: string): unknown {
  const ext = extname(filePath).toLowerCase()
  if (ext === '.yaml' || ext === '.yml') {
    return parseYaml(content)
  }

  return JSON.parse(content)
}

/** Writes a definition back to YAML; loading the output yields an equal definition. */
export function serializePipeline(definition: PipelineDefinition): string {
  const document: Record<string, unknown> = {name: definition.name}
  if (Object.keys(definition.variables).length > 0) {
    document.variables = definition.variables
  }

  document.jobs = definition.jobs.map(job => jobToDocument(job))

  if (definition.schedules.length > 0) {
    document.schedules = definition.schedules.map(schedule => ({
      cron: schedule.cron,
      displayName: schedule.displayName,
      branches: {include: schedule.branches.include, exclude: schedule.branches.exclude}
    }))
  }

  return stringifyYaml(document)
}

/** Task inputs as written in a definition, typed payloads flattened back to scalars. */
export function taskInputs(step: TaskStep): Record<string, string | boolean> {
  switch (step.kind) {
    case 'publishTestResults': {
      const {testResultsFormat, testResultsFiles, searchFolder, testRunTitle} = step.inputs
      const inputs: Record<string, string> = {testResultsFormat, testResultsFiles}
      if (searchFolder !== undefined) {
        inputs.searchFolder = searchFolder
      }

      if (testRunTitle !== undefined) {
        inputs.testRunTitle = testRunTitle
      }

      return inputs
    }

    case 'usePythonVersion': {
      return {...step.inputs}
    }

    case 'task': {
      return {...step.inputs}
    }
  }
}

// -- Jobs --------------------------------------------------------------------

function parseJob(value: unknown, index: number): JobDefinition {
  if (!isRecord(value)) {
    throw new ParseError(`Invalid job #${index + 1}: expected a mapping`)
  }

  const {job: name} = value
  if (typeof name !== 'string' || name === '') {
    throw new ParseError(`Invalid job #${index + 1}: "job" name is required`)
  }

  if (!jobNamePattern.test(name)) {
    throw new ParseError(`Invalid job name '${name}': must start with a letter or underscore and contain only alphanumeric characters and underscore`)
  }

  const context = `job ${name}`
  const rawSteps: unknown = value.steps
  if (!Array.isArray(rawSteps) || rawSteps.length === 0) {
    throw new ParseError(`Invalid ${context}: steps must be a non-empty array`)
  }

  const job: JobDefinition = {
    name,
    variables: parseVariables(value.variables, context),
    matrix: parseMatrix(isRecord(value.strategy) ? value.strategy.matrix : undefined, context),
    steps: parseSteps(rawSteps, context)
  }

  const displayName = optionalString(value.displayName, `${context} displayName`)
  if (displayName !== undefined) {
    job.displayName = displayName
  }

  const vmImage = isRecord(value.pool) ? optionalString(value.pool.vmImage, `${context} pool.vmImage`) : undefined
  if (vmImage !== undefined) {
    job.vmImage = vmImage
  }

  const timeout = parseTimeout(value.timeoutInMinutes, context)
  if (timeout !== undefined) {
    job.timeoutInMinutes = timeout
  }

  return job
}

function validateUniqueJobNames(jobs: JobDefinition[]): void {
  const seen = new Set<string>()
  for (const job of jobs) {
    if (seen.has(job.name)) {
      throw new ParseError(`Duplicate job name: '${job.name}'`)
    }

    seen.add(job.name)
  }
}

function parseMatrix(value: unknown, context: string): MatrixSpec {
  const matrix: MatrixSpec = {axes: [], legs: []}
  if (value === undefined || value === null) {
    return matrix
  }

  if (!isRecord(value)) {
    throw new ParseError(`Invalid ${context}: strategy.matrix must be a mapping`)
  }

  for (const [key, entry] of Object.entries(value)) {
    if (!matrixKeyPattern.test(key)) {
      throw new ParseError(`Invalid ${context}: matrix key '${key}' must contain only alphanumeric characters, '.', '_' and '-'`)
    }

    if (numericKeyPattern.test(key)) {
      throw new ParseError(`Invalid ${context}: matrix key '${key}' must not be a plain number`)
    }

    if (isRecord(entry)) {
      matrix.legs.push(parseLeg(key, entry, context))
    } else {
      matrix.axes.push(parseAxis(key, entry, context))
    }
  }

  return matrix
}

function parseLeg(name: string, value: Record<string, unknown>, context: string): MatrixLeg {
  return {name, variables: parseVariables(value, `${context} matrix leg ${name}`)}
}

function parseAxis(name: string, value: unknown, context: string): MatrixAxis {
  const rawValues = Array.isArray(value) ? value : [value]
  if (rawValues.length === 0) {
    throw new ParseError(`Invalid ${context}: matrix axis '${name}' must have at least one value`)
  }

  const values = rawValues.map((v: unknown) => scalarToString(v, `${context} matrix axis ${name}`))
  if (new Set(values).size !== values.length) {
    throw new ParseError(`Invalid ${context}: matrix axis '${name}' has duplicate values`)
  }

  return {name, values}
}

// -- Steps -------------------------------------------------------------------

function parseSteps(values: unknown[], context: string): StepDefinition[] {
  const explicitNames = new Set<string>()
  for (const [index, value] of values.entries()) {
    const name = isRecord(value) ? optionalString(value.name, `step #${index + 1} in ${context} name`) : undefined
    if (name === undefined) {
      continue
    }

    if (!stepNamePattern.test(name)) {
      throw new ParseError(`Invalid step name '${name}' in ${context}: must start with a letter or underscore and contain only alphanumeric characters and underscore`)
    }

    if (explicitNames.has(name)) {
      throw new ParseError(`Duplicate step name '${name}' in ${context}`)
    }

    explicitNames.add(name)
  }

  const usedIds = new Set(explicitNames)
  return values.map((value, index) => parseStep(value, index, context, usedIds))
}

function parseStep(value: unknown, index: number, jobContext: string, usedIds: Set<string>): StepDefinition {
  const context = `step #${index + 1} in ${jobContext}`
  if (!isRecord(value)) {
    throw new ParseError(`Invalid ${context}: expected a mapping`)
  }

  const hasScript = value.script !== undefined && value.script !== null
  const hasTask = value.task !== undefined && value.task !== null
  if (hasScript === hasTask) {
    throw new ParseError(`Invalid ${context}: exactly one of "script" or "task" is required`)
  }

  const name = optionalString(value.name, `${context} name`)
  const displayName = optionalString(value.displayName, `${context} displayName`)
  const env = value.env === undefined ? undefined : parseVariables(value.env, `${context} env`)
  const timeoutInMinutes = parseTimeout(value.timeoutInMinutes, context)

  let step: StepDefinition
  if (hasScript) {
    const {script} = value
    if (typeof script !== 'string' || script.trim() === '') {
      throw new ParseError(`Invalid ${context}: script must be a non-empty string`)
    }

    const scriptStep: ScriptStep = {
      id: name ?? deriveStepId(displayName ?? 'script', index, usedIds),
      kind: 'script',
      script
    }

    const workingDirectory = optionalString(value.workingDirectory, `${context} workingDirectory`)
    if (workingDirectory !== undefined) {
      scriptStep.workingDirectory = workingDirectory
    }

    step = scriptStep
  } else {
    const {task} = value
    if (typeof task !== 'string' || !taskIdPattern.test(task)) {
      throw new ParseError(`Invalid ${context}: task must be an identifier with a major version, e.g. "PublishTestResults@2"`)
    }

    const id = name ?? deriveStepId(displayName ?? task, index, usedIds)
    step = parseTaskStep(id, task, parseInputs(value.inputs, context), context)
  }

  if (name !== undefined) {
    step.name = name
  }

  if (displayName !== undefined) {
    step.displayName = displayName
  }

  if (env !== undefined) {
    step.env = env
  }

  if (timeoutInMinutes !== undefined) {
    step.timeoutInMinutes = timeoutInMinutes
  }

  return step
}

function deriveStepId(label: string, index: number, usedIds: Set<string>): string {
  const base = slugify(label) || `step-${index + 1}`
  let id = base
  for (let n = 2; usedIds.has(id); n++) {
    id = `${base}-${n}`
  }

  usedIds.add(id)
  return id
}

function parseTaskStep(id: string, task: string, inputs: Record<string, string | boolean>, context: string): TaskStep {
  switch (task.toLowerCase()) {
    case 'publishtestresults@2': {
      const format = inputString(inputs.testResultsFormat ?? inputs.testRunner) ?? 'JUnit'
      const testResultsFormat = testResultsFormats.find(f => f.toLowerCase() === format.toLowerCase())
      if (!testResultsFormat) {
        throw new ParseError(`Invalid ${context}: testResultsFormat '${format}' must be one of ${testResultsFormats.join(', ')}`)
      }

      const step: PublishTestResultsStep = {
        id,
        kind: 'publishTestResults',
        task,
        inputs: {
          testResultsFormat,
          testResultsFiles: inputString(inputs.testResultsFiles) ?? '**/TEST-*.xml'
        }
      }

      const searchFolder = inputString(inputs.searchFolder)
      if (searchFolder !== undefined) {
        step.inputs.searchFolder = searchFolder
      }

      const testRunTitle = inputString(inputs.testRunTitle)
      if (testRunTitle !== undefined) {
        step.inputs.testRunTitle = testRunTitle
      }

      return step
    }

    case 'usepythonversion@0': {
      const architecture = inputString(inputs.architecture) ?? 'x64'
      const known = pythonArchitectures.find(a => a === architecture.toLowerCase())
      if (!known) {
        throw new ParseError(`Invalid ${context}: architecture '${architecture}' must be one of ${pythonArchitectures.join(', ')}`)
      }

      return {
        id,
        kind: 'usePythonVersion',
        task,
        inputs: {
          versionSpec: inputString(inputs.versionSpec) ?? '3.x',
          addToPath: parseBoolean(inputs.addToPath, `${context} addToPath`, true),
          architecture: known
        }
      }
    }

    default: {
      const generic: Record<string, string> = {}
      for (const [key, value] of Object.entries(inputs)) {
        generic[key] = String(value)
      }

      return {id, kind: 'task', task, inputs: generic}
    }
  }
}

function parseInputs(value: unknown, context: string): Record<string, string | boolean> {
  if (value === undefined || value === null) {
    return {}
  }

  if (!isRecord(value)) {
    throw new ParseError(`Invalid ${context}: inputs must be a mapping`)
  }

  const inputs: Record<string, string | boolean> = {}
  for (const [key, entry] of Object.entries(value)) {
    inputs[key] = typeof entry === 'boolean' ? entry : scalarToString(entry, `${context} input ${key}`)
  }

  return inputs
}

// -- Schedules ---------------------------------------------------------------

function parseSchedule(value: unknown, index: number): ScheduleDefinition {
  const context = `schedule #${index + 1}`
  if (!isRecord(value)) {
    throw new ParseError(`Invalid ${context}: expected a mapping`)
  }

  const {cron} = value
  if (typeof cron !== 'string' || cron.trim() === '') {
    throw new ParseError(`Invalid ${context}: cron is required`)
  }

  try {
    parseCron(cron)
  } catch (error) {
    throw new ParseError(`Invalid ${context}: ${error instanceof Error ? error.message : String(error)}`, {cause: error})
  }

  return {
    cron,
    displayName: optionalString(value.displayName, `${context} displayName`) ?? cron,
    branches: parseBranches(value.branches, context)
  }
}

function parseBranches(value: unknown, context: string): ScheduleDefinition['branches'] {
  if (value === undefined || value === null) {
    return {include: [], exclude: []}
  }

  if (Array.isArray(value)) {
    return {include: stringList(value, `${context} branches`), exclude: []}
  }

  if (!isRecord(value)) {
    throw new ParseError(`Invalid ${context}: branches must be a list or a mapping with include/exclude`)
  }

  return {
    include: stringList(value.include ?? [], `${context} branches.include`),
    exclude: stringList(value.exclude ?? [], `${context} branches.exclude`)
  }
}

// -- Serialization -----------------------------------------------------------

function jobToDocument(job: JobDefinition): Record<string, unknown> {
  const document: Record<string, unknown> = {job: job.name}
  if (job.displayName !== undefined) {
    document.displayName = job.displayName
  }

  if (job.vmImage !== undefined) {
    document.pool = {vmImage: job.vmImage}
  }

  if (Object.keys(job.variables).length > 0) {
    document.variables = job.variables
  }

  if (job.timeoutInMinutes !== undefined) {
    document.timeoutInMinutes = job.timeoutInMinutes
  }

  if (job.matrix.axes.length > 0 || job.matrix.legs.length > 0) {
    const matrix: Record<string, unknown> = {}
    for (const axis of job.matrix.axes) {
      matrix[axis.name] = axis.values
    }

    for (const leg of job.matrix.legs) {
      matrix[leg.name] = leg.variables
    }

    document.strategy = {matrix}
  }

  document.steps = job.steps.map(step => stepToDocument(step))
  return document
}

function stepToDocument(step: StepDefinition): Record<string, unknown> {
  const document: Record<string, unknown> = step.kind === 'script'
    ? {script: step.script}
    : {task: step.task, inputs: taskInputs(step)}

  if (step.name !== undefined) {
    document.name = step.name
  }

  if (step.displayName !== undefined) {
    document.displayName = step.displayName
  }

  if (step.kind === 'script' && step.workingDirectory !== undefined) {
    document.workingDirectory = step.workingDirectory
  }

  if (step.env !== undefined) {
    document.env = step.env
  }

  if (step.timeoutInMinutes !== undefined) {
    document.timeoutInMinutes = step.timeoutInMinutes
  }

  return document
}

// -- Value helpers -----------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function scalarToString(value: unknown, context: string): string {
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return String(value)
  }

  throw new ParseError(`Invalid ${context}: expected a string, number or boolean`)
}

function optionalString(value: unknown, context: string): string | undefined {
  if (value === undefined || value === null) {
    return undefined
  }

  return scalarToString(value, context)
}

function inputString(value: string | boolean | undefined): string | undefined {
  return value === undefined ? undefined : String(value)
}

function stringList(value: unknown, context: string): string[] {
  if (!Array.isArray(value)) {
    throw new ParseError(`Invalid ${context}: expected a list`)
  }

  return value.map((entry: unknown) => scalarToString(entry, context))
}

/** Accepts a mapping, or a list of `{name, value}` entries. */
function parseVariables(value: unknown, context: string): Variables {
  if (value === undefined || value === null) {
    return {}
  }

  const variables: Variables = {}
  if (Array.isArray(value)) {
    for (const entry of value) {
      const name: unknown = isRecord(entry) ? entry.name : undefined
      if (!isRecord(entry) || typeof name !== 'string') {
        throw new ParseError(`Invalid ${context} variables: list entries must have a name and a value`)
      }

      variables[name] = scalarToString(entry.value, `${context} variable ${name}`)
    }

    return variables
  }

  if (!isRecord(value)) {
    throw new ParseError(`Invalid ${context} variables: expected a mapping`)
  }

  for (const [key, entry] of Object.entries(value)) {
    variables[key] = scalarToString(entry, `${context} variable ${key}`)
  }

  return variables
}

function parseBoolean(value: string | boolean | undefined, context: string, fallback: boolean): boolean {
  if (value === undefined) {
    return fallback
  }

  if (typeof value === 'boolean') {
    return value
  }

  switch (value.toLowerCase()) {
    case 'true': {
      return true
    }

    case 'false': {
      return false
    }

    default: {
      throw new ParseError(`Invalid ${context}: expected true or false, got '${value}'`)
    }
  }
}

function parseTimeout(value: unknown, context: string): number | undefined {
  if (value === undefined || value === null) {
    return undefined
  }

  const minutes = typeof value === 'string' ? Number(value) : value
  if (typeof minutes !== 'number' || !Number.isFinite(minutes) || minutes <= 0) {
    throw new ParseError(`Invalid ${context}: timeoutInMinutes must be a positive number`)
  }

  return minutes
}
