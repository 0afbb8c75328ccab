import {access, constants} from 'node:fs/promises'
import {relative, resolve} from 'node:path'
import fg from 'fast-glob'
import {ArtifactNotFoundError, TaskError} from '../errors.js'
import type {TaskHandler} from '../types.js'

/** Splits a `testResultsFiles` input into glob patterns. */
export function splitPatterns(value: string): string[] {
  return value.split(/[\n,]/).map(pattern => pattern.trim()).filter(Boolean)
}

export const publishTestResultsTask: TaskHandler = {
  id: 'PublishTestResults@2',

  async run(step, context) {
    if (step.kind !== 'publishTestResults') {
      throw new TaskError('INVALID_TASK_STEP', `Task "PublishTestResults@2" cannot run step ${step.id}`)
    }

    const {inputs} = step
    const searchFolder = resolve(context.workingDirectory, context.expand(inputs.searchFolder ?? '.'))
    const patterns = splitPatterns(context.expand(inputs.testResultsFiles))

    const files = await fg(patterns, {
      cwd: searchFolder,
      absolute: true,
      onlyFiles: true,
      unique: true
    })

    if (files.length === 0) {
      throw new ArtifactNotFoundError(`No test result files matching ${patterns.join(', ')} under ${searchFolder}`)
    }

    files.sort()
    const title = inputs.testRunTitle === undefined ? undefined : context.expand(inputs.testRunTitle)

    for (const filePath of files) {
      try {
        await access(filePath, constants.R_OK)
      } catch (error) {
        throw new ArtifactNotFoundError(`Test result file is not readable: ${filePath}`, {cause: error})
      }

      await context.publisher.publish({
        runId: context.runId,
        jobId: context.job.id,
        stepId: context.step.id,
        format: inputs.testResultsFormat,
        filePath,
        ...(title === undefined ? {} : {title})
      })
      context.log(`Published ${inputs.testResultsFormat} results: ${relative(searchFolder, filePath)}`)
    }

    return {}
  }
}
