import type {TaskHandler} from '../types.js'
import {publishTestResultsTask} from './publish-test-results.js'
import {usePythonVersionTask} from './use-python-version.js'

export {publishTestResultsTask} from './publish-test-results.js'
export {usePythonVersionTask, matchVersion} from './use-python-version.js'

export const defaultTasks: TaskHandler[] = [
  publishTestResultsTask,
  usePythonVersionTask
]
