export {ScriptExecutor, type LogLine, type OnLogLine, type RunScriptRequest, type RunScriptResult} from './executor.js'
export {ShellExecutor} from './shell-executor.js'
