import type {TaskOutcome, Variables} from './types.js'

const macroPattern = /\$\(([\w.-]+)\)/g

/** Environment name of a variable: `python.version` → `PYTHON_VERSION`. */
export function toEnvName(name: string): string {
  return name.replaceAll(/\W/g, '_').toUpperCase()
}

/**
 * Replaces `$(name)` macros with variable values.
 * Macros naming an undefined variable are left as written.
 */
export function expandMacros(text: string, variables: Readonly<Variables>): string {
  return text.replaceAll(macroPattern, (match, name: string) => Object.hasOwn(variables, name) ? variables[name] : match)
}

/**
 * Variables and process environment of a single job.
 *
 * Every variable is also exported to the environment under its
 * {@link toEnvName} form. Each job instance owns its own copy; nothing here
 * is shared between jobs.
 */
export class JobEnvironment {
  private readonly vars: Variables = {}
  private readonly processEnv: Record<string, string>

  constructor(baseEnv: Readonly<Record<string, string>>, variables: Readonly<Variables> = {}) {
    this.processEnv = {...baseEnv}
    this.setVariables(variables)
  }

  get variables(): Readonly<Variables> {
    return {...this.vars}
  }

  get env(): Readonly<Record<string, string>> {
    return {...this.processEnv}
  }

  /** Values may reference variables defined before them. */
  setVariable(name: string, value: string): void {
    const expanded = this.expand(value)
    this.vars[name] = expanded
    this.processEnv[toEnvName(name)] = expanded
  }

  /** Applies one layer; a name already set is overridden in place. */
  setVariables(variables: Readonly<Variables>): void {
    for (const [name, value] of Object.entries(variables)) {
      this.setVariable(name, value)
    }
  }

  setEnv(name: string, value: string): void {
    this.processEnv[name] = value
  }

  apply(outcome: TaskOutcome): void {
    this.setVariables(outcome.variables ?? {})

    for (const [name, value] of Object.entries(outcome.env ?? {})) {
      this.setEnv(name, value)
    }
  }

  expand(text: string): string {
    return expandMacros(text, this.vars)
  }

  /** A copy of the environment with step-local bindings layered on top. */
  forStep(stepEnv?: Readonly<Record<string, string>>): Record<string, string> {
    const env = {...this.processEnv}
    for (const [name, value] of Object.entries(stepEnv ?? {})) {
      env[name] = this.expand(value)
    }

    return env
  }
}
