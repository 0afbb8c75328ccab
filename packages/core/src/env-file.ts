import {readFile} from 'node:fs/promises'
import {parse} from 'dotenv'
import {ParseError} from './errors.js'

/** Loads dotenv files in order; later files override earlier ones. */
export async function loadEnvFiles(filePaths: string[]): Promise<Record<string, string>> {
  const env: Record<string, string> = {}
  for (const filePath of filePaths) {
    let content: string
    try {
      content = await readFile(filePath, 'utf8')
    } catch (error) {
      throw new ParseError(`Cannot read env file ${filePath}`, {cause: error})
    }

    Object.assign(env, parse(content))
  }

  return env
}
