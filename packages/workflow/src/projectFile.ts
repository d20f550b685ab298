import { readFile, writeFile } from 'node:fs/promises'
import { TerrainError, errorMessage } from '@terrakit/utils'

/** Reads and parses a project file. Throws `FILE` when unreadable and `PARSE` on bad JSON. */
export async function readProjectFile(path: string): Promise<unknown> {
  let text: string
  try {
    text = await readFile(path, 'utf8')
  } catch (err) {
    throw new TerrainError('FILE', `Cannot read ${path}: ${errorMessage(err)}`, {
      path,
      cause: err,
    })
  }
  try {
    return JSON.parse(text)
  } catch (err) {
    throw new TerrainError('PARSE', `Invalid JSON in ${path}: ${errorMessage(err)}`, {
      path,
      cause: err,
    })
  }
}

export async function writeProjectFile(path: string, document: unknown): Promise<void> {
  try {
    await writeFile(path, JSON.stringify(document, null, 2), 'utf8')
  } catch (err) {
    throw new TerrainError('FILE', `Cannot write ${path}: ${errorMessage(err)}`, {
      path,
      cause: err,
    })
  }
}
