import { readFile } from 'node:fs/promises'
import { fileURLToPath } from 'node:url'
import type { TypesDB } from './types'
import { parseTypesDb } from './typesDbParser'
import { getLogger, type Logger } from '../logger'
import { loadConfig, type CollectdConfig } from '../config'

export const BUILTIN_TYPES_DB_PATH = fileURLToPath(new URL('../../../data/types.db', import.meta.url))

export interface LoadTypesDbOptions {
  logger?: Pick<Logger, 'info'>
}

export async function loadTypesDbFile(path: string, options: LoadTypesDbOptions = {}): Promise<TypesDB> {
  const types = parseTypesDb(await readFile(path))
  const log = options.logger ?? getLogger()
  log.info({ path, types: types.size }, 'loaded types.db')
  return types
}

export function loadBuiltinTypesDb(options: LoadTypesDbOptions = {}): Promise<TypesDB> {
  return loadTypesDbFile(BUILTIN_TYPES_DB_PATH, options)
}

/** Loads `COLLECTD_TYPES_DB` when configured, the bundled definitions otherwise. */
export function loadConfiguredTypesDb(
  config: Pick<CollectdConfig, 'typesDbPath'> = loadConfig(),
  options: LoadTypesDbOptions = {},
): Promise<TypesDB> {
  return config.typesDbPath ? loadTypesDbFile(config.typesDbPath, options) : loadBuiltinTypesDb(options)
}
