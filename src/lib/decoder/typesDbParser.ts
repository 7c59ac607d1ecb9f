import type { TypeSchema, TypesDB } from './types'
import { parseValueKind } from './valueKinds'
import {
  CollectdError,
  MalformedSchemaLineError,
  TypesDbLineError,
  UnknownDataSourceKindError,
} from './errors'

// See types.db(5): fields are separated by blanks, data sources by commas
const FIELD_SEPARATOR = /[ \t,]+/
const LINE_BREAK = /\r?\n/

export interface TypesDbLine {
  name: string
  sources: TypeSchema[]
}

function parseDataSource(field: string): TypeSchema {
  const parts = field.split(':')
  if (parts.length !== 4) {
    throw new MalformedSchemaLineError(`Exactly 4 fields required "${field}"`)
  }

  const [name, keyword, min, max] = parts
  const kind = parseValueKind(keyword)
  if (!kind) {
    throw new UnknownDataSourceKindError(keyword.toLowerCase())
  }

  return { name, kind, min, max }
}

/** Parses one types.db definition, e.g. `load shortterm:GAUGE:0:5000,midterm:GAUGE:0:5000`. */
export function parseTypesDbLine(line: string): TypesDbLine {
  const fields = line.split(FIELD_SEPARATOR).filter((f) => f.length > 0)
  if (fields.length < 2) {
    throw new MalformedSchemaLineError(`Minimum of 2 fields required "${line}"`)
  }

  const [name, ...sources] = fields
  return { name, sources: sources.map(parseDataSource) }
}

export function parseTypesDb(input: string | Uint8Array): TypesDB {
  const text = typeof input === 'string' ? input : new TextDecoder().decode(input)
  const types: TypesDB = new Map()

  text.split(LINE_BREAK).forEach((line, i) => {
    if (line === '' || line.startsWith('#')) return

    try {
      const { name, sources } = parseTypesDbLine(line)
      types.set(name, sources)
    } catch (err) {
      if (err instanceof CollectdError) throw new TypesDbLineError(i + 1, err)
      throw err
    }
  })

  return types
}
