import type { TypeSchema, TypesDB } from './types'
import { parseTypesDb } from './typesDbParser'

function formatDataSource(ds: TypeSchema): string {
  return `${ds.name}:${ds.kind.toUpperCase()}:${ds.min}:${ds.max}`
}

/**
 * Type definitions by name. Custom definitions shadow built-in ones.
 */
export class TypesRegistry {
  private builtIn: TypesDB
  private custom: TypesDB = new Map()

  constructor(builtIn: TypesDB = new Map()) {
    this.builtIn = new Map(builtIn)
  }

  getType(name: string): TypeSchema[] | null {
    return this.custom.get(name) ?? this.builtIn.get(name) ?? null
  }

  getCustomNames(): string[] {
    return [...this.custom.keys()]
  }

  addCustomTypes(types: TypesDB): void {
    for (const [name, sources] of types) {
      this.custom.set(name, sources)
    }
  }

  removeCustomType(name: string): void {
    this.custom.delete(name)
  }

  removeAllCustomTypes(): void {
    this.custom.clear()
  }

  /** Renders the custom definitions as types.db text. */
  exportAll(): string {
    return [...this.custom]
      .map(([name, sources]) => `${name} ${sources.map(formatDataSource).join(', ')}`)
      .join('\n')
  }

  importAll(text: string): void {
    // parseTypesDb throws before anything is added
    this.addCustomTypes(parseTypesDb(text))
  }
}
