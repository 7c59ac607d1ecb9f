export type CollectdErrorCode =
  | 'INVALID_PACKET'
  | 'UNSUPPORTED_VALUE_TYPE'
  | 'UNKNOWN_VALUE_TYPE'
  | 'UNKNOWN_DATA_SOURCE_KIND'
  | 'MALFORMED_SCHEMA_LINE'

export class CollectdError extends Error {
  public readonly code: CollectdErrorCode

  constructor(code: CollectdErrorCode, message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'CollectdError'
    this.code = code
  }
}

export class InvalidPacketError extends CollectdError {
  constructor(message: string) {
    super('INVALID_PACKET', `Invalid packet: ${message}`)
    this.name = 'InvalidPacketError'
  }
}

export class UnsupportedValueTypeError extends CollectdError {
  public readonly tag: number

  constructor(tag: number, kind: string) {
    super('UNSUPPORTED_VALUE_TYPE', `Unsupported value type ${kind} (${tag})`)
    this.name = 'UnsupportedValueTypeError'
    this.tag = tag
  }
}

export class UnknownValueTypeError extends CollectdError {
  public readonly tag: number

  constructor(tag: number) {
    super('UNKNOWN_VALUE_TYPE', `Unknown value type ${tag}`)
    this.name = 'UnknownValueTypeError'
    this.tag = tag
  }
}

export class UnknownDataSourceKindError extends CollectdError {
  public readonly keyword: string

  constructor(keyword: string) {
    super('UNKNOWN_DATA_SOURCE_KIND', `Invalid data-source type "${keyword}"`)
    this.name = 'UnknownDataSourceKindError'
    this.keyword = keyword
  }
}

export class MalformedSchemaLineError extends CollectdError {
  constructor(message: string) {
    super('MALFORMED_SCHEMA_LINE', message)
    this.name = 'MalformedSchemaLineError'
  }
}

export class TypesDbLineError extends CollectdError {
  public readonly line: number

  constructor(line: number, cause: CollectdError) {
    super(cause.code, `Line ${line}: ${cause.message}`, { cause })
    this.name = 'TypesDbLineError'
    this.line = line
  }
}
