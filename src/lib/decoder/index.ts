export { decodePacket } from './pipeline'
export { decodeString, decodeUint64 } from './builtins/primitives'
export { decodeValues } from './builtins/valuesDecoder'
export { cdtimeToNanoseconds } from './builtins/cdtime'
export { partTypeLabel } from './builtins/partTypes'
export { parseTypesDb, parseTypesDbLine } from './typesDbParser'
export { loadTypesDbFile, loadBuiltinTypesDb, loadConfiguredTypesDb } from './typesDbLoader'
export { TypesRegistry } from './registry'
export { labelValues } from './labels'
export { formatIdentity, sampleTime } from './format'
export { VALUE_KINDS, valueKindCode, valueKindFromCode, parseValueKind } from './valueKinds'
export {
  CollectdError,
  InvalidPacketError,
  UnsupportedValueTypeError,
  UnknownValueTypeError,
  UnknownDataSourceKindError,
  MalformedSchemaLineError,
  TypesDbLineError,
} from './errors'
export { loadConfig, ConfigError } from '../config'
export { createLogger, getLogger } from '../logger'
export type { DecodePacketOptions } from './pipeline'
export type { LoadTypesDbOptions } from './typesDbLoader'
export type { TypesDbLine } from './typesDbParser'
export type { ValueKind } from './valueKinds'
export type { CollectdErrorCode } from './errors'
export type { CollectdConfig } from '../config'
export type {
  MetricIdentity,
  MetricSample,
  Value,
  DecodePacketResult,
  TypeSchema,
  TypesDB,
  LabeledValue,
} from './types'
