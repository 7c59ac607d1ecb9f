import type { ValueKind } from './valueKinds'
import type { CollectdError } from './errors'

export interface MetricIdentity {
  host: string
  plugin: string
  pluginInstance: string
  type: string
  typeInstance: string
}

export type Value =
  | { kind: 'gauge'; value: number }
  | { kind: 'counter' | 'derive'; value: bigint }

export interface MetricSample {
  identity: MetricIdentity
  intervalNs: bigint      // 0n until an interval part is seen
  timestampNs: bigint     // nanoseconds since the Unix epoch, 0n until a time part is seen
  values: Value[]
}

export interface DecodePacketResult {
  samples: MetricSample[]  // everything assembled before `error`, if any
  error: CollectdError | null
  errorOffset: number | null  // offset of the part that failed
}

export interface TypeSchema {
  name: string
  kind: ValueKind
  min: string  // kept as text: 'U' and similar sentinels are legal
  max: string
}

export type TypesDB = Map<string, TypeSchema[]>

export interface LabeledValue {
  name: string
  kind: ValueKind
  value: number | bigint
  min: string
  max: string
}
