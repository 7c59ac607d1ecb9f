import type { LabeledValue, MetricSample } from './types'
import type { TypesRegistry } from './registry'

/**
 * Pairs each value of a sample with the data source at the same position in
 * its type's definition. Returns null when the type is unknown or the
 * definition does not match the values (count or kind).
 */
export function labelValues(sample: MetricSample, registry: TypesRegistry): LabeledValue[] | null {
  const sources = registry.getType(sample.identity.type)
  if (!sources || sources.length !== sample.values.length) return null

  const labeled: LabeledValue[] = []
  for (let i = 0; i < sources.length; i++) {
    const ds = sources[i]
    const v = sample.values[i]
    if (ds.kind !== v.kind) return null
    labeled.push({ name: ds.name, kind: ds.kind, value: v.value, min: ds.min, max: ds.max })
  }
  return labeled
}
