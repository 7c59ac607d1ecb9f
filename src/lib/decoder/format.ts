import type { MetricIdentity, MetricSample } from './types'

const NS_PER_MS = 1_000_000n

/** `host/plugin[-instance]/type[-instance]`, the identifier collectd uses in file names and logs. */
export function formatIdentity(identity: MetricIdentity): string {
  let name = `${identity.host}/${identity.plugin}`
  if (identity.pluginInstance) name += `-${identity.pluginInstance}`
  name += `/${identity.type}`
  if (identity.typeInstance) name += `-${identity.typeInstance}`
  return name
}

export function sampleTime(sample: MetricSample): Date {
  return new Date(Number(sample.timestampNs / NS_PER_MS))
}
