// Part type codes from collectd's src/network.h
export const PART_HOST = 0x0000
export const PART_TIME = 0x0001
export const PART_PLUGIN = 0x0002
export const PART_PLUGIN_INSTANCE = 0x0003
export const PART_TYPE = 0x0004
export const PART_TYPE_INSTANCE = 0x0005
export const PART_VALUES = 0x0006
export const PART_INTERVAL = 0x0007
export const PART_TIME_HR = 0x0008
export const PART_INTERVAL_HR = 0x0009

// Notifications and the signed/encrypted envelopes are recognised for
// diagnostics only; the decoder skips them.
export const PART_MESSAGE = 0x0100
export const PART_SEVERITY = 0x0101
export const PART_SIGNATURE = 0x0200
export const PART_ENCRYPTION = 0x0210

export const PART_HEADER_LENGTH = 4

const PART_TYPES: Record<number, string> = {
  [PART_HOST]: 'HOST',
  [PART_TIME]: 'TIME',
  [PART_PLUGIN]: 'PLUGIN',
  [PART_PLUGIN_INSTANCE]: 'PLUGIN_INSTANCE',
  [PART_TYPE]: 'TYPE',
  [PART_TYPE_INSTANCE]: 'TYPE_INSTANCE',
  [PART_VALUES]: 'VALUES',
  [PART_INTERVAL]: 'INTERVAL',
  [PART_TIME_HR]: 'TIME_HR',
  [PART_INTERVAL_HR]: 'INTERVAL_HR',
  [PART_MESSAGE]: 'MESSAGE',
  [PART_SEVERITY]: 'SEVERITY',
  [PART_SIGNATURE]: 'SIGNATURE',
  [PART_ENCRYPTION]: 'ENCRYPTION',
}

export function partTypeLabel(partType: number): string {
  const name = PART_TYPES[partType] ?? 'UNKNOWN'
  return `${name} (0x${partType.toString(16).padStart(4, '0')})`
}
