import type { DecodePacketResult, MetricIdentity, MetricSample } from './types'
import { CollectdError, InvalidPacketError } from './errors'
import { getLogger, type Logger } from '../logger'
import { decodeString, decodeUint64 } from './builtins/primitives'
import { decodeValues } from './builtins/valuesDecoder'
import { cdtimeToNanoseconds, secondsToNanoseconds } from './builtins/cdtime'
import {
  PART_HEADER_LENGTH,
  PART_HOST,
  PART_INTERVAL,
  PART_INTERVAL_HR,
  PART_PLUGIN,
  PART_PLUGIN_INSTANCE,
  PART_TIME,
  PART_TIME_HR,
  PART_TYPE,
  PART_TYPE_INSTANCE,
  PART_VALUES,
  partTypeLabel,
} from './builtins/partTypes'

export interface DecodePacketOptions {
  logger?: Pick<Logger, 'debug'>
}

interface DecodeState {
  identity: MetricIdentity
  intervalNs: bigint
  timestampNs: bigint
}

const IDENTITY_PARTS: Record<number, keyof MetricIdentity> = {
  [PART_HOST]: 'host',
  [PART_PLUGIN]: 'plugin',
  [PART_PLUGIN_INSTANCE]: 'pluginInstance',
  [PART_TYPE]: 'type',
  [PART_TYPE_INSTANCE]: 'typeInstance',
}

function initialState(): DecodeState {
  return {
    identity: { host: '', plugin: '', pluginInstance: '', type: '', typeInstance: '' },
    intervalNs: 0n,
    timestampNs: 0n,
  }
}

function snapshot(state: DecodeState, payload: Uint8Array): MetricSample {
  return {
    identity: { ...state.identity },
    intervalNs: state.intervalNs,
    timestampNs: state.timestampNs,
    values: decodeValues(payload),
  }
}

/**
 * Applies one part to the running state. Returns the sample a values part
 * produces, or null for every other part.
 */
function applyPart(
  state: DecodeState,
  partType: number,
  payload: Uint8Array,
  offset: number,
  log: Pick<Logger, 'debug'>,
): MetricSample | null {
  const identityKey = IDENTITY_PARTS[partType]
  if (identityKey) {
    state.identity[identityKey] = decodeString(payload)
    return null
  }

  switch (partType) {
    case PART_INTERVAL:
      state.intervalNs = secondsToNanoseconds(decodeUint64(payload))
      return null
    case PART_INTERVAL_HR:
      state.intervalNs = cdtimeToNanoseconds(decodeUint64(payload))
      return null
    case PART_TIME:
      state.timestampNs = secondsToNanoseconds(decodeUint64(payload))
      return null
    case PART_TIME_HR:
      state.timestampNs = cdtimeToNanoseconds(decodeUint64(payload))
      return null
    case PART_VALUES:
      return snapshot(state, payload)
    default:
      log.debug({ partType, label: partTypeLabel(partType), offset }, 'ignoring part')
      return null
  }
}

/**
 * Decodes a collectd network packet into metric samples, one per values part.
 *
 * Decoding stops at the first malformed part; the samples assembled before it
 * are returned alongside the error.
 */
export function decodePacket(data: Uint8Array, options: DecodePacketOptions = {}): DecodePacketResult {
  const log = options.logger ?? getLogger()
  const samples: MetricSample[] = []
  const view = new DataView(data.buffer, data.byteOffset, data.byteLength)
  const state = initialState()
  let pos = 0

  while (pos < data.length) {
    try {
      const remaining = data.length - pos
      if (remaining < PART_HEADER_LENGTH) {
        throw new InvalidPacketError(`truncated part header (${remaining} bytes left)`)
      }

      const partType = view.getUint16(pos, false)
      const partLength = view.getUint16(pos + 2, false)
      const payloadLength = partLength - PART_HEADER_LENGTH

      if (partLength < PART_HEADER_LENGTH + 1 || payloadLength > remaining - PART_HEADER_LENGTH) {
        throw new InvalidPacketError(`invalid part length ${partLength}`)
      }

      const payloadStart = pos + PART_HEADER_LENGTH
      const payload = data.subarray(payloadStart, payloadStart + payloadLength)
      if (payload.length !== payloadLength) {
        throw new InvalidPacketError(`invalid length: want ${payloadLength}, got ${payload.length}`)
      }

      const sample = applyPart(state, partType, payload, pos, log)
      if (sample) samples.push(sample)

      pos = payloadStart + payloadLength
    } catch (err) {
      if (err instanceof CollectdError) {
        return { samples, error: err, errorOffset: pos }
      }
      throw err
    }
  }

  return { samples, error: null, errorOffset: null }
}
