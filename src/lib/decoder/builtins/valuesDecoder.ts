import type { Value } from '../types'
import { valueKindFromCode } from '../valueKinds'
import {
  InvalidPacketError,
  UnknownValueTypeError,
  UnsupportedValueTypeError,
} from '../errors'

const COUNT_LENGTH = 2
const VALUE_LENGTH = 8

/**
 * Decodes the payload of a values part: a u16 count, `count` kind tags, then
 * `count` 8-byte slots in tag order. Gauges are little-endian doubles (the
 * only little-endian field on the wire); counters and derives are
 * big-endian int64.
 */
export function decodeValues(payload: Uint8Array): Value[] {
  if (payload.length < COUNT_LENGTH) {
    throw new InvalidPacketError(`values part too short (${payload.length} bytes)`)
  }

  const view = new DataView(payload.buffer, payload.byteOffset, payload.byteLength)
  const count = view.getUint16(0, false)
  const expected = COUNT_LENGTH + count * (1 + VALUE_LENGTH)
  if (payload.length !== expected) {
    throw new InvalidPacketError(
      `values length mismatch: ${count} values need ${expected} bytes, got ${payload.length}`,
    )
  }

  const values: Value[] = []
  let pos = COUNT_LENGTH + count

  for (let i = 0; i < count; i++) {
    const tag = view.getUint8(COUNT_LENGTH + i)
    const kind = valueKindFromCode(tag)

    switch (kind) {
      case 'gauge':
        values.push({ kind, value: view.getFloat64(pos, true) })
        break
      case 'counter':
      case 'derive':
        values.push({ kind, value: view.getBigInt64(pos, false) })
        break
      case 'absolute':
        throw new UnsupportedValueTypeError(tag, kind)
      case null:
        throw new UnknownValueTypeError(tag)
    }

    pos += VALUE_LENGTH
  }

  return values
}
