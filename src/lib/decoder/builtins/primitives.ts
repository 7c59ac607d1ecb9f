import { InvalidPacketError } from '../errors'

// Keeps a leading BOM; invalid UTF-8 sequences decode to U+FFFD
const textDecoder = new TextDecoder('utf-8', { ignoreBOM: true })

export function decodeUint64(payload: Uint8Array): bigint {
  if (payload.length !== 8) {
    throw new InvalidPacketError(`expected 8 byte integer, got ${payload.length} bytes`)
  }
  const view = new DataView(payload.buffer, payload.byteOffset, payload.byteLength)
  return view.getBigUint64(0, false)
}

export function decodeString(payload: Uint8Array): string {
  if (payload.length === 0 || payload[payload.length - 1] !== 0) {
    throw new InvalidPacketError('string is not null-terminated')
  }
  return textDecoder.decode(payload.subarray(0, payload.length - 1))
}
