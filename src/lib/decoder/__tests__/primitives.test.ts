import { describe, it, expect } from 'vitest'
import { decodeString, decodeUint64 } from '../builtins/primitives'
import { InvalidPacketError } from '../errors'

describe('decodeUint64', () => {
  it('decodes 8 big-endian bytes', () => {
    const bytes = new Uint8Array([0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x03, 0xe8])
    expect(decodeUint64(bytes)).toBe(1000n)
  })

  it('keeps the full unsigned range', () => {
    expect(decodeUint64(new Uint8Array(8).fill(0xff))).toBe(0xffffffffffffffffn)
  })

  it('reads from a subarray at its own offset', () => {
    const buf = new Uint8Array([0xaa, 0, 0, 0, 0, 0, 0, 0, 0x0a, 0xbb])
    expect(decodeUint64(buf.subarray(1, 9))).toBe(10n)
  })

  it.each([0, 4, 7, 9])('rejects a %i byte payload', (length) => {
    expect(() => decodeUint64(new Uint8Array(length))).toThrow(InvalidPacketError)
  })
})

describe('decodeString', () => {
  it('drops the null terminator', () => {
    expect(decodeString(new Uint8Array([0x63, 0x70, 0x75, 0x00]))).toBe('cpu')
  })

  it('decodes a lone terminator as the empty string', () => {
    expect(decodeString(new Uint8Array([0x00]))).toBe('')
  })

  it('keeps a leading byte order mark', () => {
    const decoded = decodeString(new Uint8Array([0xef, 0xbb, 0xbf, 0x68, 0x00]))
    expect(decoded).toBe('\uFEFFh')
    expect(decoded).toHaveLength(2)
  })

  it('maps invalid UTF-8 bytes to the replacement character', () => {
    expect(decodeString(new Uint8Array([0xe9, 0x00]))).toBe('\uFFFD')
    expect(decodeString(new Uint8Array([0x61, 0xff, 0x62, 0x00]))).toBe('a\uFFFDb')
  })

  it('rejects a payload without terminator', () => {
    expect(() => decodeString(new Uint8Array([0x63, 0x70, 0x75]))).toThrow(
      'Invalid packet: string is not null-terminated',
    )
  })

  it('rejects an empty payload', () => {
    expect(() => decodeString(new Uint8Array(0))).toThrow(InvalidPacketError)
  })
})
