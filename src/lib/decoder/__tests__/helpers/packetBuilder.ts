// Test-only encoder for building collectd network packets part by part.

const textEncoder = new TextEncoder()

export interface EncodedValue {
  tag: number
  value: number | bigint
}

export function part(type: number, payload: Uint8Array, declaredLength = payload.length + 4): Uint8Array {
  const out = new Uint8Array(4 + payload.length)
  const view = new DataView(out.buffer)
  view.setUint16(0, type, false)
  view.setUint16(2, declaredLength, false)
  out.set(payload, 4)
  return out
}

export function stringPart(type: number, value: string): Uint8Array {
  const bytes = textEncoder.encode(value)
  const payload = new Uint8Array(bytes.length + 1)
  payload.set(bytes)
  return part(type, payload)
}

export function uint64Part(type: number, value: bigint): Uint8Array {
  const payload = new Uint8Array(8)
  new DataView(payload.buffer).setBigUint64(0, value, false)
  return part(type, payload)
}

export function valuesPayload(values: EncodedValue[]): Uint8Array {
  const payload = new Uint8Array(2 + values.length * 9)
  const view = new DataView(payload.buffer)
  view.setUint16(0, values.length, false)
  values.forEach((v, i) => {
    view.setUint8(2 + i, v.tag)
    const slot = 2 + values.length + i * 8
    if (typeof v.value === 'number') {
      view.setFloat64(slot, v.value, true)
    } else {
      view.setBigInt64(slot, v.value, false)
    }
  })
  return payload
}

export function valuesPart(values: EncodedValue[]): Uint8Array {
  return part(0x0006, valuesPayload(values))
}

export function concat(...chunks: Uint8Array[]): Uint8Array {
  const out = new Uint8Array(chunks.reduce((n, c) => n + c.length, 0))
  let pos = 0
  for (const c of chunks) {
    out.set(c, pos)
    pos += c.length
  }
  return out
}
