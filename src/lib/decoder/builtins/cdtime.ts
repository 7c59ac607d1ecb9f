// collectd's high-resolution time: a uint64 counting units of 2^-30 seconds
const FRACTION_BITS = 30n
const FRACTION_MASK = (1n << FRACTION_BITS) - 1n
const HALF_UNIT = 1n << (FRACTION_BITS - 1n)
const NS_PER_SECOND = 1_000_000_000n

export function cdtimeToNanoseconds(t: bigint): bigint {
  const seconds = t >> FRACTION_BITS
  const fraction = t & FRACTION_MASK
  return seconds * NS_PER_SECOND + ((fraction * NS_PER_SECOND + HALF_UNIT) >> FRACTION_BITS)
}

export function secondsToNanoseconds(seconds: bigint): bigint {
  return seconds * NS_PER_SECOND
}
