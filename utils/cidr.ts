export interface Cidr {
  /** Network address as an unsigned 32-bit integer. */
  network: number
  prefix: number
}

const octets = (ip: string): number[] | undefined => {
  const parts = ip.split('.')
  if (parts.length !== 4) return undefined
  const values = parts.map((part) => (/^\d{1,3}$/.test(part) ? Number.parseInt(part, 10) : Number.NaN))
  return values.every((value) => value >= 0 && value <= 255) ? values : undefined
}

const toNumber = (values: number[]): number => values.reduce((acc, value) => acc * 256 + value, 0)

export const maskOf = (prefix: number): number => (prefix === 0 ? 0 : (0xffffffff << (32 - prefix)) >>> 0)

export const parseCidr = (cidr: string): Cidr | undefined => {
  const [ip, bits, ...rest] = cidr.split('/')
  if (ip === undefined || bits === undefined || rest.length > 0 || !/^\d{1,2}$/.test(bits)) return undefined

  const prefix = Number.parseInt(bits, 10)
  const values = octets(ip)
  if (!values || prefix > 32) return undefined

  return { network: toNumber(values), prefix }
}

/** True when the address has no bits set outside the prefix, e.g. `10.0.1.0/24` but not `10.0.1.5/24`. */
export const isNetworkAligned = ({ network, prefix }: Cidr): boolean => (network & ~maskOf(prefix)) >>> 0 === 0

export const cidrContains = (outer: Cidr, inner: Cidr): boolean =>
  inner.prefix >= outer.prefix && (inner.network & maskOf(outer.prefix)) >>> 0 === outer.network

// Two aligned blocks overlap exactly when one contains the other.
export const cidrsOverlap = (a: Cidr, b: Cidr): boolean => cidrContains(a, b) || cidrContains(b, a)
