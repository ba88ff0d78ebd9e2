import { z } from 'zod'
import { isNetworkAligned, parseCidr } from './cidr.ts'

export const ipv4Cidr = ({ minPrefix = 0, maxPrefix = 32 } = {}) =>
  z.string().superRefine((value, ctx) => {
    const cidr = parseCidr(value)
    if (!cidr) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `'${value}' is not an IPv4 CIDR block` })
      return
    }
    if (!isNetworkAligned(cidr)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `'${value}' has host bits set` })
    }
    if (cidr.prefix < minPrefix || cidr.prefix > maxPrefix) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `'${value}' prefix must be between /${minPrefix} and /${maxPrefix}`,
      })
    }
  })

// AWS accepts /16 through /28 for both VPCs and subnets
export const vpcCidr = () => ipv4Cidr({ minPrefix: 16, maxPrefix: 28 })

// lowercase alphanumerics and '-', starting and ending with an alphanumeric
export const dnsLabel = () =>
  z
    .string()
    .max(63)
    .regex(/^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/, 'must be a DNS-1123 label')

export const eksClusterName = () =>
  z
    .string()
    .min(1)
    .max(100)
    .regex(/^[0-9A-Za-z][A-Za-z0-9\-_]*$/, 'must start with an alphanumeric and contain only alphanumerics, - and _')

export const kubernetesVersion = () => z.string().regex(/^\d+\.\d+$/, "must look like '<major>.<minor>'")
