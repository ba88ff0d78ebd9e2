import { Config } from '@pulumi/pulumi'
import { z } from 'zod'
import { cidrContains, cidrsOverlap, parseCidr } from './utils/cidr.ts'
import { dnsLabel, eksClusterName, ipv4Cidr, kubernetesVersion, vpcCidr } from './utils/refiners.ts'
import type { Tags } from './utils/autotag.ts'

const defaults = {
  tags: {
    CreatedBy: 'Pulumi',
  },
  labels: {
    ManagedBy: 'Pulumi',
    Component: 'HPA',
  },
  pod: {
    resources: {
      requests: {
        cpu: '100m',
        memory: '128Mi',
      },
      limits: {
        cpu: '500m',
        memory: '512Mi',
      },
    },
  },
  metricsServer: {
    chart: 'metrics-server',
    version: '3.12.1',
    namespace: 'kube-system',
    repo: 'https://kubernetes-sigs.github.io/metrics-server/',
    args: ['--kubelet-insecure-tls', '--kubelet-preferred-address-types=InternalIP'],
  },
}

const count = () => z.number().int()
const percent = () => count().min(1).max(100)

const vpcSchema = z.object({
  name: z.string().min(1).default('eks-vpc'),
  cidr: vpcCidr().default('10.0.0.0/16'),
  availabilityZones: z.array(z.string().min(1)).min(2).default(['us-east-1a', 'us-east-1b']),
  publicSubnetCidrs: z.array(vpcCidr()).default(['10.0.101.0/24', '10.0.102.0/24']),
  privateSubnetCidrs: z.array(vpcCidr()).default(['10.0.1.0/24', '10.0.2.0/24']),
  singleNatGateway: z.boolean().default(false),
})

const clusterSchema = z.object({
  name: eksClusterName().default('eks-cluster'),
  version: kubernetesVersion().default('1.28'),
  roleName: z.string().min(1).default('eks-cluster-role'),
  endpointPrivateAccess: z.boolean().default(true),
  endpointPublicAccess: z.boolean().default(true),
  apiIngressCidrs: z.array(ipv4Cidr()).min(1).default(['0.0.0.0/0']),
})

const nodeGroupSchema = z.object({
  name: z.string().min(1).default('eks-node-group'),
  desiredSize: count().min(0).default(2),
  minSize: count().min(0).default(1),
  maxSize: count().min(1).default(4),
  instanceType: z.string().min(1).default('t3.medium'),
  roleName: z.string().min(1).default('eks-node-role'),
})

const hpaSchema = z.object({
  enabled: z.boolean().default(true),
  minReplicas: count().min(1).default(2),
  maxReplicas: count().min(1).default(10),
  cpuThreshold: percent().default(70),
  memoryThreshold: percent().default(80),
})

const demoAppSchema = z.object({
  namespace: dnsLabel().default('default'),
  name: dnsLabel().default('demo-app'),
  image: z.string().min(1).default('nginx:latest'),
  replicas: count().min(0).default(2),
  port: count().min(1).max(65535).default(80),
})

export const settingsSchema = z
  .object({
    environment: z.string().min(1).default('dev'),
    project: z.string().min(1).default('eks-project'),
    namePrefix: z.string().min(1).default('eks'),
    region: z.string().min(1).default('us-east-1'),
    vpc: vpcSchema.default({}),
    cluster: clusterSchema.default({}),
    nodeGroup: nodeGroupSchema.default({}),
    hpa: hpaSchema.default({}),
    demoApp: demoAppSchema.default({}),
  })
  .superRefine(({ region, vpc, cluster, nodeGroup, hpa }, ctx) => {
    const { availabilityZones } = vpc

    if (new Set(availabilityZones).size !== availabilityZones.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['vpc', 'availabilityZones'],
        message: 'must not contain duplicates',
      })
    }
    availabilityZones.forEach((az, index) => {
      if (!az.startsWith(region)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['vpc', 'availabilityZones', index],
          message: `'${az}' is not in region '${region}'`,
        })
      }
    })

    const tiers = [
      ['publicSubnetCidrs', vpc.publicSubnetCidrs],
      ['privateSubnetCidrs', vpc.privateSubnetCidrs],
    ] as const
    for (const [key, cidrs] of tiers) {
      if (cidrs.length !== availabilityZones.length) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['vpc', key],
          message: `expected ${availabilityZones.length} entries, one per availability zone, got ${cidrs.length}`,
        })
      }
    }

    // malformed blocks were already reported by the field schemas
    const vpcBlock = parseCidr(vpc.cidr)
    const subnets = tiers.flatMap(([key, cidrs]) =>
      cidrs.flatMap((cidr, index) => {
        const block = parseCidr(cidr)
        return block ? [{ path: ['vpc', key, index], cidr, block }] : []
      }),
    )

    subnets.forEach((subnet, index) => {
      if (vpcBlock && !cidrContains(vpcBlock, subnet.block)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: subnet.path,
          message: `'${subnet.cidr}' is not inside the VPC CIDR '${vpc.cidr}'`,
        })
      }
      const overlapping = subnets.slice(0, index).find((other) => cidrsOverlap(other.block, subnet.block))
      if (overlapping) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: subnet.path,
          message: `'${subnet.cidr}' overlaps '${overlapping.cidr}'`,
        })
      }
    })

    // both roles are aws:iam/role:Role resources named after their role name
    if (cluster.roleName === nodeGroup.roleName) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['nodeGroup', 'roleName'],
        message: `must differ from cluster.roleName ('${cluster.roleName}')`,
      })
    }

    if (nodeGroup.desiredSize < nodeGroup.minSize || nodeGroup.desiredSize > nodeGroup.maxSize) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['nodeGroup', 'desiredSize'],
        message: `must be between minSize (${nodeGroup.minSize}) and maxSize (${nodeGroup.maxSize})`,
      })
    }

    if (hpa.minReplicas > hpa.maxReplicas) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['hpa', 'minReplicas'],
        message: `must not exceed maxReplicas (${hpa.maxReplicas})`,
      })
    }
  })

export type RawSettings = z.input<typeof settingsSchema>
export type Settings = z.output<typeof settingsSchema>

const formatIssues = (error: z.ZodError): string =>
  error.issues.map(({ path, message }) => `  ${path.length ? path.join('.') : '(root)'}: ${message}`).join('\n')

export const parseSettings = (raw: RawSettings = {}): Settings => {
  const result = settingsSchema.safeParse(raw)
  if (!result.success) throw new Error(`Invalid stack configuration:\n${formatIssues(result.error)}`)

  return result.data
}

export const readRawSettings = (): RawSettings => {
  const projectConfig = new Config()
  const awsConfig = new Config('aws')
  const vpcConfig = new Config('vpc')
  const clusterConfig = new Config('cluster')
  const nodeGroupConfig = new Config('nodeGroup')
  const hpaConfig = new Config('hpa')
  const demoAppConfig = new Config('demoApp')

  return {
    environment: projectConfig.get('environment'),
    project: projectConfig.get('project'),
    namePrefix: projectConfig.get('namePrefix'),
    region: awsConfig.get('region'),
    vpc: {
      name: vpcConfig.get('name'),
      cidr: vpcConfig.get('cidr'),
      availabilityZones: vpcConfig.getObject<string[]>('availabilityZones'),
      publicSubnetCidrs: vpcConfig.getObject<string[]>('publicSubnetCidrs'),
      privateSubnetCidrs: vpcConfig.getObject<string[]>('privateSubnetCidrs'),
      singleNatGateway: vpcConfig.getBoolean('singleNatGateway'),
    },
    cluster: {
      name: clusterConfig.get('name'),
      version: clusterConfig.get('version'),
      roleName: clusterConfig.get('roleName'),
      endpointPrivateAccess: clusterConfig.getBoolean('endpointPrivateAccess'),
      endpointPublicAccess: clusterConfig.getBoolean('endpointPublicAccess'),
      apiIngressCidrs: clusterConfig.getObject<string[]>('apiIngressCidrs'),
    },
    nodeGroup: {
      name: nodeGroupConfig.get('name'),
      desiredSize: nodeGroupConfig.getNumber('desiredSize'),
      minSize: nodeGroupConfig.getNumber('minSize'),
      maxSize: nodeGroupConfig.getNumber('maxSize'),
      instanceType: nodeGroupConfig.get('instanceType'),
      roleName: nodeGroupConfig.get('roleName'),
    },
    hpa: {
      enabled: hpaConfig.getBoolean('enabled'),
      minReplicas: hpaConfig.getNumber('minReplicas'),
      maxReplicas: hpaConfig.getNumber('maxReplicas'),
      cpuThreshold: hpaConfig.getNumber('cpuThreshold'),
      memoryThreshold: hpaConfig.getNumber('memoryThreshold'),
    },
    demoApp: {
      namespace: demoAppConfig.get('namespace'),
      name: demoAppConfig.get('name'),
      image: demoAppConfig.get('image'),
      replicas: demoAppConfig.getNumber('replicas'),
      port: demoAppConfig.getNumber('port'),
    },
  }
}

export const loadSettings = (): Settings => parseSettings(readRawSettings())

export const commonTags = ({ environment, project }: Settings): Tags => ({
  Environment: environment,
  Project: project,
  ...defaults.tags,
})

export { defaults }
