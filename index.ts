import { createCluster } from './cluster.ts'
import { commonTags, loadSettings } from './config.ts'
import { setupHpa } from './hpa.ts'
import { createIamRoles } from './iam.ts'
import { createNetwork } from './network.ts'
import { createSecurityGroups } from './security.ts'
import { registerAutoTags } from './utils/autotag.ts'

const settings = loadSettings()

// Automatically inject tags.
registerAutoTags(commonTags(settings))

const network = createNetwork(settings)
const iam = createIamRoles(settings)
const securityGroups = createSecurityGroups(settings, network)
const { eksCluster, nodeGroup, kubeconfig, provider } = createCluster(settings, { network, iam, securityGroups })
const hpaStack = setupHpa(settings, provider)

// === Exports ===

export const vpcId = network.vpc.id
export const vpcCidr = network.vpc.cidrBlock
export const publicSubnetIds = network.publicSubnets.map(({ id }) => id)
export const privateSubnetIds = network.privateSubnets.map(({ id }) => id)
export const natGatewayIds = network.natGateways.map(({ id }) => id)
export const clusterName = eksCluster.name
export const clusterEndpoint = eksCluster.endpoint
export const clusterVersion = eksCluster.version
export const clusterArn = eksCluster.arn
export const clusterSecurityGroupId = securityGroups.clusterSecurityGroup.id
export const nodeSecurityGroupId = securityGroups.nodeSecurityGroup.id
export const nodeGroupId = nodeGroup.id
export const hpa = hpaStack?.outputs

export { kubeconfig }
