import * as aws from '@pulumi/aws'
import * as k8s from '@pulumi/kubernetes'
import * as pulumi from '@pulumi/pulumi'
import type { Settings } from './config.ts'
import type { IamRoles } from './iam.ts'
import type { Network } from './network.ts'
import type { SecurityGroups } from './security.ts'
import { nm as namer } from './utils/naming.ts'
import { objectToYaml } from './utils/yaml.ts'

export interface ClusterDependencies {
  network: Network
  iam: IamRoles
  securityGroups: SecurityGroups
}

export interface Cluster {
  eksCluster: aws.eks.Cluster
  nodeGroup: aws.eks.NodeGroup
  kubeconfig: pulumi.Output<string>
  provider: k8s.Provider
}

export interface KubeconfigParams {
  clusterName: string
  endpoint: string
  certificateAuthority: string
  region: string
}

/** Kubeconfig that authenticates through `aws eks get-token`, as `aws eks update-kubeconfig` writes it. */
export const renderKubeconfig = ({ clusterName, endpoint, certificateAuthority, region }: KubeconfigParams): string =>
  objectToYaml(
    {
      apiVersion: 'v1',
      kind: 'Config',
      clusters: [
        {
          name: clusterName,
          cluster: {
            server: endpoint,
            'certificate-authority-data': certificateAuthority,
          },
        },
      ],
      contexts: [
        {
          name: clusterName,
          context: {
            cluster: clusterName,
            user: clusterName,
          },
        },
      ],
      'current-context': clusterName,
      preferences: {},
      users: [
        {
          name: clusterName,
          user: {
            exec: {
              apiVersion: 'client.authentication.k8s.io/v1beta1',
              command: 'aws',
              args: ['eks', 'get-token', '--cluster-name', clusterName, '--region', region],
            },
          },
        },
      ],
    },
  )

export const createCluster = (
  { namePrefix, region, cluster: config, nodeGroup: nodeGroupConfig }: Settings,
  { network, iam, securityGroups }: ClusterDependencies,
): Cluster => {
  const nm = namer(namePrefix)

  // === EKS === Cluster ===

  const eksCluster = new aws.eks.Cluster(
    config.name,
    {
      name: config.name,
      version: config.version,
      roleArn: iam.clusterRole.arn,
      vpcConfig: {
        subnetIds: [...network.publicSubnets, ...network.privateSubnets].map(({ id }) => id),
        securityGroupIds: [securityGroups.clusterSecurityGroup.id],
        endpointPrivateAccess: config.endpointPrivateAccess,
        endpointPublicAccess: config.endpointPublicAccess,
      },
      tags: {
        Name: config.name,
      },
    },
    { dependsOn: iam.clusterPolicyAttachments },
  )

  // === EKS === Node Group ===

  const nodeGroup = new aws.eks.NodeGroup(
    nodeGroupConfig.name,
    {
      clusterName: eksCluster.name,
      nodeGroupName: nodeGroupConfig.name,
      nodeRoleArn: iam.nodeRole.arn,
      subnetIds: network.privateSubnets.map(({ id }) => id),
      scalingConfig: {
        desiredSize: nodeGroupConfig.desiredSize,
        minSize: nodeGroupConfig.minSize,
        maxSize: nodeGroupConfig.maxSize,
      },
      instanceTypes: [nodeGroupConfig.instanceType],
      tags: {
        Name: nodeGroupConfig.name,
      },
    },
    { dependsOn: iam.nodePolicyAttachments },
  )

  // === EKS === Kubeconfig ===

  const kubeconfig = pulumi.secret(
    pulumi
      .all([eksCluster.name, eksCluster.endpoint, eksCluster.certificateAuthority.data])
      .apply(([clusterName, endpoint, certificateAuthority]) =>
        renderKubeconfig({ clusterName, endpoint, certificateAuthority, region }),
      ),
  )
  const provider = new k8s.Provider(nm('k8s'), { kubeconfig }, { dependsOn: [nodeGroup] })

  return { eksCluster, nodeGroup, kubeconfig, provider }
}
