import * as aws from '@pulumi/aws'
import * as pulumi from '@pulumi/pulumi'
import type { Settings } from './config.ts'
import type { Network } from './network.ts'
import { nm as namer } from './utils/naming.ts'

export interface SecurityGroups {
  clusterSecurityGroup: aws.ec2.SecurityGroup
  nodeSecurityGroup: aws.ec2.SecurityGroup
}

const allowAllEgress = [
  {
    protocol: '-1',
    fromPort: 0,
    toPort: 0,
    cidrBlocks: ['0.0.0.0/0'],
  },
]

export const createSecurityGroups = ({ namePrefix, cluster }: Settings, { vpc }: Network): SecurityGroups => {
  const nm = namer(namePrefix)

  // === Security Groups === Cluster ===

  if (cluster.apiIngressCidrs.includes('0.0.0.0/0')) {
    pulumi.log.warn('The Kubernetes API security group accepts HTTPS from 0.0.0.0/0')
  }
  const clusterSecurityGroupName = nm('cluster-sg')
  const clusterSecurityGroup = new aws.ec2.SecurityGroup(clusterSecurityGroupName, {
    vpcId: vpc.id,
    description: 'Security group for EKS cluster',
    ingress: [
      {
        protocol: 'tcp',
        fromPort: 443,
        toPort: 443,
        cidrBlocks: cluster.apiIngressCidrs,
      },
    ],
    egress: allowAllEgress,
    tags: {
      Name: clusterSecurityGroupName,
    },
  })

  // === Security Groups === Worker Nodes ===

  const nodeSecurityGroupName = nm('node-sg')
  const nodeSecurityGroup = new aws.ec2.SecurityGroup(nodeSecurityGroupName, {
    vpcId: vpc.id,
    description: 'Security group for EKS worker nodes',
    ingress: [
      {
        protocol: 'tcp',
        fromPort: 1025,
        toPort: 65535,
        securityGroups: [clusterSecurityGroup.id],
      },
      {
        protocol: 'tcp',
        fromPort: 443,
        toPort: 443,
        securityGroups: [clusterSecurityGroup.id],
      },
    ],
    egress: allowAllEgress,
    tags: {
      Name: nodeSecurityGroupName,
    },
  })

  return { clusterSecurityGroup, nodeSecurityGroup }
}
