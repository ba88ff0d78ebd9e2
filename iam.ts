import * as aws from '@pulumi/aws'
import type { Settings } from './config.ts'
import { nm as namer } from './utils/naming.ts'
import { assumeRoleForService } from './utils/policyStatement.ts'

export interface IamRoles {
  clusterRole: aws.iam.Role
  clusterPolicyAttachments: aws.iam.RolePolicyAttachment[]
  nodeRole: aws.iam.Role
  nodePolicyAttachments: aws.iam.RolePolicyAttachment[]
}

export const createIamRoles = ({ namePrefix, cluster, nodeGroup }: Settings): IamRoles => {
  const nm = namer(namePrefix)

  // === IAM === Cluster Role ===

  const clusterRole = new aws.iam.Role(cluster.roleName, {
    assumeRolePolicy: JSON.stringify(assumeRoleForService('eks.amazonaws.com')),
    tags: {
      Name: cluster.roleName,
    },
  })
  const clusterPolicyAttachments = [
    ['cluster-policy', 'arn:aws:iam::aws:policy/AmazonEKSClusterPolicy'],
    ['cluster-vpc-policy', 'arn:aws:iam::aws:policy/AmazonEKSVPCResourceController'],
  ].map(
    ([name, policyArn]) =>
      new aws.iam.RolePolicyAttachment(nm(name), {
        role: clusterRole.name,
        policyArn,
      }),
  )

  // === IAM === Node Role ===

  const nodeRole = new aws.iam.Role(nodeGroup.roleName, {
    assumeRolePolicy: JSON.stringify(assumeRoleForService('ec2.amazonaws.com')),
    tags: {
      Name: nodeGroup.roleName,
    },
  })
  const nodePolicyAttachments = [
    ['node-policy', 'arn:aws:iam::aws:policy/AmazonEKSWorkerNodePolicy'],
    ['cni-policy', 'arn:aws:iam::aws:policy/AmazonEKS_CNI_Policy'],
    ['registry-policy', 'arn:aws:iam::aws:policy/AmazonEC2ContainerRegistryReadOnly'],
  ].map(
    ([name, policyArn]) =>
      new aws.iam.RolePolicyAttachment(nm(name), {
        role: nodeRole.name,
        policyArn,
      }),
  )

  return { clusterRole, clusterPolicyAttachments, nodeRole, nodePolicyAttachments }
}
