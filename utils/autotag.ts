import * as pulumi from '@pulumi/pulumi'

export type Tags = Record<string, string>

// AWS resource types declared by this program that accept a `tags` map.
const taggableResourceTypes = new Set([
  'aws:ec2/eip:Eip',
  'aws:ec2/internetGateway:InternetGateway',
  'aws:ec2/natGateway:NatGateway',
  'aws:ec2/routeTable:RouteTable',
  'aws:ec2/securityGroup:SecurityGroup',
  'aws:ec2/subnet:Subnet',
  'aws:ec2/vpc:Vpc',
  'aws:eks/cluster:Cluster',
  'aws:eks/nodeGroup:NodeGroup',
  'aws:iam/role:Role',
])

export const isTaggable = (type: string): boolean => taggableResourceTypes.has(type)

/** Merges the automatic tags under the resource's own tags, so explicit values win. */
export const withAutoTags = (props: pulumi.Inputs, autoTags: Tags): pulumi.Inputs => ({
  ...props,
  tags: pulumi.Output.isInstance<Tags | undefined>(props.tags)
    ? props.tags.apply((tags) => ({ ...autoTags, ...tags }))
    : { ...autoTags, ...props.tags },
})

export const registerAutoTags = (autoTags: Tags): void => {
  pulumi.runtime.registerStackTransformation((args) => {
    if (!isTaggable(args.type)) return undefined
    return { props: withAutoTags(args.props, autoTags), opts: args.opts }
  })
}
