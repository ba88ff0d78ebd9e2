/**
 * Network tests.
 *
 * VPC, subnets, internet and NAT gateways, route tables and associations.
 */

import { beforeAll, describe, expect, it } from 'vitest'
import { parseSettings } from './config.ts'
import { createNetwork, type Network } from './network.ts'
import { cidrContains, cidrsOverlap, parseCidr } from './utils/cidr.ts'
import { getOutputValue, getResource, getResourcesByType, whenRegistered } from './utils/testing.ts'

const resourcesOf = (network: Network) => [
  network.vpc,
  network.internetGateway,
  ...network.publicSubnets,
  ...network.privateSubnets,
  ...network.eips,
  ...network.natGateways,
  network.publicRouteTable,
  ...network.privateRouteTables,
  ...network.routes,
  ...network.routeTableAssociations,
]

const withPrefix = (type: string, prefix: string) =>
  getResourcesByType(type).filter(({ name }) => name.startsWith(`${prefix}-`))

describe('Network', () => {
  const network = createNetwork(parseSettings())

  beforeAll(async () => {
    await whenRegistered(resourcesOf(network))
  })

  describe('VPC', () => {
    it('should use the configured name and CIDR', async () => {
      expect(await getOutputValue(network.vpc.cidrBlock)).toBe('10.0.0.0/16')
      expect(getResource('aws:ec2/vpc:Vpc', 'eks-vpc')?.inputs).toEqual({
        cidrBlock: '10.0.0.0/16',
        enableDnsSupport: true,
        enableDnsHostnames: true,
        tags: { Name: 'eks-vpc' },
      })
    })
  })

  describe('Internet Gateway', () => {
    it('should attach to the VPC', () => {
      expect(getResource('aws:ec2/internetGateway:InternetGateway', 'eks-igw')?.inputs).toEqual({
        vpcId: 'eks-vpc-id',
        tags: { Name: 'eks-igw' },
      })
    })
  })

  describe('Subnets', () => {
    it('should create one public and one private subnet per availability zone', () => {
      expect(withPrefix('aws:ec2/subnet:Subnet', 'eks').map(({ name }) => name)).toEqual([
        'eks-public-subnet-1',
        'eks-public-subnet-2',
        'eks-private-subnet-1',
        'eks-private-subnet-2',
      ])
    })

    it('should map public IPs on launch in public subnets', () => {
      expect(getResource('aws:ec2/subnet:Subnet', 'eks-public-subnet-1')?.inputs).toEqual({
        vpcId: 'eks-vpc-id',
        cidrBlock: '10.0.101.0/24',
        availabilityZone: 'us-east-1a',
        mapPublicIpOnLaunch: true,
        tags: { Name: 'eks-public-subnet-1', Type: 'Public', 'kubernetes.io/role/elb': '1' },
      })
    })

    it('should keep private subnets private', () => {
      expect(getResource('aws:ec2/subnet:Subnet', 'eks-private-subnet-2')?.inputs).toEqual({
        vpcId: 'eks-vpc-id',
        cidrBlock: '10.0.2.0/24',
        availabilityZone: 'us-east-1b',
        mapPublicIpOnLaunch: false,
        tags: { Name: 'eks-private-subnet-2', Type: 'Private', 'kubernetes.io/role/internal-elb': '1' },
      })
    })

    it('should declare subnets inside the VPC that do not overlap', () => {
      const vpc = parseCidr('10.0.0.0/16')
      const blocks = withPrefix('aws:ec2/subnet:Subnet', 'eks').map(({ inputs }) => parseCidr(String(inputs.cidrBlock)))

      expect(vpc).toBeDefined()
      blocks.forEach((block, index) => {
        expect(block).toBeDefined()
        if (!vpc || !block) return
        expect(cidrContains(vpc, block)).toBe(true)
        blocks.slice(0, index).forEach((other) => {
          if (other) expect(cidrsOverlap(other, block)).toBe(false)
        })
      })
    })
  })

  describe('NAT Gateways', () => {
    it('should allocate one Elastic IP per availability zone', () => {
      expect(getResource('aws:ec2/eip:Eip', 'eks-eip-1')?.inputs).toEqual({ domain: 'vpc', tags: { Name: 'eks-eip-1' } })
      expect(withPrefix('aws:ec2/eip:Eip', 'eks')).toHaveLength(2)
    })

    it('should place each NAT gateway in the public subnet of its zone', () => {
      expect(getResource('aws:ec2/natGateway:NatGateway', 'eks-nat-gateway-2')?.inputs).toEqual({
        subnetId: 'eks-public-subnet-2-id',
        allocationId: 'eks-eip-2-id',
        connectivityType: 'public',
        tags: { Name: 'eks-nat-gateway-2' },
      })
    })
  })

  describe('Route Tables', () => {
    it('should route public traffic to the internet gateway', () => {
      expect(getResource('aws:ec2/route:Route', 'eks-public-rt-to-igw')?.inputs).toEqual({
        routeTableId: 'eks-public-rt-id',
        destinationCidrBlock: '0.0.0.0/0',
        gatewayId: 'eks-igw-id',
      })
    })

    it('should associate every public subnet with the public route table', () => {
      expect(getResource('aws:ec2/routeTableAssociation:RouteTableAssociation', 'eks-public-rta-2')?.inputs).toEqual({
        routeTableId: 'eks-public-rt-id',
        subnetId: 'eks-public-subnet-2-id',
      })
    })

    it('should route each private subnet through the NAT gateway of its zone', () => {
      expect(getResource('aws:ec2/route:Route', 'eks-private-rt-1-to-nat')?.inputs).toEqual({
        routeTableId: 'eks-private-rt-1-id',
        destinationCidrBlock: '0.0.0.0/0',
        natGatewayId: 'eks-nat-gateway-1-id',
      })
      expect(getResource('aws:ec2/route:Route', 'eks-private-rt-2-to-nat')?.inputs.natGatewayId).toBe(
        'eks-nat-gateway-2-id',
      )
      expect(getResource('aws:ec2/routeTableAssociation:RouteTableAssociation', 'eks-private-rta-2')?.inputs).toEqual({
        routeTableId: 'eks-private-rt-2-id',
        subnetId: 'eks-private-subnet-2-id',
      })
    })
  })
})

describe('Network with a single NAT gateway', () => {
  const network = createNetwork(parseSettings({ namePrefix: 'dev', vpc: { name: 'dev-vpc', singleNatGateway: true } }))

  beforeAll(async () => {
    await whenRegistered(resourcesOf(network))
  })

  it('should declare one Elastic IP and one NAT gateway', () => {
    expect(withPrefix('aws:ec2/eip:Eip', 'dev').map(({ name }) => name)).toEqual(['dev-eip-1'])
    expect(withPrefix('aws:ec2/natGateway:NatGateway', 'dev').map(({ name }) => name)).toEqual(['dev-nat-gateway-1'])
  })

  it('should route every private subnet through the shared NAT gateway', () => {
    expect(getResource('aws:ec2/route:Route', 'dev-private-rt-1-to-nat')?.inputs.natGatewayId).toBe('dev-nat-gateway-1-id')
    expect(getResource('aws:ec2/route:Route', 'dev-private-rt-2-to-nat')?.inputs.natGatewayId).toBe('dev-nat-gateway-1-id')
  })

  it('should still keep one private route table per zone', () => {
    expect(network.privateRouteTables).toHaveLength(2)
  })
})
