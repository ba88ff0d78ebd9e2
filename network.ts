import * as aws from '@pulumi/aws'
import * as pulumi from '@pulumi/pulumi'
import type { Settings } from './config.ts'
import { nm as namer } from './utils/naming.ts'

export interface Network {
  vpc: aws.ec2.Vpc
  internetGateway: aws.ec2.InternetGateway
  publicSubnets: aws.ec2.Subnet[]
  privateSubnets: aws.ec2.Subnet[]
  eips: aws.ec2.Eip[]
  natGateways: aws.ec2.NatGateway[]
  publicRouteTable: aws.ec2.RouteTable
  privateRouteTables: aws.ec2.RouteTable[]
  routes: aws.ec2.Route[]
  routeTableAssociations: aws.ec2.RouteTableAssociation[]
}

export const createNetwork = ({ namePrefix, vpc: config }: Settings): Network => {
  const nm = namer(namePrefix)

  // === VPC ===

  const vpc = new aws.ec2.Vpc(config.name, {
    cidrBlock: config.cidr,
    enableDnsSupport: true,
    enableDnsHostnames: true,
    tags: {
      Name: config.name,
    },
  })

  // === VPC === Internet Gateway ===

  const internetGatewayName = nm('igw')
  const internetGateway = new aws.ec2.InternetGateway(internetGatewayName, {
    vpcId: vpc.id,
    tags: {
      Name: internetGatewayName,
    },
  })

  // === VPC === Subnets ===

  const publicSubnets = config.availabilityZones.map((az, index) => {
    const subnetName = nm(`public-subnet-${index + 1}`)
    return new aws.ec2.Subnet(subnetName, {
      vpcId: vpc.id,
      cidrBlock: config.publicSubnetCidrs[index],
      availabilityZone: az,
      mapPublicIpOnLaunch: true,
      tags: {
        Name: subnetName,
        Type: 'Public',
        'kubernetes.io/role/elb': '1',
      },
    })
  })
  const privateSubnets = config.availabilityZones.map((az, index) => {
    const subnetName = nm(`private-subnet-${index + 1}`)
    return new aws.ec2.Subnet(subnetName, {
      vpcId: vpc.id,
      cidrBlock: config.privateSubnetCidrs[index],
      availabilityZone: az,
      mapPublicIpOnLaunch: false,
      tags: {
        Name: subnetName,
        Type: 'Private',
        'kubernetes.io/role/internal-elb': '1',
      },
    })
  })

  // === VPC === NAT Gateways ===

  if (config.singleNatGateway) {
    pulumi.log.info(`All private subnets route through a single NAT gateway in ${config.availabilityZones[0]}`)
  }
  const natSubnets = config.singleNatGateway ? publicSubnets.slice(0, 1) : publicSubnets
  const eips = natSubnets.map((_, index) => {
    const eipName = nm(`eip-${index + 1}`)
    return new aws.ec2.Eip(eipName, {
      domain: 'vpc',
      tags: {
        Name: eipName,
      },
    })
  })
  const natGateways = natSubnets.map((subnet, index) => {
    const natGatewayName = nm(`nat-gateway-${index + 1}`)
    return new aws.ec2.NatGateway(
      natGatewayName,
      {
        subnetId: subnet.id,
        allocationId: eips[index].id,
        connectivityType: 'public',
        tags: {
          Name: natGatewayName,
        },
      },
      { dependsOn: [internetGateway] },
    )
  })

  // === VPC === Route Tables ===

  const publicRouteTableName = nm('public-rt')
  const publicRouteTable = new aws.ec2.RouteTable(publicRouteTableName, {
    vpcId: vpc.id,
    tags: {
      Name: publicRouteTableName,
    },
  })
  const publicRoute = new aws.ec2.Route(
    nm('public-rt-to-igw'),
    {
      routeTableId: publicRouteTable.id,
      destinationCidrBlock: '0.0.0.0/0',
      gatewayId: internetGateway.id,
    },
    { parent: publicRouteTable },
  )
  const publicAssociations = publicSubnets.map(
    (subnet, index) =>
      new aws.ec2.RouteTableAssociation(
        nm(`public-rta-${index + 1}`),
        {
          routeTableId: publicRouteTable.id,
          subnetId: subnet.id,
        },
        { parent: publicRouteTable },
      ),
  )

  const privateRouting = privateSubnets.map((subnet, index) => {
    const routeTableName = nm(`private-rt-${index + 1}`)
    const routeTable = new aws.ec2.RouteTable(routeTableName, {
      vpcId: vpc.id,
      tags: {
        Name: routeTableName,
      },
    })
    const route = new aws.ec2.Route(
      `${routeTableName}-to-nat`,
      {
        routeTableId: routeTable.id,
        destinationCidrBlock: '0.0.0.0/0',
        natGatewayId: natGateways[Math.min(index, natGateways.length - 1)].id,
      },
      { parent: routeTable },
    )
    const association = new aws.ec2.RouteTableAssociation(
      nm(`private-rta-${index + 1}`),
      {
        routeTableId: routeTable.id,
        subnetId: subnet.id,
      },
      { parent: routeTable },
    )
    return { routeTable, route, association }
  })

  return {
    vpc,
    internetGateway,
    publicSubnets,
    privateSubnets,
    eips,
    natGateways,
    publicRouteTable,
    privateRouteTables: privateRouting.map(({ routeTable }) => routeTable),
    routes: [publicRoute, ...privateRouting.map(({ route }) => route)],
    routeTableAssociations: [...publicAssociations, ...privateRouting.map(({ association }) => association)],
  }
}
