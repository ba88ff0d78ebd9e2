import type * as aws from '@pulumi/aws'

export const assumeRoleForService = (service: string): aws.iam.PolicyDocument => ({
  Version: '2012-10-17',
  Statement: [
    {
      Action: 'sts:AssumeRole',
      Effect: 'Allow',
      Principal: {
        Service: service,
      },
    },
  ],
})
