/**
 * Pulumi test utilities.
 *
 * Installs Pulumi's runtime mocks and records every resource the program
 * registers, so tests can assert the resource graph without a cloud account.
 * `setupPulumiMocks()` runs from vitest.setup.ts, before any test module
 * constructs a Config or a resource.
 */

import * as pulumi from '@pulumi/pulumi'

export interface TrackedResource {
  type: string
  name: string
  inputs: Record<string, unknown>
  id: string
}

const trackedResources: TrackedResource[] = []

export const getResourcesByType = (type: string): TrackedResource[] =>
  trackedResources.filter((resource) => resource.type === type)

export const getResource = (type: string, name: string): TrackedResource | undefined =>
  trackedResources.find((resource) => resource.type === type && resource.name === name)

export const clearTrackedResources = (): void => {
  trackedResources.length = 0
}

/** Resolves with the value of an output. Mocks run with `dryRun` off, so every output is known. */
export const getOutputValue = <T>(output: pulumi.Output<T>): Promise<T> =>
  new Promise((resolve) => {
    output.apply((value) => {
      resolve(value)
      return value
    })
  })

/** Resolves once every given resource has been registered with the mock monitor. */
export const whenRegistered = async (resources: pulumi.Resource[]): Promise<void> => {
  await Promise.all(resources.map(({ urn }) => getOutputValue(urn)))
}

const mockState = ({ type, name, inputs }: pulumi.runtime.MockResourceArgs): Record<string, unknown> => {
  const state: Record<string, unknown> = { ...inputs }

  switch (type) {
    case 'aws:iam/role:Role':
      state.arn = `arn:aws:iam::123456789012:role/${name}`
      state.name = name
      break

    case 'aws:eks/cluster:Cluster':
      state.arn = `arn:aws:eks:us-east-1:123456789012:cluster/${name}`
      state.endpoint = `https://${name}.gr7.us-east-1.eks.amazonaws.com`
      state.certificateAuthority = { data: 'dGVzdC1jYS1kYXRh' }
      break

    case 'kubernetes:apps/v1:Deployment':
    case 'kubernetes:core/v1:Service':
    case 'kubernetes:autoscaling/v2:HorizontalPodAutoscaler':
      state.metadata = { ...inputs.metadata, uid: `${name}-uid` }
      break

    case 'kubernetes:helm.sh/v3:Release':
      state.status = { status: 'deployed' }
      break
  }

  return state
}

export const setupPulumiMocks = async (project = 'eks-platform', stack = 'test'): Promise<void> => {
  clearTrackedResources()

  await pulumi.runtime.setMocks(
    {
      newResource: (args: pulumi.runtime.MockResourceArgs): pulumi.runtime.MockResourceResult => {
        const id = `${args.name}-id`
        trackedResources.push({ type: args.type, name: args.name, inputs: args.inputs, id })
        return { id, state: mockState(args) }
      },
      call: (args: pulumi.runtime.MockCallArgs): Record<string, unknown> => args.inputs,
    },
    project,
    stack,
    false,
  )
}
