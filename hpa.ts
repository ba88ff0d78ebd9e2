import * as k8s from '@pulumi/kubernetes'
import * as pulumi from '@pulumi/pulumi'
import * as R from 'ramda'
import { defaults, type Settings } from './config.ts'
import { nm as namer } from './utils/naming.ts'

export interface HpaOutputs {
  metricsServerRelease: pulumi.Output<string>
  deploymentName: pulumi.Output<string>
  serviceName: pulumi.Output<string>
  hpaName: pulumi.Output<string>
  minReplicas: number
  maxReplicas: number
  cpuThreshold: number
  memoryThreshold: number
}

export interface HpaStack {
  metricsServer: k8s.helm.v3.Release
  deployment: k8s.apps.v1.Deployment
  service: k8s.core.v1.Service
  horizontalPodAutoscaler: k8s.autoscaling.v2.HorizontalPodAutoscaler
  outputs: HpaOutputs
}

const utilizationMetric = (name: 'cpu' | 'memory', averageUtilization: number) => ({
  type: 'Resource',
  resource: {
    name,
    target: {
      type: 'Utilization',
      averageUtilization,
    },
  },
})

export const setupHpa = ({ namePrefix, hpa, demoApp }: Settings, provider: k8s.Provider): HpaStack | undefined => {
  if (!hpa.enabled) {
    pulumi.log.info('HPA is disabled. Skipping HPA setup.')
    return undefined
  }

  const nm = namer(namePrefix)
  const selector = { app: demoApp.name }
  const labels = R.mergeRight(selector, defaults.labels)

  // === HPA === Metrics Server ===

  const metricsServer = new k8s.helm.v3.Release(
    nm('metrics-server'),
    {
      name: defaults.metricsServer.chart,
      chart: defaults.metricsServer.chart,
      namespace: defaults.metricsServer.namespace,
      version: defaults.metricsServer.version,
      repositoryOpts: {
        repo: defaults.metricsServer.repo,
      },
      values: {
        args: defaults.metricsServer.args,
      },
    },
    { provider },
  )

  // === HPA === Demo Deployment ===

  const deployment = new k8s.apps.v1.Deployment(
    demoApp.name,
    {
      metadata: {
        name: demoApp.name,
        namespace: demoApp.namespace,
        labels,
      },
      spec: {
        replicas: demoApp.replicas,
        selector: {
          matchLabels: selector,
        },
        template: {
          metadata: {
            labels,
          },
          spec: {
            containers: [
              {
                name: demoApp.name,
                image: demoApp.image,
                ports: [{ containerPort: demoApp.port }],
                resources: defaults.pod.resources,
              },
            ],
          },
        },
      },
    },
    { provider },
  )

  // === HPA === Demo Service ===

  const serviceName = `${demoApp.name}-service`
  const service = new k8s.core.v1.Service(
    serviceName,
    {
      metadata: {
        name: serviceName,
        namespace: demoApp.namespace,
        labels: selector,
      },
      spec: {
        type: 'LoadBalancer',
        selector,
        ports: [{ port: 80, targetPort: demoApp.port }],
      },
    },
    { provider },
  )

  // === HPA === Horizontal Pod Autoscaler ===

  const hpaName = `${demoApp.name}-hpa`
  const horizontalPodAutoscaler = new k8s.autoscaling.v2.HorizontalPodAutoscaler(
    hpaName,
    {
      metadata: {
        name: hpaName,
        namespace: demoApp.namespace,
        labels: selector,
      },
      spec: {
        scaleTargetRef: {
          apiVersion: 'apps/v1',
          kind: 'Deployment',
          name: deployment.metadata.name,
        },
        minReplicas: hpa.minReplicas,
        maxReplicas: hpa.maxReplicas,
        metrics: [utilizationMetric('cpu', hpa.cpuThreshold), utilizationMetric('memory', hpa.memoryThreshold)],
      },
    },
    { provider, dependsOn: [deployment, metricsServer] },
  )

  return {
    metricsServer,
    deployment,
    service,
    horizontalPodAutoscaler,
    outputs: {
      metricsServerRelease: metricsServer.name,
      deploymentName: deployment.metadata.name,
      serviceName: service.metadata.name,
      hpaName: horizontalPodAutoscaler.metadata.name,
      minReplicas: hpa.minReplicas,
      maxReplicas: hpa.maxReplicas,
      cpuThreshold: hpa.cpuThreshold,
      memoryThreshold: hpa.memoryThreshold,
    },
  }
}
