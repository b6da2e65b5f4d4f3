import * as ecs from "aws-cdk-lib/aws-ecs"
import type { Topology } from "../../infrastructure/lib/topology.js"

// Stands in for the Docker asset so synthesis never stages the repository
export const testImage = (): ecs.ContainerImage =>
  ecs.ContainerImage.fromRegistry("test/backend-api:latest")

export const fargateTopology: Topology = {
  stackName: "TestFargateStack",
  network: {
    cidr: "10.0.0.0/16",
    subnetCidrMask: 24,
    maxAzs: 2,
    natGateways: 1
  },
  cluster: {
    capacity: "fargate",
    clusterName: "test-cluster"
  },
  service: {
    containerName: "web",
    cpu: 256,
    memoryLimitMiB: 512,
    desiredCount: 1,
    containerPort: 80
  },
  loadBalancer: {
    listenerPort: 80,
    public: true,
    healthCheck: {
      path: "/health",
      intervalSeconds: 30,
      timeoutSeconds: 5,
      healthyThresholdCount: 2,
      unhealthyThresholdCount: 3,
      healthyHttpCodes: "200"
    }
  },
  scaling: {
    minCapacity: 1,
    maxCapacity: 2,
    cpuTargetPercent: 70,
    scaleInCooldownSeconds: 60,
    scaleOutCooldownSeconds: 60,
    schedules: [
      { name: "Start", cron: { minute: "0", hour: "7" }, minCapacity: 1, maxCapacity: 2 },
      { name: "Stop", cron: { minute: "0", hour: "19" }, minCapacity: 0, maxCapacity: 0 }
    ]
  }
}

export const ec2Topology: Topology = {
  stackName: "TestEc2Stack",
  network: {
    cidr: "10.1.0.0/16",
    subnetCidrMask: 24,
    maxAzs: 2,
    natGateways: 1
  },
  cluster: {
    capacity: "ec2",
    clusterName: "test-ec2-cluster",
    instanceType: "t3.small",
    minInstances: 1,
    maxInstances: 3
  },
  service: {
    serviceName: "test-service",
    containerName: "web",
    cpu: 256,
    memoryLimitMiB: 512,
    desiredCount: 2,
    containerPort: 80
  },
  loadBalancer: {
    listenerPort: 8080,
    public: false,
    healthCheck: {
      path: "/health",
      intervalSeconds: 20,
      timeoutSeconds: 5,
      healthyThresholdCount: 2,
      unhealthyThresholdCount: 2,
      healthyHttpCodes: "200"
    }
  },
  scaling: {
    minCapacity: 1,
    maxCapacity: 4,
    cpuTargetPercent: 60,
    memoryTargetPercent: 75,
    scaleInCooldownSeconds: 300,
    scaleOutCooldownSeconds: 60,
    schedules: [
      {
        name: "Morning",
        cron: { minute: "30", hour: "6", weekDay: "MON-FRI" },
        minCapacity: 2,
        maxCapacity: 4,
        timeZone: "Europe/Berlin"
      }
    ]
  },
  storage: {
    versioned: true,
    removalPolicy: "destroy"
  }
}
