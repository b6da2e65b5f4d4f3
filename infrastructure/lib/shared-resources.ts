import * as cdk from 'aws-cdk-lib';
import * as appscaling from 'aws-cdk-lib/aws-applicationautoscaling';
import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as ecs from 'aws-cdk-lib/aws-ecs';
import * as elbv2 from 'aws-cdk-lib/aws-elasticloadbalancingv2';
import * as logs from 'aws-cdk-lib/aws-logs';
import * as s3 from 'aws-cdk-lib/aws-s3';
import { Construct } from 'constructs';
import type { HealthCheck, Network, Scaling, Storage, Topology } from './topology.js';

export interface BackendApiStackProps extends cdk.StackProps {
  readonly topology: Topology;
  /** Image run by the service; the app passes the Docker asset built from this repository. */
  readonly image: ecs.ContainerImage;
}

export const createVpc = (scope: Construct, network: Network): ec2.Vpc =>
  new ec2.Vpc(scope, 'BackendApiVpc', {
    ipAddresses: ec2.IpAddresses.cidr(network.cidr),
    maxAzs: network.maxAzs,
    natGateways: network.natGateways,
    subnetConfiguration: [
      {
        cidrMask: network.subnetCidrMask,
        name: 'PublicSubnet',
        subnetType: ec2.SubnetType.PUBLIC,
      },
      {
        cidrMask: network.subnetCidrMask,
        name: 'PrivateSubnet',
        subnetType: ec2.SubnetType.PRIVATE_WITH_EGRESS,
      },
    ],
  });

export const createDataBucket = (scope: Construct, storage: Storage): s3.Bucket =>
  new s3.Bucket(scope, 'DataBucket', {
    versioned: storage.versioned,
    encryption: s3.BucketEncryption.S3_MANAGED,
    blockPublicAccess: s3.BlockPublicAccess.BLOCK_ALL,
    enforceSSL: true,
    removalPolicy: storage.removalPolicy === 'destroy' ? cdk.RemovalPolicy.DESTROY : cdk.RemovalPolicy.RETAIN,
  });

export const createLogDriver = (scope: Construct, streamPrefix: string) => {
  const logGroup = new logs.LogGroup(scope, 'BackendApiLogGroup', {
    retention: logs.RetentionDays.ONE_WEEK,
    removalPolicy: cdk.RemovalPolicy.DESTROY,
  });
  return {
    logGroup,
    logDriver: ecs.LogDrivers.awsLogs({ streamPrefix, logGroup }),
  };
};

export const containerEnvironment = (topology: Topology, bucket?: s3.IBucket): Record<string, string> => ({
  NODE_ENV: 'production',
  PORT: topology.service.containerPort.toString(),
  LOG_LEVEL: 'Info',
  LOG_FORMAT: 'json',
  ...(bucket ? { DATA_BUCKET_NAME: bucket.bucketName } : {}),
});

export const configureHealthCheck = (targetGroup: elbv2.ApplicationTargetGroup, healthCheck: HealthCheck): void => {
  targetGroup.configureHealthCheck({
    path: healthCheck.path,
    interval: cdk.Duration.seconds(healthCheck.intervalSeconds),
    timeout: cdk.Duration.seconds(healthCheck.timeoutSeconds),
    healthyThresholdCount: healthCheck.healthyThresholdCount,
    unhealthyThresholdCount: healthCheck.unhealthyThresholdCount,
    healthyHttpCodes: healthCheck.healthyHttpCodes,
  });
};

export const configureServiceScaling = (service: ecs.BaseService, scaling: Scaling): ecs.ScalableTaskCount => {
  const taskCount = service.autoScaleTaskCount({
    minCapacity: scaling.minCapacity,
    maxCapacity: scaling.maxCapacity,
  });

  taskCount.scaleOnCpuUtilization('CpuScaling', {
    targetUtilizationPercent: scaling.cpuTargetPercent,
    scaleInCooldown: cdk.Duration.seconds(scaling.scaleInCooldownSeconds),
    scaleOutCooldown: cdk.Duration.seconds(scaling.scaleOutCooldownSeconds),
  });

  if (scaling.memoryTargetPercent !== undefined) {
    taskCount.scaleOnMemoryUtilization('MemoryScaling', {
      targetUtilizationPercent: scaling.memoryTargetPercent,
      scaleInCooldown: cdk.Duration.seconds(scaling.scaleInCooldownSeconds),
      scaleOutCooldown: cdk.Duration.seconds(scaling.scaleOutCooldownSeconds),
    });
  }

  for (const schedule of scaling.schedules) {
    taskCount.scaleOnSchedule(`${schedule.name}Schedule`, {
      schedule: appscaling.Schedule.cron({
        minute: schedule.cron.minute,
        hour: schedule.cron.hour,
        day: schedule.cron.day,
        month: schedule.cron.month,
        weekDay: schedule.cron.weekDay,
      }),
      minCapacity: schedule.minCapacity,
      maxCapacity: schedule.maxCapacity,
      timeZone: schedule.timeZone === undefined ? undefined : cdk.TimeZone.of(schedule.timeZone),
    });
  }

  return taskCount;
};

interface ServiceOutputs {
  readonly loadBalancer: elbv2.IApplicationLoadBalancer;
  readonly listenerPort: number;
  readonly cluster: ecs.ICluster;
  readonly service: ecs.BaseService;
  readonly vpc: ec2.IVpc;
  readonly logGroup: logs.ILogGroup;
  readonly bucket?: s3.IBucket;
}

export const addServiceOutputs = (stack: cdk.Stack, outputs: ServiceOutputs): void => {
  const dnsName = outputs.loadBalancer.loadBalancerDnsName;
  const portSuffix = outputs.listenerPort === 80 ? '' : `:${outputs.listenerPort}`;

  new cdk.CfnOutput(stack, 'LoadBalancerDNS', {
    value: dnsName,
    description: 'DNS name of the Application Load Balancer',
  });

  new cdk.CfnOutput(stack, 'ServiceUrl', {
    value: `http://${dnsName}${portSuffix}/`,
    description: 'Root endpoint of the backend API',
  });

  new cdk.CfnOutput(stack, 'ClusterName', {
    value: outputs.cluster.clusterName,
    description: 'ECS Cluster name',
  });

  new cdk.CfnOutput(stack, 'ServiceName', {
    value: outputs.service.serviceName,
    description: 'ECS Service name',
  });

  new cdk.CfnOutput(stack, 'VpcId', {
    value: outputs.vpc.vpcId,
    description: 'VPC ID',
  });

  new cdk.CfnOutput(stack, 'LogGroupName', {
    value: outputs.logGroup.logGroupName,
    description: 'CloudWatch Log Group name',
  });

  if (outputs.bucket) {
    new cdk.CfnOutput(stack, 'DataBucketName', {
      value: outputs.bucket.bucketName,
      description: 'Name of the S3 data bucket',
    });
  }
};
