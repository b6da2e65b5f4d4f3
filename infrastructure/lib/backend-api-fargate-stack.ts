import * as cdk from 'aws-cdk-lib';
import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as ecs from 'aws-cdk-lib/aws-ecs';
import * as ecsPatterns from 'aws-cdk-lib/aws-ecs-patterns';
import { Construct } from 'constructs';
import {
  addServiceOutputs,
  type BackendApiStackProps,
  configureHealthCheck,
  configureServiceScaling,
  containerEnvironment,
  createDataBucket,
  createLogDriver,
  createVpc,
} from './shared-resources.js';

export class BackendApiFargateStack extends cdk.Stack {
  constructor(scope: Construct, id: string, props: BackendApiStackProps) {
    super(scope, id, props);

    const { topology } = props;
    const { cluster: clusterSpec, service, loadBalancer } = topology;
    if (clusterSpec.capacity !== 'fargate') {
      throw new Error(`BackendApiFargateStack needs a fargate cluster, got ${clusterSpec.capacity}`);
    }

    const vpc = createVpc(this, topology.network);

    const cluster = new ecs.Cluster(this, 'BackendApiCluster', {
      vpc,
      clusterName: clusterSpec.clusterName,
    });

    const bucket = topology.storage ? createDataBucket(this, topology.storage) : undefined;
    const { logGroup, logDriver } = createLogDriver(this, 'backend-api');

    // Tasks run in the private subnets, only the load balancer is reachable
    const fargateService = new ecsPatterns.ApplicationLoadBalancedFargateService(this, 'BackendApiService', {
      cluster,
      serviceName: service.serviceName,
      cpu: service.cpu,
      memoryLimitMiB: service.memoryLimitMiB,
      desiredCount: service.desiredCount,
      listenerPort: loadBalancer.listenerPort,
      publicLoadBalancer: loadBalancer.public,
      taskSubnets: {
        subnetType: ec2.SubnetType.PRIVATE_WITH_EGRESS,
      },
      taskImageOptions: {
        image: props.image,
        containerName: service.containerName,
        containerPort: service.containerPort,
        environment: containerEnvironment(topology, bucket),
        logDriver,
      },
    });

    configureHealthCheck(fargateService.targetGroup, loadBalancer.healthCheck);
    configureServiceScaling(fargateService.service, topology.scaling);

    bucket?.grantReadWrite(fargateService.taskDefinition.taskRole);

    addServiceOutputs(this, {
      loadBalancer: fargateService.loadBalancer,
      listenerPort: loadBalancer.listenerPort,
      cluster,
      service: fargateService.service,
      vpc,
      logGroup,
      bucket,
    });
  }
}
