import * as cdk from 'aws-cdk-lib';
import * as autoscaling from 'aws-cdk-lib/aws-autoscaling';
import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as ecs from 'aws-cdk-lib/aws-ecs';
import * as ecsPatterns from 'aws-cdk-lib/aws-ecs-patterns';
import * as iam from 'aws-cdk-lib/aws-iam';
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

export class BackendApiEc2Stack extends cdk.Stack {
  constructor(scope: Construct, id: string, props: BackendApiStackProps) {
    super(scope, id, props);

    const { topology } = props;
    const { cluster: clusterSpec, service, loadBalancer } = topology;
    if (clusterSpec.capacity !== 'ec2') {
      throw new Error(`BackendApiEc2Stack needs an ec2 cluster, got ${clusterSpec.capacity}`);
    }

    const vpc = createVpc(this, topology.network);

    const cluster = new ecs.Cluster(this, 'BackendApiCluster', {
      vpc,
      clusterName: clusterSpec.clusterName,
    });

    // Container instances
    const instanceSecurityGroup = new ec2.SecurityGroup(this, 'ContainerInstanceSecurityGroup', {
      vpc,
      allowAllOutbound: true,
      description: 'Security group for backend API container instances',
    });

    const instanceRole = new iam.Role(this, 'ContainerInstanceRole', {
      assumedBy: new iam.ServicePrincipal('ec2.amazonaws.com'),
      managedPolicies: [
        iam.ManagedPolicy.fromAwsManagedPolicyName('AmazonSSMManagedInstanceCore'),
      ],
    });

    const launchTemplate = new ec2.LaunchTemplate(this, 'ContainerInstanceLaunchTemplate', {
      instanceType: new ec2.InstanceType(clusterSpec.instanceType),
      machineImage: ecs.EcsOptimizedImage.amazonLinux2(),
      securityGroup: instanceSecurityGroup,
      role: instanceRole,
      userData: ec2.UserData.forLinux(),
      requireImdsv2: true,
    });

    const autoScalingGroup = new autoscaling.AutoScalingGroup(this, 'ContainerInstanceAutoScalingGroup', {
      vpc,
      launchTemplate,
      minCapacity: clusterSpec.minInstances,
      maxCapacity: clusterSpec.maxInstances,
      vpcSubnets: {
        subnetType: ec2.SubnetType.PRIVATE_WITH_EGRESS,
      },
    });

    const capacityProvider = new ecs.AsgCapacityProvider(this, 'ContainerInstanceCapacityProvider', {
      autoScalingGroup,
      enableManagedTerminationProtection: false,
    });
    cluster.addAsgCapacityProvider(capacityProvider);

    const bucket = topology.storage ? createDataBucket(this, topology.storage) : undefined;
    const { logGroup, logDriver } = createLogDriver(this, 'backend-api');

    const ec2Service = new ecsPatterns.ApplicationLoadBalancedEc2Service(this, 'BackendApiService', {
      cluster,
      serviceName: service.serviceName,
      cpu: service.cpu,
      memoryLimitMiB: service.memoryLimitMiB,
      desiredCount: service.desiredCount,
      listenerPort: loadBalancer.listenerPort,
      publicLoadBalancer: loadBalancer.public,
      capacityProviderStrategies: [
        {
          capacityProvider: capacityProvider.capacityProviderName,
          weight: 1,
        },
      ],
      taskImageOptions: {
        image: props.image,
        containerName: service.containerName,
        containerPort: service.containerPort,
        environment: containerEnvironment(topology, bucket),
        logDriver,
      },
    });

    configureHealthCheck(ec2Service.targetGroup, loadBalancer.healthCheck);
    configureServiceScaling(ec2Service.service, topology.scaling);

    bucket?.grantReadWrite(ec2Service.taskDefinition.taskRole);

    addServiceOutputs(this, {
      loadBalancer: ec2Service.loadBalancer,
      listenerPort: loadBalancer.listenerPort,
      cluster,
      service: ec2Service.service,
      vpc,
      logGroup,
      bucket,
    });

    new cdk.CfnOutput(this, 'AutoScalingGroupName', {
      value: autoScalingGroup.autoScalingGroupName,
      description: 'Auto Scaling Group of the container instances',
    });
  }
}
