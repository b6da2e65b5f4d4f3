import * as cdk from 'aws-cdk-lib';
import * as ecrAssets from 'aws-cdk-lib/aws-ecr-assets';
import * as ecs from 'aws-cdk-lib/aws-ecs';
import { Construct } from 'constructs';
import { fileURLToPath } from 'node:url';
import { BackendApiEc2Stack } from './backend-api-ec2-stack.js';
import { BackendApiFargateStack } from './backend-api-fargate-stack.js';
import type { BackendApiStackProps } from './shared-resources.js';
import type { Topology } from './topology.js';

const projectRoot = fileURLToPath(new URL('../..', import.meta.url));

// Built from the Dockerfile at the repository root
export const containerImageFromSource = (): ecs.ContainerImage =>
  ecs.ContainerImage.fromAsset(projectRoot, {
    platform: ecrAssets.Platform.LINUX_AMD64,
    exclude: ['cdk.out', 'node_modules', 'dist', 'coverage', '.git'],
  });

export const createBackendApiStack = (
  scope: Construct,
  topology: Topology,
  props: Omit<BackendApiStackProps, 'topology'>
): cdk.Stack => {
  const stackProps: BackendApiStackProps = {
    description: topology.description,
    ...props,
    topology,
  };
  switch (topology.cluster.capacity) {
    case 'fargate':
      return new BackendApiFargateStack(scope, topology.stackName, stackProps);
    case 'ec2':
      return new BackendApiEc2Stack(scope, topology.stackName, stackProps);
  }
};
