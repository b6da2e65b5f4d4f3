#!/usr/bin/env node
import { NodeContext, NodeRuntime } from '@effect/platform-node';
import * as cdk from 'aws-cdk-lib';
import { Config, Effect } from 'effect';
import { containerImageFromSource, createBackendApiStack } from '../lib/backend-api-app.js';
import { loadTopology } from '../lib/load-topology.js';

const synthesize = Effect.gen(function* () {
  const app = new cdk.App();

  // `cdk synth -c topology=ec2` takes precedence over TOPOLOGY
  const fromContext: unknown = app.node.tryGetContext('topology');
  const fromEnv = yield* Config.string('TOPOLOGY').pipe(Config.withDefault('fargate'));
  const preset = typeof fromContext === 'string' ? fromContext : fromEnv;

  const topology = yield* loadTopology(preset);
  yield* Effect.logInfo(`Synthesizing ${topology.stackName}`).pipe(
    Effect.annotateLogs({ preset, capacity: topology.cluster.capacity })
  );

  createBackendApiStack(app, topology, {
    image: containerImageFromSource(),
    env: {
      account: process.env.CDK_DEFAULT_ACCOUNT,
      region: process.env.CDK_DEFAULT_REGION || 'us-west-2',
    },
  });

  app.synth();
});

NodeRuntime.runMain(synthesize.pipe(Effect.provide(NodeContext.layer)));
