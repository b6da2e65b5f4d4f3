import { beforeAll, describe, expect, it } from "@effect/vitest"
import * as cdk from "aws-cdk-lib"
import { Match, Template } from "aws-cdk-lib/assertions"
import { BackendApiEc2Stack } from "../../infrastructure/lib/backend-api-ec2-stack.js"
import { ec2Topology, fargateTopology, testImage } from "../helpers/Topologies.js"

describe("BackendApiEc2Stack", () => {
  let template: Template

  beforeAll(() => {
    const app = new cdk.App()
    const stack = new BackendApiEc2Stack(app, ec2Topology.stackName, { topology: ec2Topology, image: testImage() })
    template = Template.fromStack(stack)
  })

  it("backs the cluster with an auto-scaling group of container instances", () => {
    template.hasResourceProperties("AWS::AutoScaling::AutoScalingGroup", {
      MinSize: "1",
      MaxSize: "3"
    })
    template.hasResourceProperties("AWS::EC2::LaunchTemplate", {
      LaunchTemplateData: Match.objectLike({
        InstanceType: "t3.small",
        MetadataOptions: { HttpTokens: "required" }
      })
    })
    template.resourceCountIs("AWS::ECS::CapacityProvider", 1)
    template.resourceCountIs("AWS::ECS::ClusterCapacityProviderAssociations", 1)
  })

  it("lets container instances register with SSM", () => {
    template.hasResourceProperties("AWS::IAM::Role", {
      AssumeRolePolicyDocument: Match.objectLike({
        Statement: [Match.objectLike({ Principal: { Service: "ec2.amazonaws.com" } })]
      }),
      ManagedPolicyArns: [
        {
          "Fn::Join": ["", ["arn:", { Ref: "AWS::Partition" }, ":iam::aws:policy/AmazonSSMManagedInstanceCore"]]
        }
      ]
    })
  })

  it("places the service through the capacity provider", () => {
    template.hasResourceProperties("AWS::ECS::Service", {
      ServiceName: "test-service",
      DesiredCount: 2,
      CapacityProviderStrategy: [Match.objectLike({ Weight: 1 })]
    })
    template.hasResourceProperties("AWS::ECS::TaskDefinition", {
      RequiresCompatibilities: ["EC2"],
      ContainerDefinitions: [
        Match.objectLike({ Name: "web", Cpu: 256, Memory: 512, Image: "test/backend-api:latest" })
      ]
    })
  })

  it("keeps the load balancer internal on the configured listener port", () => {
    template.hasResourceProperties("AWS::ElasticLoadBalancingV2::LoadBalancer", { Scheme: "internal" })
    template.hasResourceProperties("AWS::ElasticLoadBalancingV2::Listener", { Port: 8080 })
    template.hasResourceProperties("AWS::ElasticLoadBalancingV2::TargetGroup", {
      HealthCheckPath: "/health",
      HealthCheckIntervalSeconds: 20,
      UnhealthyThresholdCount: 2
    })
  })

  it("tracks cpu and memory utilization", () => {
    template.resourceCountIs("AWS::ApplicationAutoScaling::ScalingPolicy", 2)
    template.hasResourceProperties("AWS::ApplicationAutoScaling::ScalingPolicy", {
      TargetTrackingScalingPolicyConfiguration: Match.objectLike({
        PredefinedMetricSpecification: { PredefinedMetricType: "ECSServiceAverageMemoryUtilization" },
        TargetValue: 75,
        ScaleInCooldown: 300
      })
    })
  })

  it("schedules weekday capacity in the configured time zone", () => {
    template.hasResourceProperties("AWS::ApplicationAutoScaling::ScalableTarget", {
      MinCapacity: 1,
      MaxCapacity: 4,
      ScheduledActions: [
        Match.objectLike({
          Schedule: "cron(30 6 ? * MON-FRI *)",
          Timezone: "Europe/Berlin",
          ScalableTargetAction: { MinCapacity: 2, MaxCapacity: 4 }
        })
      ]
    })
  })

  it("stores data in a private, versioned bucket", () => {
    template.hasResource("AWS::S3::Bucket", {
      DeletionPolicy: "Delete",
      Properties: Match.objectLike({
        VersioningConfiguration: { Status: "Enabled" },
        BucketEncryption: {
          ServerSideEncryptionConfiguration: [
            { ServerSideEncryptionByDefault: { SSEAlgorithm: "AES256" } }
          ]
        }
      })
    })
    template.hasOutput("DataBucketName", {})
    template.hasOutput("AutoScalingGroupName", {})
  })

  it("refuses a fargate topology", () => {
    expect(() =>
      new BackendApiEc2Stack(new cdk.App(), "Mismatch", { topology: fargateTopology, image: testImage() })
    ).toThrow("BackendApiEc2Stack needs an ec2 cluster, got fargate")
  })
})
