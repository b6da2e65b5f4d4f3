import { Effect, ParseResult, Schema } from "effect"

// Validation error for topology records
export class TopologyValidationError extends Schema.TaggedError<TopologyValidationError>()(
  "TopologyValidationError",
  {
    message: Schema.String
  }
) {}

const Port = Schema.Int.pipe(Schema.between(1, 65535))
const Count = Schema.Int.pipe(Schema.nonNegative())
const Percent = Schema.Int.pipe(Schema.between(1, 100))

const parseCidr = (cidr: string) => {
  const [address, prefix] = cidr.split("/")
  return {
    octets: address.split(".").map(Number),
    prefix: Number(prefix)
  }
}

export const Network = Schema.Struct({
  cidr: Schema.String.pipe(Schema.pattern(/^(\d{1,3}\.){3}\d{1,3}\/(1[6-9]|2[0-8])$/)),
  subnetCidrMask: Schema.Int.pipe(Schema.between(16, 28)),
  maxAzs: Schema.Int.pipe(Schema.between(1, 6)),
  // private subnets route through NAT, so at least one gateway is required
  natGateways: Schema.Int.pipe(Schema.greaterThanOrEqualTo(1))
}).pipe(
  Schema.filter((network) =>
    parseCidr(network.cidr).octets.every((octet) => octet <= 255) ||
    `cidr ${network.cidr} is not a valid IPv4 range`
  ),
  Schema.filter((network) => {
    const { octets, prefix } = parseCidr(network.cidr)
    const address = octets.reduce((acc, octet) => acc * 256 + octet, 0)
    return address % 2 ** (32 - prefix) === 0 ||
      `cidr ${network.cidr} has host bits set`
  }),
  Schema.filter((network) =>
    network.natGateways <= network.maxAzs ||
    `natGateways (${network.natGateways}) cannot exceed maxAzs (${network.maxAzs})`
  ),
  Schema.filter((network) => {
    const { prefix } = parseCidr(network.cidr)
    if (network.subnetCidrMask < prefix) {
      return `subnetCidrMask /${network.subnetCidrMask} is wider than the VPC range /${prefix}`
    }
    // one public and one private subnet per availability zone
    const needed = 2 * network.maxAzs * 2 ** (32 - network.subnetCidrMask)
    return needed <= 2 ** (32 - prefix) ||
      `${2 * network.maxAzs} subnets of /${network.subnetCidrMask} do not fit in ${network.cidr}`
  })
)
export type Network = typeof Network.Type

const ClusterName = Schema.String.pipe(Schema.pattern(/^[A-Za-z0-9_-]{1,255}$/, {
  message: () => "cluster name must be 1-255 letters, digits, hyphens or underscores"
}))

export const FargateCluster = Schema.Struct({
  capacity: Schema.Literal("fargate"),
  clusterName: ClusterName
})

export const Ec2Cluster = Schema.Struct({
  capacity: Schema.Literal("ec2"),
  clusterName: ClusterName,
  instanceType: Schema.String.pipe(Schema.pattern(/^[a-z][a-z0-9-]*\.[a-z0-9]+$/)),
  minInstances: Count,
  maxInstances: Schema.Int.pipe(Schema.greaterThanOrEqualTo(1))
}).pipe(
  Schema.filter((cluster) =>
    cluster.minInstances <= cluster.maxInstances ||
    `minInstances (${cluster.minInstances}) cannot exceed maxInstances (${cluster.maxInstances})`
  )
)

export const Cluster = Schema.Union(FargateCluster, Ec2Cluster)
export type Cluster = typeof Cluster.Type

export const Service = Schema.Struct({
  serviceName: Schema.optional(Schema.String.pipe(Schema.pattern(/^[A-Za-z0-9_-]{1,255}$/))),
  containerName: Schema.optionalWith(Schema.NonEmptyString, { default: () => "web" }),
  cpu: Schema.Int.pipe(Schema.positive()),
  memoryLimitMiB: Schema.Int.pipe(Schema.positive()),
  desiredCount: Count,
  containerPort: Port
})
export type Service = typeof Service.Type

const CronField = Schema.String.pipe(Schema.pattern(/^\S+$/, {
  message: () => "cron fields cannot contain whitespace"
}))

export const CronSchedule = Schema.Struct({
  minute: Schema.optional(CronField),
  hour: Schema.optional(CronField),
  day: Schema.optional(CronField),
  month: Schema.optional(CronField),
  weekDay: Schema.optional(CronField)
}).pipe(
  Schema.filter((cron) =>
    cron.day === undefined || cron.weekDay === undefined ||
    "cron cannot set both day and weekDay"
  )
)
export type CronSchedule = typeof CronSchedule.Type

export const ScheduledCapacity = Schema.Struct({
  name: Schema.String.pipe(Schema.pattern(/^[A-Za-z][A-Za-z0-9]*$/)),
  cron: CronSchedule,
  minCapacity: Count,
  maxCapacity: Count,
  timeZone: Schema.optional(Schema.NonEmptyString)
}).pipe(
  Schema.filter((schedule) =>
    schedule.minCapacity <= schedule.maxCapacity ||
    `schedule ${schedule.name}: minCapacity (${schedule.minCapacity}) cannot exceed maxCapacity (${schedule.maxCapacity})`
  )
)
export type ScheduledCapacity = typeof ScheduledCapacity.Type

export const Scaling = Schema.Struct({
  minCapacity: Count,
  maxCapacity: Schema.Int.pipe(Schema.greaterThanOrEqualTo(1)),
  cpuTargetPercent: Percent,
  memoryTargetPercent: Schema.optional(Percent),
  scaleInCooldownSeconds: Count,
  scaleOutCooldownSeconds: Count,
  schedules: Schema.optionalWith(Schema.Array(ScheduledCapacity), { default: () => [] })
}).pipe(
  Schema.filter((scaling) =>
    scaling.minCapacity <= scaling.maxCapacity ||
    `minCapacity (${scaling.minCapacity}) cannot exceed maxCapacity (${scaling.maxCapacity})`
  ),
  Schema.filter((scaling) => {
    const names = scaling.schedules.map((schedule) => schedule.name)
    return new Set(names).size === names.length || "schedule names must be unique"
  })
)
export type Scaling = typeof Scaling.Type

export const HealthCheck = Schema.Struct({
  path: Schema.String.pipe(Schema.pattern(/^\/\S*$/)),
  intervalSeconds: Schema.Int.pipe(Schema.between(5, 300)),
  timeoutSeconds: Schema.Int.pipe(Schema.between(2, 120)),
  healthyThresholdCount: Schema.Int.pipe(Schema.between(2, 10)),
  unhealthyThresholdCount: Schema.Int.pipe(Schema.between(2, 10)),
  healthyHttpCodes: Schema.optionalWith(Schema.NonEmptyString, { default: () => "200" })
}).pipe(
  Schema.filter((healthCheck) =>
    healthCheck.timeoutSeconds < healthCheck.intervalSeconds ||
    `health check timeout (${healthCheck.timeoutSeconds}s) must be shorter than its interval (${healthCheck.intervalSeconds}s)`
  )
)
export type HealthCheck = typeof HealthCheck.Type

export const LoadBalancer = Schema.Struct({
  listenerPort: Port,
  public: Schema.optionalWith(Schema.Boolean, { default: () => true }),
  healthCheck: HealthCheck
})
export type LoadBalancer = typeof LoadBalancer.Type

export const Storage = Schema.Struct({
  versioned: Schema.optionalWith(Schema.Boolean, { default: () => true }),
  removalPolicy: Schema.optionalWith(Schema.Literal("retain", "destroy"), { default: () => "retain" as const })
})
export type Storage = typeof Storage.Type

const memoryRange = (from: number, to: number, step: number): ReadonlyArray<number> =>
  Array.from({ length: (to - from) / step + 1 }, (_, i) => from + i * step)

const fargateMemoryOptions = (cpu: number): ReadonlyArray<number> => {
  switch (cpu) {
    case 256:
      return [512, 1024, 2048]
    case 512:
      return memoryRange(1024, 4096, 1024)
    case 1024:
      return memoryRange(2048, 8192, 1024)
    case 2048:
      return memoryRange(4096, 16384, 1024)
    case 4096:
      return memoryRange(8192, 30720, 1024)
    case 8192:
      return memoryRange(16384, 61440, 4096)
    case 16384:
      return memoryRange(32768, 122880, 8192)
    default:
      return []
  }
}

/** Whether Fargate offers a task size with this CPU and memory. */
export const isFargateTaskSize = (cpu: number, memoryLimitMiB: number): boolean =>
  fargateMemoryOptions(cpu).includes(memoryLimitMiB)

export const Topology = Schema.Struct({
  stackName: Schema.String.pipe(Schema.pattern(/^[A-Za-z][A-Za-z0-9-]{0,127}$/)),
  description: Schema.optional(Schema.String),
  network: Network,
  cluster: Cluster,
  service: Service,
  loadBalancer: LoadBalancer,
  scaling: Scaling,
  storage: Schema.optional(Storage)
}).pipe(
  Schema.filter((topology) => {
    const { desiredCount } = topology.service
    const { minCapacity, maxCapacity } = topology.scaling
    return (desiredCount >= minCapacity && desiredCount <= maxCapacity) ||
      `desiredCount (${desiredCount}) must lie within scaling bounds [${minCapacity}, ${maxCapacity}]`
  }),
  Schema.filter((topology) =>
    topology.cluster.capacity !== "fargate" ||
    isFargateTaskSize(topology.service.cpu, topology.service.memoryLimitMiB) ||
    `Fargate does not offer ${topology.service.cpu} CPU units with ${topology.service.memoryLimitMiB} MiB`
  )
)
export type Topology = typeof Topology.Type

const formatParseError = (error: ParseResult.ParseError) =>
  new TopologyValidationError({ message: ParseResult.TreeFormatter.formatErrorSync(error) })

export const validateTopology = (input: unknown): Effect.Effect<Topology, TopologyValidationError> =>
  Schema.decodeUnknown(Topology)(input).pipe(Effect.mapError(formatParseError))
