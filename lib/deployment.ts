import * as cdk from 'aws-cdk-lib/core';
import { CacheStack } from './cache-stack';
import { ComputeStack } from './compute-stack';
import { AppConfig } from './config';
import { DatabaseStack } from './database-stack';
import { DomainStack } from './domain-stack';
import { FirewallStack } from './firewall-stack';
import { suppressCdkNagRules } from './nag-suppressions';
import { NetworkStack } from './network-stack';
import { RegistryStack } from './registry-stack';
import { StorageStack } from './storage-stack';

export interface Deployment {
  readonly network: NetworkStack;
  readonly registry: RegistryStack;
  readonly storage: StorageStack;
  readonly database: DatabaseStack;
  readonly cache: CacheStack;
  readonly domain: DomainStack;
  readonly compute: ComputeStack;
  readonly firewall: FirewallStack;
}

/**
 * Create every stack of the deployment and wire their references.
 *
 * Stack names follow `<app>-<env>-<unit>`, e.g. `studio-prod-compute`.
 */
export function createDeployment(app: cdk.App, config: AppConfig): Deployment {
  const env = config.cdkEnv();
  const stackProps = (unit: string, description: string): cdk.StackProps => ({
    env,
    stackName: config.stackName(unit),
    description,
  });

  const network = new NetworkStack(app, 'Network', {
    ...stackProps('network', 'VPC with public, private and isolated subnets'),
    config,
  });

  const registry = new RegistryStack(app, 'Registry', {
    ...stackProps('ecr', 'Container image registry'),
    config,
  });

  const storage = new StorageStack(app, 'Storage', {
    ...stackProps('s3', 'Application storage buckets'),
    config,
  });

  const database = new DatabaseStack(app, 'Database', {
    ...stackProps('rds', 'PostgreSQL database'),
    config,
    vpc: network.vpc,
  });

  const cache = new CacheStack(app, 'Cache', {
    ...stackProps('redis', 'Redis cache'),
    config,
    vpc: network.vpc,
  });

  const domain = new DomainStack(app, 'Domain', {
    ...stackProps('domain', 'TLS certificate for the application domain'),
    config,
  });

  const compute = new ComputeStack(app, 'Compute', {
    ...stackProps('compute', 'Load-balanced Fargate service with migration gate'),
    config,
    vpc: network.vpc,
    repository: registry.repository,
    database,
    cache,
    domain,
  });
  // buckets are referenced by name only
  compute.node.addDependency(storage);

  const firewall = new FirewallStack(app, 'Firewall', {
    ...stackProps('waf', 'Web application firewall for the load balancer'),
    config,
    loadBalancerArn: compute.loadBalancer.loadBalancerArn,
  });

  for (const stack of [network, registry, storage, database, cache, domain, compute, firewall]) {
    suppressCdkNagRules(stack, config);
  }

  return { network, registry, storage, database, cache, domain, compute, firewall };
}
