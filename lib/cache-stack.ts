import * as cdk from 'aws-cdk-lib/core';
import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as elasticache from 'aws-cdk-lib/aws-elasticache';
import * as secretsmanager from 'aws-cdk-lib/aws-secretsmanager';
import { Construct } from 'constructs';
import { AppConfig } from './config';

/** A secret whose value is the full cache connection URL. */
export interface CacheEndpoint {
  readonly urlSecret: secretsmanager.ISecret;
}

export interface CacheStackProps extends cdk.StackProps {
  config: AppConfig;
  vpc: ec2.IVpc;
}

/**
 * Single-node Redis cluster in the isolated subnets.
 */
export class CacheStack extends cdk.Stack implements CacheEndpoint {
  public readonly cluster: elasticache.CfnCacheCluster;
  public readonly urlSecret: secretsmanager.Secret;

  constructor(scope: Construct, id: string, props: CacheStackProps) {
    super(scope, id, props);

    const { config, vpc } = props;

    const securityGroup = new ec2.SecurityGroup(this, 'RedisSecurityGroup', {
      vpc,
      description: 'Redis access from inside the VPC',
      allowAllOutbound: false,
    });
    securityGroup.addIngressRule(
      ec2.Peer.ipv4(vpc.vpcCidrBlock),
      ec2.Port.tcp(6379),
      'Allow Redis from the VPC',
    );

    const subnetGroup = new elasticache.CfnSubnetGroup(this, 'RedisSubnetGroup', {
      description: 'Subnet group for ElastiCache Redis',
      subnetIds: vpc.selectSubnets({
        subnetType: ec2.SubnetType.PRIVATE_ISOLATED,
      }).subnetIds,
      cacheSubnetGroupName: config.makeName('redis-subnets').toLowerCase(),
    });

    this.cluster = new elasticache.CfnCacheCluster(this, 'RedisCluster', {
      cacheNodeType: 'cache.t4g.micro',
      engine: 'redis',
      engineVersion: '7.1',
      numCacheNodes: 1,
      clusterName: config.makeName('redis').toLowerCase().substring(0, 40),
      vpcSecurityGroupIds: [securityGroup.securityGroupId],
      cacheSubnetGroupName: subnetGroup.cacheSubnetGroupName,
      port: 6379,
      snapshotRetentionLimit: 1,
    });
    this.cluster.node.addDependency(subnetGroup);

    const url = `redis://${this.cluster.attrRedisEndpointAddress}:${this.cluster.attrRedisEndpointPort}`;
    this.urlSecret = new secretsmanager.Secret(this, 'RedisUrl', {
      secretName: `${config.makeName()}/redis-url`,
      description: 'Redis connection URL',
      secretStringValue: cdk.SecretValue.unsafePlainText(url),
    });

    new cdk.CfnOutput(this, 'RedisEndpoint', {
      value: this.cluster.attrRedisEndpointAddress,
      description: 'ElastiCache Redis endpoint',
    });
  }
}
