import * as cdk from 'aws-cdk-lib/core';
import { NagPackSuppression, NagSuppressions } from 'cdk-nag';
import { AppConfig } from './config';

/**
 * AwsSolutions findings accepted for every stack in the deployment.
 */
export const stackSuppressions = (config: AppConfig): NagPackSuppression[] => [
  {
    id: 'AwsSolutions-IAM4',
    reason: 'The ECS task execution role uses the AWS managed AmazonECSTaskExecutionRolePolicy',
    appliesTo: [
      'Policy::arn:<AWS::Partition>:iam::aws:policy/service-role/AmazonECSTaskExecutionRolePolicy',
    ],
  },
  {
    id: 'AwsSolutions-IAM5',
    reason: 'ECR authorization tokens and log streams cannot be scoped below the account, and S3 object access is scoped per bucket',
    appliesTo: [
      'Resource::*',
      ...[config.privateBucketName, config.publicBucketName, config.audioBucketName]
        .map((bucket) => `Resource::arn:aws:s3:::${bucket}/*`),
    ],
  },
  {
    id: 'AwsSolutions-ECS2',
    reason: 'Container environment holds non-secret settings only; credentials are injected from Secrets Manager',
  },
  {
    id: 'AwsSolutions-EC23',
    reason: 'The public load balancer accepts HTTP and HTTPS from any IPv4 address for the public website',
  },
  {
    id: 'AwsSolutions-ELB2',
    reason: 'Load balancer access logging is not enabled; requests are recorded by the WAF log group instead',
  },
  {
    id: 'AwsSolutions-SMG4',
    reason: 'Application secrets are rotated by redeploying; automatic rotation is not configured',
  },
  {
    id: 'AwsSolutions-VPC7',
    reason: 'VPC flow logs are not enabled for this environment',
  },
  {
    id: 'AwsSolutions-RDS3',
    reason: 'Single-AZ database instance; Multi-AZ is not required for this environment',
  },
  {
    id: 'AwsSolutions-RDS10',
    reason: 'Deletion protection is disabled; the instance is snapshotted on removal',
  },
  {
    id: 'AwsSolutions-RDS11',
    reason: 'The database listens on the default PostgreSQL port inside isolated subnets',
  },
  {
    id: 'AwsSolutions-AEC5',
    reason: 'Redis listens on the default port inside isolated subnets',
  },
  {
    id: 'AwsSolutions-S1',
    reason: 'S3 server access logs are not required for application storage buckets',
  },
  {
    id: 'AwsSolutions-S2',
    reason: 'The public bucket serves user-facing media and allows public object reads',
  },
  {
    id: 'AwsSolutions-S5',
    reason: 'The public bucket is read directly, not through a CloudFront origin access identity',
  },
];

export const suppressCdkNagRules = (stack: cdk.Stack, config: AppConfig): void => {
  NagSuppressions.addStackSuppressions(stack, stackSuppressions(config), true);
};
