import * as cdk from 'aws-cdk-lib/core';
import * as ecr from 'aws-cdk-lib/aws-ecr';
import { Construct } from 'constructs';
import { AppConfig } from './config';

export interface RegistryStackProps extends cdk.StackProps {
  config: AppConfig;
}

/**
 * Container image registry for the application.
 *
 * Lifecycle rules:
 * 1. expire untagged images 7 days after push
 * 2. keep at most 4 images of any tag status
 */
export class RegistryStack extends cdk.Stack {
  public readonly repository: ecr.Repository;

  constructor(scope: Construct, id: string, props: RegistryStackProps) {
    super(scope, id, props);

    const { config } = props;
    const removalPolicy = config.registryRemovalPolicy === 'retain'
      ? cdk.RemovalPolicy.RETAIN
      : cdk.RemovalPolicy.DESTROY;

    this.repository = new ecr.Repository(this, 'Repository', {
      repositoryName: config.ecrRepoName,
      removalPolicy,
    });

    this.repository.addLifecycleRule({
      description: 'Expire untagged images after 7 days',
      rulePriority: 1,
      tagStatus: ecr.TagStatus.UNTAGGED,
      maxImageAge: cdk.Duration.days(7),
    });
    this.repository.addLifecycleRule({
      description: 'Keep the 4 most recent images',
      rulePriority: 2,
      tagStatus: ecr.TagStatus.ANY,
      maxImageCount: 4,
    });

    if (removalPolicy === cdk.RemovalPolicy.DESTROY) {
      cdk.Annotations.of(this).addWarning(
        `Repository ${config.ecrRepoName} and its images are deleted with the stack. Set REGISTRY_REMOVAL_POLICY=retain to keep them.`,
      );
    }

    new cdk.CfnOutput(this, 'RepositoryArn', {
      value: this.repository.repositoryArn,
      description: 'ECR repository ARN',
      exportName: config.makeName('RepositoryArn'),
    });

    new cdk.CfnOutput(this, 'RepositoryUri', {
      value: this.repository.repositoryUri,
      description: 'ECR repository URI',
      exportName: config.makeName('RepositoryUri'),
    });
  }
}
