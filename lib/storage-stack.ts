import * as cdk from 'aws-cdk-lib/core';
import * as s3 from 'aws-cdk-lib/aws-s3';
import { Construct } from 'constructs';
import { AppConfig } from './config';

export interface StorageStackProps extends cdk.StackProps {
  config: AppConfig;
}

export class StorageStack extends cdk.Stack {
  public readonly privateBucket: s3.Bucket;
  public readonly publicBucket: s3.Bucket;
  public readonly audioBucket: s3.Bucket;

  constructor(scope: Construct, id: string, props: StorageStackProps) {
    super(scope, id, props);

    const { config } = props;

    this.privateBucket = new s3.Bucket(this, 'PrivateBucket', {
      bucketName: config.privateBucketName,
      blockPublicAccess: s3.BlockPublicAccess.BLOCK_ALL,
      encryption: s3.BucketEncryption.S3_MANAGED,
      enforceSSL: true,
      removalPolicy: cdk.RemovalPolicy.RETAIN,
    });

    // Served directly to browsers (uploaded avatars, static media)
    this.publicBucket = new s3.Bucket(this, 'PublicBucket', {
      bucketName: config.publicBucketName,
      blockPublicAccess: new s3.BlockPublicAccess({
        blockPublicAcls: true,
        ignorePublicAcls: true,
        blockPublicPolicy: false,
        restrictPublicBuckets: false,
      }),
      publicReadAccess: true,
      encryption: s3.BucketEncryption.S3_MANAGED,
      enforceSSL: true,
      removalPolicy: cdk.RemovalPolicy.RETAIN,
    });

    this.audioBucket = new s3.Bucket(this, 'AudioBucket', {
      bucketName: config.audioBucketName,
      blockPublicAccess: s3.BlockPublicAccess.BLOCK_ALL,
      encryption: s3.BucketEncryption.S3_MANAGED,
      enforceSSL: true,
      removalPolicy: cdk.RemovalPolicy.RETAIN,
    });
  }
}
