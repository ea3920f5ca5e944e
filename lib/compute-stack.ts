import * as cdk from 'aws-cdk-lib/core';
import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as ecr from 'aws-cdk-lib/aws-ecr';
import * as ecs from 'aws-cdk-lib/aws-ecs';
import * as ecsPatterns from 'aws-cdk-lib/aws-ecs-patterns';
import * as elbv2 from 'aws-cdk-lib/aws-elasticloadbalancingv2';
import * as iam from 'aws-cdk-lib/aws-iam';
import * as logs from 'aws-cdk-lib/aws-logs';
import * as secretsmanager from 'aws-cdk-lib/aws-secretsmanager';
import { Construct } from 'constructs';
import { CacheEndpoint } from './cache-stack';
import { AppConfig } from './config';
import { DatabaseEndpoint } from './database-stack';
import { CertificateSource } from './domain-stack';

export const MIGRATION_CONTAINER_NAME = 'migrate';
export const WEB_CONTAINER_NAME = 'web';

export interface ComputeStackProps extends cdk.StackProps {
  config: AppConfig;
  vpc: ec2.IVpc;
  repository: ecr.IRepository;
  database: DatabaseEndpoint;
  cache: CacheEndpoint;
  domain: CertificateSource;
}

/**
 * Load-balanced Fargate service running the web application.
 *
 * Each task runs two containers from the same image:
 * - `migrate` applies database migrations and exits
 * - `web` serves traffic, and only starts once `migrate` exited 0
 *
 * If `migrate` exits non-zero the web container never starts and the
 * deployment fails.
 */
export class ComputeStack extends cdk.Stack {
  public readonly cluster: ecs.Cluster;
  public readonly taskDefinition: ecs.FargateTaskDefinition;
  public readonly service: ecsPatterns.ApplicationLoadBalancedFargateService;
  public readonly loadBalancer: elbv2.ApplicationLoadBalancer;

  constructor(scope: Construct, id: string, props: ComputeStackProps) {
    super(scope, id, props);

    const { config, vpc } = props;
    const sizing = config.sizing;

    // ================================================================
    // Security Groups
    // ================================================================
    const httpSg = new ec2.SecurityGroup(this, 'HttpSecurityGroup', {
      vpc,
      description: 'Allow inbound HTTP',
      allowAllOutbound: true,
    });
    httpSg.addIngressRule(ec2.Peer.anyIpv4(), ec2.Port.tcp(80), 'Allow HTTP');

    const httpsSg = new ec2.SecurityGroup(this, 'HttpsSecurityGroup', {
      vpc,
      description: 'Allow inbound HTTPS',
      allowAllOutbound: true,
    });
    httpsSg.addIngressRule(ec2.Peer.anyIpv4(), ec2.Port.tcp(443), 'Allow HTTPS');

    // ================================================================
    // Cluster and Service
    // ================================================================
    this.cluster = new ecs.Cluster(this, 'Cluster', {
      vpc,
      clusterName: config.makeName('Cluster'),
      containerInsightsV2: ecs.ContainerInsights.ENABLED,
    });

    this.taskDefinition = this.createTaskDefinition(props);

    this.service = new ecsPatterns.ApplicationLoadBalancedFargateService(this, 'Service', {
      cluster: this.cluster,
      serviceName: config.makeName('web'),
      taskDefinition: this.taskDefinition,
      desiredCount: sizing.desiredCount,
      securityGroups: [httpSg, httpsSg],
      publicLoadBalancer: true,
      loadBalancerName: config.makeName('LoadBalancer'),
      certificate: props.domain.certificate,
      protocol: elbv2.ApplicationProtocol.HTTPS,
      redirectHTTP: true,
    });
    this.loadBalancer = this.service.loadBalancer;

    const scaling = this.service.service.autoScaleTaskCount({
      minCapacity: sizing.minCapacity,
      maxCapacity: sizing.maxCapacity,
    });
    scaling.scaleOnCpuUtilization('CpuScaling', {
      targetUtilizationPercent: sizing.targetCpuUtilizationPercent,
      scaleInCooldown: cdk.Duration.seconds(sizing.scalingCooldownSeconds),
      scaleOutCooldown: cdk.Duration.seconds(sizing.scalingCooldownSeconds),
    });

    new cdk.CfnOutput(this, 'LoadBalancerDns', {
      value: this.loadBalancer.loadBalancerDnsName,
      description: 'Application load balancer DNS name',
      exportName: config.makeName('LoadBalancerDns'),
    });
  }

  private createTaskDefinition(props: ComputeStackProps): ecs.FargateTaskDefinition {
    const { config } = props;

    const taskDefinition = new ecs.FargateTaskDefinition(this, 'TaskDefinition', {
      family: config.makeName('web'),
      cpu: config.sizing.cpu,
      memoryLimitMiB: config.sizing.memoryLimitMiB,
      executionRole: this.createExecutionRole(),
      taskRole: this.createTaskRole(config),
    });

    const logGroup = new logs.LogGroup(this, 'ContainerLogs', {
      retention: logs.RetentionDays.ONE_MONTH,
      removalPolicy: cdk.RemovalPolicy.DESTROY,
    });
    const logging = ecs.LogDrivers.awsLogs({
      streamPrefix: config.makeName(),
      logGroup,
    });

    const image = ecs.ContainerImage.fromEcrRepository(props.repository, 'latest');
    const environment = this.containerEnvironment(props);
    const secrets = this.containerSecrets(props);

    const migrationContainer = taskDefinition.addContainer('MigrationContainer', {
      containerName: MIGRATION_CONTAINER_NAME,
      image,
      command: [...config.migrationCommand],
      essential: false,
      environment,
      secrets,
      logging,
    });

    const webContainer = taskDefinition.addContainer('WebContainer', {
      containerName: WEB_CONTAINER_NAME,
      image,
      essential: true,
      portMappings: [{ containerPort: config.containerPort }],
      environment,
      secrets,
      logging,
    });

    webContainer.addContainerDependencies({
      container: migrationContainer,
      condition: ecs.ContainerDependencyCondition.SUCCESS,
    });

    return taskDefinition;
  }

  private containerEnvironment(props: ComputeStackProps): Record<string, string> {
    const { config, database } = props;
    const environment: Record<string, string> = {
      ACCOUNT_EMAIL_VERIFICATION: config.emailVerification,
      ALLOWED_HOSTS: config.domainName,
      AWS_PRIVATE_STORAGE_BUCKET_NAME: config.privateBucketName,
      AWS_PUBLIC_STORAGE_BUCKET_NAME: config.publicBucketName,
      AWS_AUDIO_STORAGE_BUCKET_NAME: config.audioBucketName,
      AWS_S3_REGION: config.region,
      USE_S3_STORAGE: 'True',
      DJANGO_DATABASE_NAME: config.databaseName,
      DJANGO_DATABASE_HOST: database.instance.dbInstanceEndpointAddress,
      DJANGO_DATABASE_PORT: database.instance.dbInstanceEndpointPort,
      DJANGO_EMAIL_BACKEND: config.emailBackend,
      DJANGO_SECURE_SSL_REDIRECT: 'false', // TLS terminates at the load balancer
      PORT: String(config.containerPort),
      SIGNUP_ENABLED: config.signupEnabled ? 'True' : 'False',
      PRIVACY_POLICY_URL: config.privacyPolicyUrl,
      TERMS_URL: config.termsUrl,
      SLACK_BOT_NAME: config.slackBotName,
      TASKBADGER_ORG: config.taskbadgerOrg,
      TASKBADGER_PROJECT: config.taskbadgerProject,
    };
    if (config.settingsModule) {
      environment.DJANGO_SETTINGS_MODULE = config.settingsModule;
    }
    return environment;
  }

  private containerSecrets(props: ComputeStackProps): Record<string, ecs.Secret> {
    const { config, database, cache } = props;

    const secretKey = new secretsmanager.Secret(this, 'SecretKey', {
      secretName: config.secretKeySecretName,
      description: 'Application secret key',
      generateSecretString: {
        passwordLength: 50,
      },
    });

    const secrets: Record<string, ecs.Secret> = {
      DJANGO_DATABASE_USER: ecs.Secret.fromSecretsManager(database.credentials, 'username'),
      DJANGO_DATABASE_PASSWORD: ecs.Secret.fromSecretsManager(database.credentials, 'password'),
      REDIS_URL: ecs.Secret.fromSecretsManager(cache.urlSecret),
      SECRET_KEY: ecs.Secret.fromSecretsManager(secretKey),
    };

    for (const secret of config.unmanagedSecrets()) {
      const variable = secret.name.toUpperCase();
      if (variable in secrets) {
        throw new Error(`Secret '${secret.name}' would replace the built-in container secret ${variable}`);
      }
      secrets[variable] = ecs.Secret.fromSecretsManager(
        secretsmanager.Secret.fromSecretNameV2(this, `Secret-${secret.name}`, secret.name),
      );
    }

    return secrets;
  }

  /** Used by the ECS agent: pull images, write logs, read secrets. */
  private createExecutionRole(): iam.Role {
    const role = new iam.Role(this, 'TaskExecutionRole', {
      assumedBy: new iam.ServicePrincipal('ecs-tasks.amazonaws.com'),
      managedPolicies: [
        iam.ManagedPolicy.fromAwsManagedPolicyName('service-role/AmazonECSTaskExecutionRolePolicy'),
      ],
    });
    role.addToPolicy(new iam.PolicyStatement({
      effect: iam.Effect.ALLOW,
      actions: [
        'ecr:BatchCheckLayerAvailability',
        'ecr:BatchGetImage',
        'ecr:GetAuthorizationToken',
        'ecr:GetDownloadUrlForLayer',
        'logs:CreateLogStream',
        'logs:PutLogEvents',
      ],
      resources: ['*'],
    }));
    return role;
  }

  /** Used by the application code in both containers. */
  private createTaskRole(config: AppConfig): iam.Role {
    const role = new iam.Role(this, 'TaskRole', {
      assumedBy: new iam.ServicePrincipal('ecs-tasks.amazonaws.com'),
    });

    const buckets = [config.privateBucketName, config.publicBucketName, config.audioBucketName];
    role.addToPolicy(new iam.PolicyStatement({
      effect: iam.Effect.ALLOW,
      actions: [
        's3:DeleteObject',
        's3:GetBucketAcl',
        's3:GetObject',
        's3:GetObjectAcl',
        's3:ListBucket',
        's3:PutObject',
        's3:PutObjectAcl',
      ],
      resources: buckets.flatMap((bucket) => [`arn:aws:s3:::${bucket}`, `arn:aws:s3:::${bucket}/*`]),
    }));
    return role;
  }
}
