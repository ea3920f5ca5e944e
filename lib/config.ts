import * as cdk from 'aws-cdk-lib/core';
import * as dotenv from 'dotenv';
import * as fs from 'fs';
import * as path from 'path';

/**
 * A secret injected into the application containers.
 *
 * Managed secrets are created by this deployment. Unmanaged secrets are
 * created by an operator out of band and only referenced by name.
 */
export interface SecretEntry {
  readonly name: string;
  readonly managed: boolean;
}

export interface ServiceSizing {
  readonly cpu: number;
  readonly memoryLimitMiB: number;
  readonly desiredCount: number;
  readonly minCapacity: number;
  readonly maxCapacity: number;
  readonly targetCpuUtilizationPercent: number;
  readonly scalingCooldownSeconds: number;
}

export type RegistryRemovalPolicy = 'destroy' | 'retain';

/** django-allauth `ACCOUNT_EMAIL_VERIFICATION` values. */
export type EmailVerification = 'mandatory' | 'optional' | 'none';

export interface AppConfigProps {
  readonly appName: string;
  readonly environment: string;
  readonly account?: string;
  readonly region: string;
  readonly domainName: string;
  readonly ecrRepoName?: string;
  readonly registryRemovalPolicy?: RegistryRemovalPolicy;
  readonly privateBucketName?: string;
  readonly publicBucketName?: string;
  readonly audioBucketName?: string;
  readonly databaseName?: string;
  readonly secretKeySecretName?: string;
  readonly signupEnabled?: boolean;
  readonly privacyPolicyUrl?: string;
  readonly termsUrl?: string;
  readonly slackBotName?: string;
  /** Empty leaves `DJANGO_SETTINGS_MODULE` to the image's default. */
  readonly settingsModule?: string;
  readonly emailBackend?: string;
  readonly emailVerification?: EmailVerification;
  readonly taskbadgerOrg?: string;
  readonly taskbadgerProject?: string;
  readonly containerPort?: number;
  readonly migrationCommand?: readonly string[];
  readonly sizing?: Partial<ServiceSizing>;
  readonly secrets?: readonly SecretEntry[];
}

export const DEFAULT_SIZING: ServiceSizing = {
  cpu: 256,
  memoryLimitMiB: 512,
  desiredCount: 1,
  minCapacity: 1,
  maxCapacity: 2,
  targetCpuUtilizationPercent: 70,
  scalingCooldownSeconds: 60,
};

const NAME_LABEL = /^[a-z][a-z0-9-]*$/;
const SECRET_NAME = /^[A-Za-z][A-Za-z0-9_]*$/;
// Load balancer names are at most 32 characters and `-LoadBalancer` takes 13
const MAX_PREFIX_LENGTH = 19;
const EMAIL_VERIFICATION: readonly EmailVerification[] = ['mandatory', 'optional', 'none'];

/**
 * Deployment configuration shared by every stack.
 *
 * Built once at app start-up and passed into each stack constructor.
 * Instances are frozen.
 */
export class AppConfig {
  public readonly appName: string;
  public readonly environment: string;
  public readonly account?: string;
  public readonly region: string;
  public readonly domainName: string;
  public readonly ecrRepoName: string;
  public readonly registryRemovalPolicy: RegistryRemovalPolicy;
  public readonly privateBucketName: string;
  public readonly publicBucketName: string;
  public readonly audioBucketName: string;
  public readonly databaseName: string;
  public readonly secretKeySecretName: string;
  public readonly signupEnabled: boolean;
  public readonly privacyPolicyUrl: string;
  public readonly termsUrl: string;
  public readonly slackBotName: string;
  public readonly settingsModule: string;
  public readonly emailBackend: string;
  public readonly emailVerification: EmailVerification;
  public readonly taskbadgerOrg: string;
  public readonly taskbadgerProject: string;
  public readonly containerPort: number;
  public readonly migrationCommand: readonly string[];
  public readonly sizing: ServiceSizing;
  public readonly secrets: readonly SecretEntry[];

  constructor(props: AppConfigProps) {
    this.appName = requireLabel('APP_NAME', props.appName);
    this.environment = requireLabel('ENVIRONMENT', props.environment);
    this.account = props.account || undefined;
    this.region = requireValue('CDK_REGION', props.region);
    this.domainName = requireValue('DOMAIN_NAME', props.domainName);

    const prefix = `${this.appName}-${this.environment}`;
    if (prefix.length > MAX_PREFIX_LENGTH) {
      throw new Error(
        `Configuration 'APP_NAME' and 'ENVIRONMENT' are too long: '${prefix}' has ${prefix.length} characters, at most ${MAX_PREFIX_LENGTH} allowed`,
      );
    }
    this.ecrRepoName = props.ecrRepoName || prefix;
    this.registryRemovalPolicy = props.registryRemovalPolicy ?? 'destroy';
    this.privateBucketName = props.privateBucketName || `${prefix}-private`;
    this.publicBucketName = props.publicBucketName || `${prefix}-public`;
    this.audioBucketName = props.audioBucketName || `${prefix}-audio`;
    this.databaseName = props.databaseName || this.appName.replace(/-/g, '_');
    this.secretKeySecretName = props.secretKeySecretName || `${prefix}/secret-key`;
    this.signupEnabled = props.signupEnabled ?? false;
    this.privacyPolicyUrl = props.privacyPolicyUrl ?? '';
    this.termsUrl = props.termsUrl ?? '';
    this.slackBotName = props.slackBotName ?? '';
    this.settingsModule = props.settingsModule ?? '';
    this.emailBackend = props.emailBackend || 'anymail.backends.amazon_ses.EmailBackend';
    this.emailVerification = props.emailVerification ?? 'mandatory';
    this.taskbadgerOrg = props.taskbadgerOrg ?? '';
    this.taskbadgerProject = props.taskbadgerProject ?? '';
    this.containerPort = props.containerPort ?? 8000;
    this.migrationCommand = Object.freeze([...(props.migrationCommand ?? ['python', 'manage.py', 'migrate'])]);
    this.sizing = Object.freeze(validateSizing({
      cpu: props.sizing?.cpu ?? DEFAULT_SIZING.cpu,
      memoryLimitMiB: props.sizing?.memoryLimitMiB ?? DEFAULT_SIZING.memoryLimitMiB,
      desiredCount: props.sizing?.desiredCount ?? DEFAULT_SIZING.desiredCount,
      minCapacity: props.sizing?.minCapacity ?? DEFAULT_SIZING.minCapacity,
      maxCapacity: props.sizing?.maxCapacity ?? DEFAULT_SIZING.maxCapacity,
      targetCpuUtilizationPercent: props.sizing?.targetCpuUtilizationPercent ?? DEFAULT_SIZING.targetCpuUtilizationPercent,
      scalingCooldownSeconds: props.sizing?.scalingCooldownSeconds ?? DEFAULT_SIZING.scalingCooldownSeconds,
    }));
    this.secrets = Object.freeze(validateSecrets(props.secrets ?? []));

    Object.freeze(this);
  }

  /**
   * Resource name scoped to this app and environment,
   * e.g. `makeName('Cluster')` is `studio-prod-Cluster`.
   */
  public makeName(name?: string): string {
    const prefix = `${this.appName}-${this.environment}`;
    return name ? `${prefix}-${name}` : prefix;
  }

  public stackName(name: string): string {
    return this.makeName(name);
  }

  public cdkEnv(): cdk.Environment {
    return { account: this.account, region: this.region };
  }

  public unmanagedSecrets(): SecretEntry[] {
    return this.secrets.filter((secret) => !secret.managed);
  }
}

export interface LoadConfigOptions {
  /**
   * Directory holding `.env.<env>` and `config/secrets.json`.
   * @default the repository root
   */
  readonly rootDir?: string;
}

/** Keys read from the dotenv file, each overridable with `-c KEY=value`. */
export const CONFIG_KEYS = [
  'APP_NAME',
  'CDK_ACCOUNT',
  'CDK_REGION',
  'DOMAIN_NAME',
  'ECR_REPO_NAME',
  'REGISTRY_REMOVAL_POLICY',
  'S3_PRIVATE_BUCKET_NAME',
  'S3_PUBLIC_BUCKET_NAME',
  'S3_AUDIO_BUCKET_NAME',
  'DATABASE_NAME',
  'SECRET_KEY_SECRET_NAME',
  'SIGNUP_ENABLED',
  'PRIVACY_POLICY_URL',
  'TERMS_URL',
  'SLACK_BOT_NAME',
  'DJANGO_SETTINGS_MODULE',
  'DJANGO_EMAIL_BACKEND',
  'ACCOUNT_EMAIL_VERIFICATION',
  'TASKBADGER_ORG',
  'TASKBADGER_PROJECT',
  'MIGRATION_COMMAND',
  'CONTAINER_PORT',
  'SERVICE_CPU',
  'SERVICE_MEMORY_MIB',
  'SERVICE_DESIRED_COUNT',
  'SERVICE_MIN_CAPACITY',
  'SERVICE_MAX_CAPACITY',
] as const;

export type ConfigKey = (typeof CONFIG_KEYS)[number];
export type ConfigValues = Partial<Record<ConfigKey, string>>;

/**
 * Load configuration for the environment named by the `env` context value.
 *
 * Values come from `.env.<env>` and are overridden by CDK context of the
 * same key. Account and region fall back to the CLI's defaults.
 */
export function loadConfig(app: cdk.App, options: LoadConfigOptions = {}): AppConfig {
  const rootDir = options.rootDir ?? path.join(__dirname, '..');

  const env: unknown = app.node.tryGetContext('env') ?? 'dev';
  if (typeof env !== 'string') {
    throw new Error("Context 'env' must be a string, e.g. -c env=prod");
  }

  const values: ConfigValues = {};
  const envFile = path.join(rootDir, `.env.${env}`);
  if (fs.existsSync(envFile)) {
    const parsed = dotenv.parse(fs.readFileSync(envFile));
    for (const key of CONFIG_KEYS) {
      if (parsed[key] !== undefined) {
        values[key] = parsed[key];
      }
    }
  }

  for (const key of CONFIG_KEYS) {
    const override: unknown = app.node.tryGetContext(key);
    if (override !== undefined && override !== null) {
      values[key] = String(override);
    }
  }

  // A blank `KEY=` line counts as unset
  if (!values.CDK_ACCOUNT?.trim()) {
    values.CDK_ACCOUNT = process.env.CDK_DEFAULT_ACCOUNT;
  }
  if (!values.CDK_REGION?.trim()) {
    values.CDK_REGION = process.env.CDK_DEFAULT_REGION;
  }

  const secretsFile = path.join(rootDir, 'config', 'secrets.json');
  const secrets = fs.existsSync(secretsFile) ? readSecretsFile(secretsFile) : [];

  return new AppConfig(configPropsFromValues(env, values, secrets));
}

/** Map raw string values onto typed config properties. */
export function configPropsFromValues(
  environment: string,
  values: ConfigValues,
  secrets: readonly SecretEntry[] = [],
): AppConfigProps {
  return {
    appName: values.APP_NAME ?? '',
    environment,
    account: values.CDK_ACCOUNT,
    region: values.CDK_REGION ?? '',
    domainName: values.DOMAIN_NAME ?? '',
    ecrRepoName: values.ECR_REPO_NAME,
    registryRemovalPolicy: parseRemovalPolicy(values.REGISTRY_REMOVAL_POLICY),
    privateBucketName: values.S3_PRIVATE_BUCKET_NAME,
    publicBucketName: values.S3_PUBLIC_BUCKET_NAME,
    audioBucketName: values.S3_AUDIO_BUCKET_NAME,
    databaseName: values.DATABASE_NAME,
    secretKeySecretName: values.SECRET_KEY_SECRET_NAME,
    signupEnabled: parseBoolean('SIGNUP_ENABLED', values.SIGNUP_ENABLED),
    privacyPolicyUrl: values.PRIVACY_POLICY_URL,
    termsUrl: values.TERMS_URL,
    slackBotName: values.SLACK_BOT_NAME,
    settingsModule: values.DJANGO_SETTINGS_MODULE,
    emailBackend: values.DJANGO_EMAIL_BACKEND,
    emailVerification: parseEmailVerification(values.ACCOUNT_EMAIL_VERIFICATION),
    taskbadgerOrg: values.TASKBADGER_ORG,
    taskbadgerProject: values.TASKBADGER_PROJECT,
    migrationCommand: parseCommand(values.MIGRATION_COMMAND),
    containerPort: parseInteger('CONTAINER_PORT', values.CONTAINER_PORT),
    sizing: {
      cpu: parseInteger('SERVICE_CPU', values.SERVICE_CPU),
      memoryLimitMiB: parseInteger('SERVICE_MEMORY_MIB', values.SERVICE_MEMORY_MIB),
      desiredCount: parseInteger('SERVICE_DESIRED_COUNT', values.SERVICE_DESIRED_COUNT),
      minCapacity: parseInteger('SERVICE_MIN_CAPACITY', values.SERVICE_MIN_CAPACITY),
      maxCapacity: parseInteger('SERVICE_MAX_CAPACITY', values.SERVICE_MAX_CAPACITY),
    },
    secrets,
  };
}

export function readSecretsFile(file: string): SecretEntry[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(file, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`Secrets file ${file} is not valid JSON: ${reason}`);
  }
  if (!Array.isArray(parsed)) {
    throw new Error(`Secrets file ${file} must contain a JSON array`);
  }
  return parsed.map((entry: unknown, index: number) => {
    if (!isSecretEntry(entry)) {
      throw new Error(`Secrets file ${file}: entry ${index} must be { "name": string, "managed": boolean }`);
    }
    return { name: entry.name, managed: entry.managed };
  });
}

function isSecretEntry(value: unknown): value is SecretEntry {
  return (
    typeof value === 'object' &&
    value !== null &&
    'name' in value &&
    typeof value.name === 'string' &&
    'managed' in value &&
    typeof value.managed === 'boolean'
  );
}

function requireValue(key: string, value: string | undefined): string {
  if (!value || value.trim() === '') {
    throw new Error(`Missing required configuration: '${key}'`);
  }
  return value;
}

function requireLabel(key: string, value: string | undefined): string {
  const label = requireValue(key, value);
  if (!NAME_LABEL.test(label)) {
    throw new Error(`Configuration '${key}' must be lowercase letters, digits and hyphens, got '${label}'`);
  }
  return label;
}

function parseInteger(key: string, raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  if (!/^\d+$/.test(raw.trim())) {
    throw new Error(`Configuration '${key}' must be a non-negative integer, got '${raw}'`);
  }
  return Number(raw.trim());
}

function parseBoolean(key: string, raw: string | undefined): boolean | undefined {
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const normalized = raw.trim().toLowerCase();
  if (['true', '1', 'yes'].includes(normalized)) {
    return true;
  }
  if (['false', '0', 'no'].includes(normalized)) {
    return false;
  }
  throw new Error(`Configuration '${key}' must be true or false, got '${raw}'`);
}

function parseRemovalPolicy(raw: string | undefined): RegistryRemovalPolicy | undefined {
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const normalized = raw.trim().toLowerCase();
  if (normalized === 'destroy' || normalized === 'retain') {
    return normalized;
  }
  throw new Error(`Configuration 'REGISTRY_REMOVAL_POLICY' must be 'destroy' or 'retain', got '${raw}'`);
}

function parseEmailVerification(raw: string | undefined): EmailVerification | undefined {
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const normalized = raw.trim().toLowerCase();
  const match = EMAIL_VERIFICATION.find((value) => value === normalized);
  if (!match) {
    throw new Error(`Configuration 'ACCOUNT_EMAIL_VERIFICATION' must be one of ${EMAIL_VERIFICATION.join(', ')}, got '${raw}'`);
  }
  return match;
}

/** Whitespace-separated argv, e.g. `python manage.py migrate --noinput`. */
function parseCommand(raw: string | undefined): string[] | undefined {
  const args = raw?.trim().split(/\s+/).filter((arg) => arg !== '') ?? [];
  return args.length > 0 ? args : undefined;
}

function validateSizing(sizing: ServiceSizing): ServiceSizing {
  for (const [key, value] of Object.entries(sizing)) {
    if (!Number.isInteger(value) || value <= 0) {
      throw new Error(`Service sizing '${key}' must be a positive integer, got ${value}`);
    }
  }
  if (sizing.minCapacity > sizing.desiredCount || sizing.desiredCount > sizing.maxCapacity) {
    throw new Error(
      `Service capacity must satisfy min <= desired <= max, got ${sizing.minCapacity} <= ${sizing.desiredCount} <= ${sizing.maxCapacity}`,
    );
  }
  if (sizing.targetCpuUtilizationPercent > 100) {
    throw new Error(`Service sizing 'targetCpuUtilizationPercent' must be at most 100, got ${sizing.targetCpuUtilizationPercent}`);
  }
  return sizing;
}

function validateSecrets(secrets: readonly SecretEntry[]): SecretEntry[] {
  const seen = new Set<string>();
  return secrets.map((secret) => {
    if (!SECRET_NAME.test(secret.name)) {
      throw new Error(`Secret name '${secret.name}' must start with a letter and contain only letters, digits and underscores`);
    }
    const key = secret.name.toUpperCase();
    if (seen.has(key)) {
      throw new Error(`Secret '${secret.name}' is declared more than once`);
    }
    seen.add(key);
    return Object.freeze({ name: secret.name, managed: secret.managed });
  });
}
