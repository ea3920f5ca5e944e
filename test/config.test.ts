import * as cdk from 'aws-cdk-lib/core';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  AppConfig,
  DEFAULT_SIZING,
  configPropsFromValues,
  loadConfig,
  readSecretsFile,
} from '../lib/config';
import { testConfig } from './helpers';

describe('AppConfig', () => {
  let config: AppConfig;

  beforeAll(() => {
    config = testConfig();
  });

  describe('Naming', () => {
    test('prefixes names with app and environment', () => {
      expect(config.makeName()).toBe('studio-test');
      expect(config.makeName('Cluster')).toBe('studio-test-Cluster');
      expect(config.stackName('waf')).toBe('studio-test-waf');
    });
  });

  describe('Defaults', () => {
    test('derives resource names from the prefix', () => {
      expect(config.ecrRepoName).toBe('studio-test');
      expect(config.privateBucketName).toBe('studio-test-private');
      expect(config.publicBucketName).toBe('studio-test-public');
      expect(config.audioBucketName).toBe('studio-test-audio');
      expect(config.secretKeySecretName).toBe('studio-test/secret-key');
    });

    test('uses the app name with underscores as database name', () => {
      expect(testConfig({ appName: 'my-studio' }).databaseName).toBe('my_studio');
    });

    test('runs migrations with manage.py on port 8000', () => {
      expect(config.containerPort).toBe(8000);
      expect(config.migrationCommand).toEqual(['python', 'manage.py', 'migrate']);
    });

    test('uses SES mail with mandatory verification and no settings module', () => {
      expect(config.emailBackend).toBe('anymail.backends.amazon_ses.EmailBackend');
      expect(config.emailVerification).toBe('mandatory');
      expect(config.settingsModule).toBe('');
    });

    test('destroys the registry and disables signup', () => {
      expect(config.registryRemovalPolicy).toBe('destroy');
      expect(config.signupEnabled).toBe(false);
    });

    test('uses the default service sizing', () => {
      expect(config.sizing).toEqual(DEFAULT_SIZING);
    });

    test('merges partial sizing over the defaults', () => {
      const sized = testConfig({ sizing: { desiredCount: 2, maxCapacity: 4 } });
      expect(sized.sizing).toEqual({ ...DEFAULT_SIZING, desiredCount: 2, maxCapacity: 4 });
    });
  });

  describe('Environment', () => {
    test('exposes account and region for stack props', () => {
      expect(config.cdkEnv()).toEqual({ account: '123456789012', region: 'ap-southeast-1' });
    });

    test('treats an empty account as unset', () => {
      expect(testConfig({ account: '' }).cdkEnv()).toEqual({ account: undefined, region: 'ap-southeast-1' });
    });
  });

  describe('Secrets', () => {
    test('lists only unmanaged secrets for import', () => {
      expect(config.unmanagedSecrets().map((secret) => secret.name)).toEqual(['openai_api_key', 'slack_bot_token']);
    });

    test('rejects names that are not valid variable names', () => {
      expect(() => testConfig({ secrets: [{ name: 'openai-api-key', managed: false }] })).toThrow(
        "Secret name 'openai-api-key' must start with a letter and contain only letters, digits and underscores",
      );
    });

    test('rejects names that collide ignoring case', () => {
      expect(() => testConfig({
        secrets: [
          { name: 'sentry_dsn', managed: false },
          { name: 'SENTRY_DSN', managed: false },
        ],
      })).toThrow("Secret 'SENTRY_DSN' is declared more than once");
    });
  });

  describe('Validation', () => {
    test('is frozen', () => {
      expect(Object.isFrozen(config)).toBe(true);
      expect(Object.isFrozen(config.sizing)).toBe(true);
    });

    test('requires a domain name', () => {
      expect(() => testConfig({ domainName: '' })).toThrow("Missing required configuration: 'DOMAIN_NAME'");
    });

    test('requires a region', () => {
      expect(() => testConfig({ region: ' ' })).toThrow("Missing required configuration: 'CDK_REGION'");
    });

    test('limits app name and environment to a 19 character prefix', () => {
      expect(() => testConfig({ appName: 'openchatstudio', environment: 'production' })).toThrow(
        "Configuration 'APP_NAME' and 'ENVIRONMENT' are too long: 'openchatstudio-production' has 25 characters, at most 19 allowed",
      );
    });

    test('accepts a prefix that keeps the load balancer name within 32 characters', () => {
      const longest = testConfig({ environment: 'production-1' });
      expect(longest.makeName('LoadBalancer')).toBe('studio-production-1-LoadBalancer');
      expect(longest.makeName('LoadBalancer')).toHaveLength(32);
    });

    test('requires a lowercase app name', () => {
      expect(() => testConfig({ appName: 'Studio' })).toThrow(
        "Configuration 'APP_NAME' must be lowercase letters, digits and hyphens, got 'Studio'",
      );
    });

    test('requires min <= desired <= max', () => {
      expect(() => testConfig({ sizing: { minCapacity: 3, maxCapacity: 4 } })).toThrow(
        'Service capacity must satisfy min <= desired <= max, got 3 <= 1 <= 4',
      );
    });

    test('requires positive sizing values', () => {
      expect(() => testConfig({ sizing: { cpu: 0 } })).toThrow("Service sizing 'cpu' must be a positive integer, got 0");
    });

    test('caps the CPU target at 100 percent', () => {
      expect(() => testConfig({ sizing: { targetCpuUtilizationPercent: 120 } })).toThrow(
        "Service sizing 'targetCpuUtilizationPercent' must be at most 100, got 120",
      );
    });
  });
});

describe('configPropsFromValues', () => {
  test('parses typed values', () => {
    const props = configPropsFromValues('prod', {
      APP_NAME: 'studio',
      CDK_REGION: 'eu-west-1',
      DOMAIN_NAME: 'app.example.com',
      SIGNUP_ENABLED: 'Yes',
      CONTAINER_PORT: '8080',
      REGISTRY_REMOVAL_POLICY: 'RETAIN',
      SERVICE_MAX_CAPACITY: '6',
      ACCOUNT_EMAIL_VERIFICATION: 'Optional',
      DJANGO_SETTINGS_MODULE: 'studio.settings_production',
      MIGRATION_COMMAND: ' python  manage.py migrate --noinput ',
    });

    expect(props.signupEnabled).toBe(true);
    expect(props.containerPort).toBe(8080);
    expect(props.registryRemovalPolicy).toBe('retain');
    expect(props.sizing?.maxCapacity).toBe(6);
    expect(props.sizing?.cpu).toBeUndefined();
    expect(props.emailVerification).toBe('optional');
    expect(props.settingsModule).toBe('studio.settings_production');
    expect(props.migrationCommand).toEqual(['python', 'manage.py', 'migrate', '--noinput']);
  });

  test('leaves a blank migration command to the default', () => {
    expect(configPropsFromValues('prod', { MIGRATION_COMMAND: '  ' }).migrationCommand).toBeUndefined();
  });

  test('rejects an unknown email verification mode', () => {
    expect(() => configPropsFromValues('prod', { ACCOUNT_EMAIL_VERIFICATION: 'always' })).toThrow(
      "Configuration 'ACCOUNT_EMAIL_VERIFICATION' must be one of mandatory, optional, none, got 'always'",
    );
  });

  test('rejects a non-numeric port', () => {
    expect(() => configPropsFromValues('prod', { CONTAINER_PORT: '80a' })).toThrow(
      "Configuration 'CONTAINER_PORT' must be a non-negative integer, got '80a'",
    );
  });

  test('rejects an unknown boolean', () => {
    expect(() => configPropsFromValues('prod', { SIGNUP_ENABLED: 'maybe' })).toThrow(
      "Configuration 'SIGNUP_ENABLED' must be true or false, got 'maybe'",
    );
  });

  test('rejects an unknown removal policy', () => {
    expect(() => configPropsFromValues('prod', { REGISTRY_REMOVAL_POLICY: 'keep' })).toThrow(
      "Configuration 'REGISTRY_REMOVAL_POLICY' must be 'destroy' or 'retain', got 'keep'",
    );
  });
});

describe('loadConfig', () => {
  let rootDir: string;

  beforeAll(() => {
    rootDir = fs.mkdtempSync(path.join(os.tmpdir(), 'webapp-deploy-'));
    fs.writeFileSync(
      path.join(rootDir, '.env.staging'),
      [
        'APP_NAME=studio',
        'CDK_ACCOUNT=123456789012',
        'CDK_REGION=eu-west-1',
        'DOMAIN_NAME=staging.example.com',
        'SIGNUP_ENABLED=true',
        'SERVICE_MAX_CAPACITY=4',
        'UNRELATED_KEY=ignored',
      ].join('\n'),
    );
    fs.writeFileSync(
      path.join(rootDir, '.env.blank'),
      ['APP_NAME=studio', 'CDK_ACCOUNT=', 'CDK_REGION=', 'DOMAIN_NAME=app.example.com'].join('\n'),
    );
    fs.mkdirSync(path.join(rootDir, 'config'));
    fs.writeFileSync(
      path.join(rootDir, 'config', 'secrets.json'),
      JSON.stringify([
        { name: 'secret_key', managed: true },
        { name: 'sentry_dsn', managed: false },
      ]),
    );
  });

  afterAll(() => {
    fs.rmSync(rootDir, { recursive: true, force: true });
  });

  test('reads the dotenv file named by the env context', () => {
    const app = new cdk.App({ context: { env: 'staging' } });
    const config = loadConfig(app, { rootDir });

    expect(config.environment).toBe('staging');
    expect(config.makeName()).toBe('studio-staging');
    expect(config.cdkEnv()).toEqual({ account: '123456789012', region: 'eu-west-1' });
    expect(config.domainName).toBe('staging.example.com');
    expect(config.signupEnabled).toBe(true);
    expect(config.sizing.maxCapacity).toBe(4);
  });

  test('reads secrets from config/secrets.json', () => {
    const app = new cdk.App({ context: { env: 'staging' } });
    const config = loadConfig(app, { rootDir });

    expect(config.secrets).toEqual([
      { name: 'secret_key', managed: true },
      { name: 'sentry_dsn', managed: false },
    ]);
  });

  test('lets context values override the dotenv file', () => {
    const app = new cdk.App({
      context: { env: 'staging', DOMAIN_NAME: 'override.example.com', SERVICE_MAX_CAPACITY: 8 },
    });
    const config = loadConfig(app, { rootDir });

    expect(config.domainName).toBe('override.example.com');
    expect(config.sizing.maxCapacity).toBe(8);
  });

  describe('with blank account and region', () => {
    const saved = {
      account: process.env.CDK_DEFAULT_ACCOUNT,
      region: process.env.CDK_DEFAULT_REGION,
    };

    beforeEach(() => {
      process.env.CDK_DEFAULT_ACCOUNT = '999999999999';
      process.env.CDK_DEFAULT_REGION = 'us-east-2';
    });

    afterEach(() => {
      if (saved.account === undefined) {
        delete process.env.CDK_DEFAULT_ACCOUNT;
      } else {
        process.env.CDK_DEFAULT_ACCOUNT = saved.account;
      }
      if (saved.region === undefined) {
        delete process.env.CDK_DEFAULT_REGION;
      } else {
        process.env.CDK_DEFAULT_REGION = saved.region;
      }
    });

    test('falls back to the CLI defaults', () => {
      const app = new cdk.App({ context: { env: 'blank' } });
      const config = loadConfig(app, { rootDir });

      expect(config.cdkEnv()).toEqual({ account: '999999999999', region: 'us-east-2' });
    });

    test('keeps a value from the dotenv file over the CLI defaults', () => {
      const app = new cdk.App({ context: { env: 'staging' } });
      const config = loadConfig(app, { rootDir });

      expect(config.cdkEnv()).toEqual({ account: '123456789012', region: 'eu-west-1' });
    });
  });

  test('fails when the environment has no dotenv file', () => {
    const app = new cdk.App({ context: { env: 'missing' } });

    expect(() => loadConfig(app, { rootDir })).toThrow("Missing required configuration: 'APP_NAME'");
  });

  test('rejects a non-string env context', () => {
    const app = new cdk.App({ context: { env: 42 } });

    expect(() => loadConfig(app, { rootDir })).toThrow("Context 'env' must be a string, e.g. -c env=prod");
  });
});

describe('readSecretsFile', () => {
  let dir: string;

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'webapp-secrets-'));
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  const writeSecrets = (name: string, content: string): string => {
    const file = path.join(dir, name);
    fs.writeFileSync(file, content);
    return file;
  };

  test('requires a JSON array', () => {
    const file = writeSecrets('object.json', '{"name":"sentry_dsn"}');
    expect(() => readSecretsFile(file)).toThrow(`Secrets file ${file} must contain a JSON array`);
  });

  test('requires name and managed on every entry', () => {
    const file = writeSecrets('entries.json', '[{"name":"sentry_dsn","managed":false},{"name":"slack_bot_token"}]');
    expect(() => readSecretsFile(file)).toThrow(
      `Secrets file ${file}: entry 1 must be { "name": string, "managed": boolean }`,
    );
  });

  test('reports invalid JSON', () => {
    const file = writeSecrets('broken.json', '[');
    expect(() => readSecretsFile(file)).toThrow(`Secrets file ${file} is not valid JSON`);
  });
});
