import { AppConfig, AppConfigProps } from '../lib/config';

export const TEST_ENV = {
  account: '123456789012',
  region: 'ap-southeast-1',
};

export function testConfig(overrides: Partial<AppConfigProps> = {}): AppConfig {
  return new AppConfig({
    appName: 'studio',
    environment: 'test',
    account: TEST_ENV.account,
    region: TEST_ENV.region,
    domainName: 'app.example.com',
    secrets: [
      { name: 'secret_key', managed: true },
      { name: 'openai_api_key', managed: false },
      { name: 'slack_bot_token', managed: false },
    ],
    ...overrides,
  });
}
