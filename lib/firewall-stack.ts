import * as cdk from 'aws-cdk-lib/core';
import * as iam from 'aws-cdk-lib/aws-iam';
import * as logs from 'aws-cdk-lib/aws-logs';
import * as wafv2 from 'aws-cdk-lib/aws-wafv2';
import { Construct } from 'constructs';
import { AppConfig } from './config';

export const RATE_LIMIT_PER_IP = 2000;

export interface FirewallStackProps extends cdk.StackProps {
  config: AppConfig;
  /**
   * ARN of the application load balancer the web ACL protects
   */
  loadBalancerArn: string;
}

/**
 * Regional WAF in front of the application load balancer.
 *
 * Both rules run in count mode: matches are recorded in metrics and logs but
 * no request is blocked.
 */
export class FirewallStack extends cdk.Stack {
  public readonly webAcl: wafv2.CfnWebACL;
  public readonly logGroup: logs.LogGroup;
  public readonly loggingConfiguration: wafv2.CfnLoggingConfiguration;

  constructor(scope: Construct, id: string, props: FirewallStackProps) {
    super(scope, id, props);

    const { config } = props;

    this.webAcl = new wafv2.CfnWebACL(this, 'WebAcl', {
      name: config.makeName('WebAcl'),
      description: 'Managed common rules and per-IP rate limiting, count only',
      scope: 'REGIONAL',
      defaultAction: { allow: {} },
      visibilityConfig: {
        cloudWatchMetricsEnabled: true,
        metricName: config.makeName('WebAclMetrics'),
        sampledRequestsEnabled: true,
      },
      rules: [
        // AWS Managed Rules - Common Rule Set (CRS)
        {
          name: 'AWSManagedCommonRuleSet',
          priority: 0,
          overrideAction: { count: {} },
          statement: {
            managedRuleGroupStatement: {
              vendorName: 'AWS',
              name: 'AWSManagedRulesCommonRuleSet',
            },
          },
          visibilityConfig: {
            cloudWatchMetricsEnabled: true,
            metricName: config.makeName('CommonRuleSetMetrics'),
            sampledRequestsEnabled: true,
          },
        },
        // Rate limiting - requests per 5 minutes per IP
        {
          name: 'RateLimitRule',
          priority: 1,
          action: { count: {} },
          statement: {
            rateBasedStatement: {
              limit: RATE_LIMIT_PER_IP,
              aggregateKeyType: 'IP',
            },
          },
          visibilityConfig: {
            cloudWatchMetricsEnabled: true,
            metricName: config.makeName('RateLimitMetrics'),
            sampledRequestsEnabled: true,
          },
        },
      ],
    });

    new wafv2.CfnWebACLAssociation(this, 'WebAclAssociation', {
      resourceArn: props.loadBalancerArn,
      webAclArn: this.webAcl.attrArn,
    });

    // WAF only delivers to log groups whose name starts with aws-waf-logs-
    this.logGroup = new logs.LogGroup(this, 'WafLogGroup', {
      logGroupName: `aws-waf-logs-${config.makeName('waf-logs')}`,
      retention: logs.RetentionDays.TWO_YEARS,
      removalPolicy: cdk.RemovalPolicy.RETAIN,
    });

    this.logGroup.addToResourcePolicy(new iam.PolicyStatement({
      effect: iam.Effect.ALLOW,
      actions: ['logs:CreateLogStream', 'logs:PutLogEvents'],
      principals: [new iam.ServicePrincipal('wafv2.amazonaws.com')],
      resources: [this.logGroup.logGroupArn],
    }));

    // The destination is the bare log group ARN, without the trailing ':*'
    // that the LogGroup's Arn attribute carries.
    const logDestinationArn = this.formatArn({
      service: 'logs',
      resource: 'log-group',
      resourceName: this.logGroup.logGroupName,
      arnFormat: cdk.ArnFormat.COLON_RESOURCE_NAME,
    });

    this.loggingConfiguration = new wafv2.CfnLoggingConfiguration(this, 'WafLoggingConfiguration', {
      resourceArn: this.webAcl.attrArn,
      logDestinationConfigs: [logDestinationArn],
    });
    // Covers the log group and its resource policy
    this.loggingConfiguration.node.addDependency(this.logGroup);

    cdk.Annotations.of(this).addInfo(
      `Web ACL ${config.makeName('WebAcl')} rules are in count mode; matching requests are logged, not blocked.`,
    );

    new cdk.CfnOutput(this, 'WebAclArn', {
      value: this.webAcl.attrArn,
      description: 'ARN of the WAF Web ACL',
      exportName: config.makeName('WebAclArn'),
    });

    new cdk.CfnOutput(this, 'WafLogGroupArn', {
      value: this.logGroup.logGroupArn,
      description: 'ARN of the WAF log group',
      exportName: config.makeName('WafLogGroupArn'),
    });
  }
}
