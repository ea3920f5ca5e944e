import * as cdk from 'aws-cdk-lib/core';
import * as acm from 'aws-cdk-lib/aws-certificatemanager';
import { Construct } from 'constructs';
import { AppConfig } from './config';

export interface CertificateSource {
  readonly certificate: acm.ICertificate;
}

export interface DomainStackProps extends cdk.StackProps {
  config: AppConfig;
}

/**
 * TLS certificate for the application domain.
 *
 * DNS validation records are created by whoever runs the zone; the stack
 * waits in CREATE_IN_PROGRESS until they exist.
 */
export class DomainStack extends cdk.Stack implements CertificateSource {
  public readonly certificate: acm.Certificate;

  constructor(scope: Construct, id: string, props: DomainStackProps) {
    super(scope, id, props);

    this.certificate = new acm.Certificate(this, 'Certificate', {
      domainName: props.config.domainName,
      validation: acm.CertificateValidation.fromDns(),
    });

    new cdk.CfnOutput(this, 'CertificateArn', {
      value: this.certificate.certificateArn,
      description: 'ACM certificate ARN',
    });
  }
}
