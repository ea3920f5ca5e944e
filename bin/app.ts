#!/usr/bin/env node
import * as cdk from 'aws-cdk-lib/core';
import { AwsSolutionsChecks } from 'cdk-nag';
import { loadConfig } from '../lib/config';
import { createDeployment } from '../lib/deployment';

/**
 * Web application deployment
 *
 * - Registry: ECR repository with image retention rules
 * - Compute: ECS Fargate service behind an HTTPS load balancer, with a
 *   migration container gating the web container
 * - Firewall: regional WAF on the load balancer, logging to CloudWatch
 * - Network, database, cache, domain and storage stacks it depends on
 *
 * Configuration is read from `.env.<env>` (select with `-c env=prod`);
 * any key can be overridden with `-c KEY=value`.
 */

const app = new cdk.App();

const config = loadConfig(app);

createDeployment(app, config);

// AWS Solutions checks; accepted findings are suppressed per stack
cdk.Aspects.of(app).add(new AwsSolutionsChecks({ verbose: true }));

app.synth();
