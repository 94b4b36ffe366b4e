#!/usr/bin/env node
import 'source-map-support/register';
import * as cdk from 'aws-cdk-lib';
import { SqlDeploymentStack } from '../../src/stacks/SqlDeploymentStack';

const app = new cdk.App();

new SqlDeploymentStack(app, 'SqlDeploymentStack', {
  env: {
    account: process.env.CDK_DEFAULT_ACCOUNT || process.env.AWS_ACCOUNT_ID,
    region: process.env.CDK_DEFAULT_REGION || process.env.AWS_REGION || 'us-west-2',
  },
});
