/**
 * CDK Stack Unit Tests
 *
 * テスト対象:
 * - EFS アクセスポイントと Lambda マウント
 * - Function URL (AuthType NONE, CORS 全許可)
 * - モデルバケットの読み取り権限
 */

import { describe, it, expect, beforeAll } from 'vitest';
import * as path from 'path';
import * as cdk from 'aws-cdk-lib';
import { Match, Template } from 'aws-cdk-lib/assertions';
import { getEnvironmentConfig } from '../../infra/lib/config/environments';
import { ComputeStack } from '../../infra/lib/stacks/compute-stack';
import { StorageStack } from '../../infra/lib/stacks/storage-stack';

const FIXTURES = path.join(__dirname, '../fixtures');
const env = { account: '123456789012', region: 'ap-northeast-1' };
const tags = { Project: 'model-serving', Environment: 'test', ManagedBy: 'CDK' };

function synth(envName: string) {
  const app = new cdk.App();
  const config = getEnvironmentConfig(envName);

  const storageStack = new StorageStack(app, 'Storage', {
    env,
    config,
    tags,
    modelSourcePath: path.join(FIXTURES, 'models'),
  });
  const computeStack = new ComputeStack(app, 'Compute', {
    env,
    config,
    tags,
    storageStack,
    imageDirectory: path.join(FIXTURES, 'image'),
  });

  return {
    storage: Template.fromStack(storageStack),
    compute: Template.fromStack(computeStack),
  };
}

describe('StorageStack', () => {
  let storage: Template;

  beforeAll(() => {
    ({ storage } = synth('dev'));
  });

  it('creates the access point with the Lambda POSIX identity', () => {
    storage.resourceCountIs('AWS::EFS::FileSystem', 1);
    storage.hasResourceProperties('AWS::EFS::AccessPoint', {
      RootDirectory: {
        Path: '/export/lambda',
        CreationInfo: { OwnerUid: '1001', OwnerGid: '1001', Permissions: '750' },
      },
      PosixUser: { Uid: '1001', Gid: '1001' },
    });
  });

  it('creates a versioned, private models bucket', () => {
    storage.hasResourceProperties('AWS::S3::Bucket', {
      VersioningConfiguration: { Status: 'Enabled' },
      PublicAccessBlockConfiguration: {
        BlockPublicAcls: true,
        BlockPublicPolicy: true,
        IgnorePublicAcls: true,
        RestrictPublicBuckets: true,
      },
    });
  });

  it('uploads the model files under the key prefix', () => {
    storage.hasResourceProperties('Custom::CDKBucketDeployment', {
      DestinationBucketKeyPrefix: 'models/',
      Prune: false,
    });
  });

  it('reaches S3 through a gateway endpoint without NAT in dev', () => {
    storage.resourceCountIs('AWS::EC2::NatGateway', 0);
    storage.hasResourceProperties('AWS::EC2::VPCEndpoint', {
      VpcEndpointType: 'Gateway',
    });
  });
});

describe('ComputeStack', () => {
  let compute: Template;

  beforeAll(() => {
    ({ compute } = synth('dev'));
  });

  it('deploys both handlers from the container image with the EFS mount', () => {
    for (const handler of [
      'dist/lambda/prediction/handler.handler',
      'dist/lambda/dryer-prediction/handler.handler',
    ]) {
      compute.hasResourceProperties('AWS::Lambda::Function', {
        PackageType: 'Image',
        ImageConfig: { Command: [handler] },
        MemorySize: 768,
        Timeout: 30,
        FileSystemConfigs: [Match.objectLike({ LocalMountPath: '/mnt/models' })],
        Environment: {
          Variables: Match.objectLike({
            LOG_LEVEL: 'DEBUG',
            MODEL_MOUNT_PATH: '/mnt/models',
            MODELS_KEY_PREFIX: 'models/',
          }),
        },
      });
    }
  });

  it('exposes a public Function URL per handler', () => {
    compute.resourceCountIs('AWS::Lambda::Url', 2);
    compute.hasResourceProperties('AWS::Lambda::Url', {
      AuthType: 'NONE',
      Cors: { AllowOrigins: ['*'], AllowMethods: ['GET'] },
    });
    compute.hasResourceProperties('AWS::Lambda::Permission', {
      Action: 'lambda:InvokeFunctionUrl',
      Principal: '*',
      FunctionUrlAuthType: 'NONE',
    });
    compute.hasOutput('PredictionFunctionUrl', {});
    compute.hasOutput('DryerPredictionFunctionUrl', {});
  });

  it('grants read access to the models bucket', () => {
    compute.hasResourceProperties('AWS::IAM::Policy', {
      PolicyDocument: {
        Statement: Match.arrayWith([
          Match.objectLike({
            Action: Match.arrayWith(['s3:GetObject*']),
            Effect: 'Allow',
          }),
        ]),
      },
    });
  });
});

describe('prod environment', () => {
  it('keeps storage on deletion and routes through NAT', () => {
    const { storage } = synth('prod');

    storage.resourceCountIs('AWS::EC2::NatGateway', 1);
    storage.hasResource('AWS::EFS::FileSystem', { DeletionPolicy: 'Retain' });
    storage.hasResource('AWS::S3::Bucket', { DeletionPolicy: 'Retain' });
    expect(getEnvironmentConfig('prod').lambda.logLevel).toBe('INFO');
  });
});
