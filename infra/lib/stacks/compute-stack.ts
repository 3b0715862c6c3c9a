/**
 * Compute Stack
 *
 * 推論用 Lambda (コンテナイメージ) と Function URL を定義
 *
 * - EFS をモデルキャッシュとして /mnt/models にマウント
 * - モデルバケットは読み取りのみ許可
 * - Function URL は認証なし (AuthType NONE), CORS 全許可
 */

import * as cdk from "aws-cdk-lib";
import * as lambda from "aws-cdk-lib/aws-lambda";
import * as logs from "aws-cdk-lib/aws-logs";
import * as ec2 from "aws-cdk-lib/aws-ec2";
import { Construct } from "constructs";
import * as path from "path";
import type { EnvironmentConfig } from "../config/environments";
import { type StorageStack, privateSubnetType } from "./storage-stack";

export interface ComputeStackProps extends cdk.StackProps {
  config: EnvironmentConfig;
  tags: Record<string, string>;
  storageStack: StorageStack;
  /** Docker ビルドコンテキスト (既定: リポジトリルート) */
  imageDirectory?: string;
}

export interface InferenceFunction {
  function: lambda.DockerImageFunction;
  url: lambda.FunctionUrl;
}

export class ComputeStack extends cdk.Stack {
  /** 単一モデル推論 Lambda */
  public readonly prediction: InferenceFunction;
  /** 乾燥予測 Lambda */
  public readonly dryerPrediction: InferenceFunction;

  private readonly config: EnvironmentConfig;
  private readonly storageStack: StorageStack;
  private readonly imageDirectory: string;
  private readonly securityGroup: ec2.SecurityGroup;

  constructor(scope: Construct, id: string, props: ComputeStackProps) {
    super(scope, id, props);

    this.config = props.config;
    this.storageStack = props.storageStack;
    this.imageDirectory = props.imageDirectory ?? path.join(__dirname, "../../..");

    // =========================================================================
    // Lambda Security Group (VPC 内)
    // =========================================================================
    this.securityGroup = new ec2.SecurityGroup(this, "LambdaSecurityGroup", {
      vpc: this.storageStack.vpc,
      securityGroupName: `model-serving-lambda-sg-${this.config.envName}`,
      description: "Security group for inference Lambda functions",
      allowAllOutbound: true,
    });

    // =========================================================================
    // Prediction Lambda
    // =========================================================================
    this.prediction = this.buildInferenceFunction("Prediction", {
      functionName: `model-serving-prediction-${this.config.envName}`,
      handler: "dist/lambda/prediction/handler.handler",
    });

    // =========================================================================
    // Dryer Prediction Lambda
    // =========================================================================
    this.dryerPrediction = this.buildInferenceFunction("DryerPrediction", {
      functionName: `model-serving-dryer-prediction-${this.config.envName}`,
      handler: "dist/lambda/dryer-prediction/handler.handler",
    });
  }

  private buildInferenceFunction(
    id: string,
    options: { functionName: string; handler: string }
  ): InferenceFunction {
    const { config, storageStack } = this;

    const fn = new lambda.DockerImageFunction(this, `${id}Lambda`, {
      functionName: options.functionName,
      code: lambda.DockerImageCode.fromImageAsset(this.imageDirectory, {
        cmd: [options.handler],
      }),
      architecture: lambda.Architecture.X86_64,
      memorySize: config.lambda.memorySize,
      timeout: cdk.Duration.seconds(config.lambda.timeout),
      vpc: storageStack.vpc,
      vpcSubnets: { subnetType: privateSubnetType(config) },
      securityGroups: [this.securityGroup],
      filesystem: lambda.FileSystem.fromEfsAccessPoint(
        storageStack.accessPoint,
        config.efs.mountPath
      ),
      environment: {
        ENVIRONMENT: config.envName,
        LOG_LEVEL: config.lambda.logLevel,
        MODEL_MOUNT_PATH: config.efs.mountPath,
        MODELS_BUCKET: storageStack.modelsBucket.bucketName,
        MODELS_KEY_PREFIX: config.models.keyPrefix,
        MODEL_ID: config.models.predictionModelId,
        DRYING_TIME_MODEL_ID: config.models.dryingTimeModelId,
        DISTRIBUTION_MODEL_ID: config.models.distributionModelId,
      },
      logRetention: logs.RetentionDays.TWO_WEEKS,
      tracing: lambda.Tracing.ACTIVE,
    });

    storageStack.modelsBucket.grantRead(fn);

    const url = fn.addFunctionUrl({
      authType: lambda.FunctionUrlAuthType.NONE,
      cors: {
        allowedOrigins: config.functionUrl.allowedOrigins,
        allowedMethods: [lambda.HttpMethod.GET],
      },
    });

    new cdk.CfnOutput(this, `${id}FunctionUrl`, {
      value: url.url,
      description: `${options.functionName} Function URL`,
      exportName: `${config.envName}-${id}FunctionUrl`,
    });

    return { function: fn, url };
  }
}
