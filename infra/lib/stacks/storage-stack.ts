/**
 * Storage Stack
 *
 * VPC, EFS (モデルキャッシュ), S3 (モデルアーティファクト) を定義
 */

import * as cdk from "aws-cdk-lib";
import * as s3 from "aws-cdk-lib/aws-s3";
import * as s3deploy from "aws-cdk-lib/aws-s3-deployment";
import * as ec2 from "aws-cdk-lib/aws-ec2";
import * as efs from "aws-cdk-lib/aws-efs";
import { Construct } from "constructs";
import * as path from "path";
import type { EnvironmentConfig } from "../config/environments";

export interface StorageStackProps extends cdk.StackProps {
  config: EnvironmentConfig;
  tags: Record<string, string>;
  /** モデルファイルのディレクトリ (既定: <repo>/<config.models.sourceDir>) */
  modelSourcePath?: string;
}

export function privateSubnetType(config: EnvironmentConfig): ec2.SubnetType {
  return config.envName === "prod"
    ? ec2.SubnetType.PRIVATE_WITH_EGRESS
    : ec2.SubnetType.PRIVATE_ISOLATED;
}

export class StorageStack extends cdk.Stack {
  /** VPC */
  public readonly vpc: ec2.Vpc;
  /** EFS ファイルシステム */
  public readonly fileSystem: efs.FileSystem;
  /** Lambda 用アクセスポイント */
  public readonly accessPoint: efs.AccessPoint;
  /** モデルアーティファクト用 S3 バケット */
  public readonly modelsBucket: s3.Bucket;

  constructor(scope: Construct, id: string, props: StorageStackProps) {
    super(scope, id, props);

    const { config } = props;
    const isProd = config.envName === "prod";

    // =========================================================================
    // VPC
    // =========================================================================
    this.vpc = new ec2.Vpc(this, "Vpc", {
      vpcName: `model-serving-vpc-${config.envName}`,
      maxAzs: 2,
      natGateways: isProd ? 1 : 0,
      subnetConfiguration: [
        {
          name: "Public",
          subnetType: ec2.SubnetType.PUBLIC,
          cidrMask: 24,
        },
        {
          name: "Private",
          subnetType: privateSubnetType(config),
          cidrMask: 24,
        },
      ],
    });

    // NAT なしでも Lambda から S3 に到達できるようにする
    this.vpc.addGatewayEndpoint("S3Endpoint", {
      service: ec2.GatewayVpcEndpointAwsService.S3,
    });

    // =========================================================================
    // EFS (モデルキャッシュ)
    // =========================================================================
    this.fileSystem = new efs.FileSystem(this, "ModelCacheFileSystem", {
      vpc: this.vpc,
      vpcSubnets: { subnetType: privateSubnetType(config) },
      fileSystemName: `model-serving-cache-${config.envName}`,
      encrypted: true,
      removalPolicy: isProd ? cdk.RemovalPolicy.RETAIN : cdk.RemovalPolicy.DESTROY,
    });

    // 新規 EFS にはルートディレクトリが存在しないため createAcl で作成させる
    this.accessPoint = this.fileSystem.addAccessPoint("LambdaAccessPoint", {
      path: config.efs.accessPointPath,
      createAcl: {
        ownerUid: config.efs.posixId,
        ownerGid: config.efs.posixId,
        permissions: config.efs.permissions,
      },
      posixUser: {
        uid: config.efs.posixId,
        gid: config.efs.posixId,
      },
    });

    // =========================================================================
    // S3 Bucket (モデルアーティファクト)
    // =========================================================================
    this.modelsBucket = new s3.Bucket(this, "ModelsBucket", {
      bucketName: `model-serving-models-${config.envName}-${this.account}`,
      encryption: s3.BucketEncryption.S3_MANAGED,
      blockPublicAccess: s3.BlockPublicAccess.BLOCK_ALL,
      versioned: true,
      removalPolicy: isProd ? cdk.RemovalPolicy.RETAIN : cdk.RemovalPolicy.DESTROY,
      autoDeleteObjects: !isProd,
    });

    const modelSourcePath =
      props.modelSourcePath ??
      (config.models.sourceDir
        ? path.join(__dirname, "../../..", config.models.sourceDir)
        : undefined);

    if (modelSourcePath) {
      new s3deploy.BucketDeployment(this, "ModelsDeployment", {
        sources: [s3deploy.Source.asset(modelSourcePath)],
        destinationBucket: this.modelsBucket,
        destinationKeyPrefix: config.models.keyPrefix || undefined,
        prune: false,
      });
    }

    // =========================================================================
    // Outputs
    // =========================================================================
    new cdk.CfnOutput(this, "ModelsBucketName", {
      value: this.modelsBucket.bucketName,
      description: "Model artifacts bucket",
      exportName: `${config.envName}-ModelsBucketName`,
    });

    new cdk.CfnOutput(this, "FileSystemId", {
      value: this.fileSystem.fileSystemId,
      description: "Model cache file system",
      exportName: `${config.envName}-ModelCacheFileSystemId`,
    });

    new cdk.CfnOutput(this, "VpcId", {
      value: this.vpc.vpcId,
      description: "VPC ID",
      exportName: `${config.envName}-VpcId`,
    });
  }
}
