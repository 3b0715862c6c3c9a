#!/usr/bin/env node
/**
 * model-serving CDK Application
 *
 * スタック構成:
 * - StorageStack: VPC, EFS (モデルキャッシュ), S3 (モデルアーティファクト)
 * - ComputeStack: 推論 Lambda (コンテナイメージ) + Function URL
 */

import "source-map-support/register";
import * as cdk from "aws-cdk-lib";
import { StorageStack } from "../lib/stacks/storage-stack";
import { ComputeStack } from "../lib/stacks/compute-stack";
import { getEnvironmentConfig } from "../lib/config/environments";

const app = new cdk.App();

// 環境設定の取得
const envName = app.node.tryGetContext("env") || "dev";
const config = getEnvironmentConfig(envName);

const env = {
  account: process.env.CDK_DEFAULT_ACCOUNT || config.account,
  region: process.env.CDK_DEFAULT_REGION || config.region,
};

// タグ設定
const tags = {
  Project: "model-serving",
  Environment: envName,
  ManagedBy: "CDK",
};

// =============================================================================
// Storage Stack
// =============================================================================
const storageStack = new StorageStack(app, `ModelServing-Storage-${envName}`, {
  env,
  config,
  tags,
  description: "model-serving Storage Layer (VPC, EFS, S3)",
});

// =============================================================================
// Compute Stack
// =============================================================================
new ComputeStack(app, `ModelServing-Compute-${envName}`, {
  env,
  config,
  tags,
  storageStack,
  description: "model-serving Inference Lambdas (EFS model cache, Function URL)",
});

app.synth();
