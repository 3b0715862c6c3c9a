/**
 * 環境設定
 */

export interface EnvironmentConfig {
  /** 環境名 */
  envName: string;
  /** AWS アカウント ID */
  account?: string;
  /** AWS リージョン */
  region: string;
  /** Lambda 設定 */
  lambda: {
    /** メモリサイズ (MB) */
    memorySize: number;
    /** タイムアウト (秒) */
    timeout: number;
    /** ログレベル */
    logLevel: "DEBUG" | "INFO" | "WARN" | "ERROR";
  };
  /** EFS 設定 (モデルキャッシュ) */
  efs: {
    /** Lambda 内のマウントパス */
    mountPath: string;
    /** アクセスポイントのルートディレクトリ */
    accessPointPath: string;
    /** POSIX UID/GID */
    posixId: string;
    /** 作成時のパーミッション */
    permissions: string;
  };
  /** モデルバケット設定 */
  models: {
    /** S3 キーのプレフィックス */
    keyPrefix: string;
    /** デプロイ時にアップロードするローカルディレクトリ (未指定ならアップロードしない) */
    sourceDir?: string;
    /** 単一モデル推論用のモデル ID */
    predictionModelId: string;
    /** 残り乾燥時間モデル ID */
    dryingTimeModelId: string;
    /** 水分分布モデル ID */
    distributionModelId: string;
  };
  /** Function URL 設定 */
  functionUrl: {
    /** CORS 許可オリジン */
    allowedOrigins: string[];
  };
}

const models = {
  keyPrefix: "models/",
  sourceDir: "model_files",
  predictionModelId: "model.json",
  dryingTimeModelId: "predict_drying_time.json",
  distributionModelId: "predict_distribution.json",
};

const efs = {
  mountPath: "/mnt/models",
  accessPointPath: "/export/lambda",
  posixId: "1001",
  permissions: "750",
};

const environments: Record<string, EnvironmentConfig> = {
  dev: {
    envName: "dev",
    region: "ap-northeast-1",
    lambda: {
      memorySize: 768,
      timeout: 30,
      logLevel: "DEBUG",
    },
    efs,
    models,
    functionUrl: {
      allowedOrigins: ["*"],
    },
  },
  prod: {
    envName: "prod",
    region: "ap-northeast-1",
    lambda: {
      memorySize: 1536,
      timeout: 30,
      logLevel: "INFO",
    },
    efs,
    models,
    functionUrl: {
      allowedOrigins: ["*"],
    },
  },
};

export function getEnvironmentConfig(envName: string): EnvironmentConfig {
  const config = environments[envName];
  if (!config) {
    throw new Error(
      `Unknown environment: ${envName}. Available: ${Object.keys(environments).join(", ")}`
    );
  }
  return config;
}
