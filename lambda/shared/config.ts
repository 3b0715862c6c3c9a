import { ConfigurationError } from "./errors";
import { isLogLevel, type LogLevel } from "./logger";

export interface RuntimeConfig {
  region: string;
  logLevel: LogLevel;
  /** EFS mount path (Lambda filesystem config と一致させる) */
  modelMountPath: string;
  modelsBucket: string;
  /** S3 key = modelsKeyPrefix + model identifier */
  modelsKeyPrefix: string;
  modelIds: {
    prediction: string;
    dryingTime: string;
    distribution: string;
  };
}

export const DEFAULT_MODEL_MOUNT_PATH = "/mnt/models";

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const modelsBucket = env.MODELS_BUCKET;
  if (!modelsBucket) {
    throw new ConfigurationError("MODELS_BUCKET is not configured");
  }

  const logLevel = (env.LOG_LEVEL || "INFO").toUpperCase();
  if (!isLogLevel(logLevel)) {
    throw new ConfigurationError(`Unknown LOG_LEVEL: ${env.LOG_LEVEL}`);
  }

  return {
    region: env.AWS_REGION || "ap-northeast-1",
    logLevel,
    modelMountPath: env.MODEL_MOUNT_PATH || DEFAULT_MODEL_MOUNT_PATH,
    modelsBucket,
    modelsKeyPrefix: env.MODELS_KEY_PREFIX || "",
    modelIds: {
      prediction: env.MODEL_ID || "model.json",
      dryingTime: env.DRYING_TIME_MODEL_ID || "predict_drying_time.json",
      distribution: env.DISTRIBUTION_MODEL_ID || "predict_distribution.json",
    },
  };
}
