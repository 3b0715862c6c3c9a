/**
 * Prediction Lambda Handler
 *
 * 単一モデルの推論。クエリ `q` に特徴量リストを受け取り、予測値を返す。
 * モデルはコールドスタート後の最初のリクエストで EFS / S3 から読み込む。
 */

import { loadConfig } from "../shared/config";
import { UpstreamPredictionError } from "../shared/errors";
import { errorResponse, preflightResponse, textResponse } from "../shared/http";
import { createLogger, errorMessage, type Logger } from "../shared/logger";
import type { Model } from "../shared/model";
import { LazyModels } from "../shared/model-cache";
import { parseFeatureVector } from "../shared/query-parser";
import {
  createModelCache,
  deferredHandler,
  isPreflight,
  queryValue,
  type InferenceHandler,
} from "../shared/runtime";

export interface PredictionHandlerDeps {
  modelId: string;
  model: LazyModels<Model>;
  logger: Logger;
}

export function predict(modelId: string, model: Model, features: readonly number[]): number[] {
  try {
    return model.predict(features);
  } catch (error) {
    throw new UpstreamPredictionError(modelId, errorMessage(error), { cause: error });
  }
}

export function createHandler({ modelId, model, logger }: PredictionHandlerDeps): InferenceHandler {
  return async (event) => {
    if (isPreflight(event)) return preflightResponse();

    try {
      const raw = queryValue(event);
      const loaded = await model.get();
      const features = parseFeatureVector(raw, loaded.featureCount);
      logger.debug("Prediction requested", { modelId, featureCount: features.length });

      const prediction = predict(modelId, loaded, features);

      return textResponse(200, `The predicted value is ${prediction.join(", ")}`);
    } catch (error) {
      return errorResponse(error, logger);
    }
  };
}

export const handler = deferredHandler("prediction", () => {
  const config = loadConfig();
  const logger = createLogger("prediction", config.logLevel);
  const cache = createModelCache(config, logger);
  const modelId = config.modelIds.prediction;

  return createHandler({
    modelId,
    model: new LazyModels(() => cache.resolve(modelId)),
    logger,
  });
});
