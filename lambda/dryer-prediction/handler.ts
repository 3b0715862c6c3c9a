/**
 * Dryer Prediction Lambda Handler
 *
 * 残り乾燥時間と、乾燥終了時点の水分分布を予測する。
 * 2 つのモデルは独立して解決され、片方の取得に失敗した場合もう片方は EFS に残る。
 */

import { loadConfig } from "../shared/config";
import { errorResponse, preflightResponse, textResponse } from "../shared/http";
import { createLogger, type Logger } from "../shared/logger";
import { LazyModels } from "../shared/model-cache";
import { parseFeatureVector } from "../shared/query-parser";
import {
  createModelCache,
  deferredHandler,
  isPreflight,
  queryValue,
  type InferenceHandler,
} from "../shared/runtime";
import { dryerFeatureSchema, type FeatureSchema } from "./features";
import { formatPrediction, predictDrying, toFeatureRecord, type DryerModels } from "./pipeline";

export interface DryerHandlerDeps {
  models: LazyModels<DryerModels>;
  logger: Logger;
  schema?: FeatureSchema;
}

export function createHandler({
  models,
  logger,
  schema = dryerFeatureSchema,
}: DryerHandlerDeps): InferenceHandler {
  return async (event) => {
    if (isPreflight(event)) return preflightResponse();

    try {
      const values = parseFeatureVector(queryValue(event), schema.features.length);
      const prediction = predictDrying(toFeatureRecord(values, schema), await models.get(), schema);

      logger.debug("Dryer prediction completed", {
        remainingDryingTime: prediction.remainingDryingTime,
        distribution: prediction.distribution,
      });

      return textResponse(200, formatPrediction(prediction));
    } catch (error) {
      return errorResponse(error, logger);
    }
  };
}

export const handler = deferredHandler("dryer-prediction", () => {
  const config = loadConfig();
  const logger = createLogger("dryer-prediction", config.logLevel);
  const cache = createModelCache(config, logger);
  const { dryingTime, distribution } = config.modelIds;

  return createHandler({
    models: new LazyModels(async () => {
      const [dryingTimeModel, distributionModel] = await cache.resolveAll([dryingTime, distribution]);
      return { dryingTime: dryingTimeModel, distribution: distributionModel };
    }),
    logger,
  });
});
