/**
 * 乾燥予測パイプライン
 *
 * Stage 1: 残り乾燥時間を予測
 * Stage 2: elapsed_time に残り時間を加算し、その時点の水分分布を予測
 *
 * Stage 2 は Stage 1 の結果に依存するため直列に実行する。
 */

import { MalformedInputError, UpstreamPredictionError } from "../shared/errors";
import { errorMessage } from "../shared/logger";
import type { Model } from "../shared/model";
import type { FeatureSchema } from "./features";

export interface DryerModels {
  dryingTime: Model;
  distribution: Model;
}

export interface DistributionValue {
  label: string;
  value: number;
}

export interface DryerPrediction {
  remainingDryingTime: number;
  distribution: DistributionValue[];
}

export type FeatureRecord = Map<string, number>;

export function toFeatureRecord(values: readonly number[], schema: FeatureSchema): FeatureRecord {
  if (values.length !== schema.features.length) {
    throw new MalformedInputError(
      `Expected ${schema.features.length} values, received ${values.length}`
    );
  }
  return new Map(schema.features.map((name, i) => [name, values[i]]));
}

function select(record: FeatureRecord, names: readonly string[]): number[] {
  return names.map((name) => {
    const value = record.get(name);
    if (value === undefined) {
      throw new MalformedInputError(`Missing feature: ${name}`);
    }
    return value;
  });
}

function runModel(name: string, model: Model, features: readonly number[]): number[] {
  try {
    return model.predict(features);
  } catch (error) {
    throw new UpstreamPredictionError(name, errorMessage(error), { cause: error });
  }
}

/**
 * Run both stages. The record is copied; the caller's values are left untouched.
 */
export function predictDrying(
  input: FeatureRecord,
  models: DryerModels,
  schema: FeatureSchema
): DryerPrediction {
  const record: FeatureRecord = new Map(input);

  const [remainingDryingTime] = runModel(
    "drying-time",
    models.dryingTime,
    select(record, schema.remainingTimeFeatures)
  );
  if (remainingDryingTime === undefined || !Number.isFinite(remainingDryingTime)) {
    throw new UpstreamPredictionError("drying-time", "no finite remaining time returned");
  }

  const [elapsed] = select(record, [schema.elapsedTimeFeature]);
  record.set(schema.elapsedTimeFeature, elapsed + remainingDryingTime);

  const distribution = runModel(
    "distribution",
    models.distribution,
    select(record, schema.distributionFeatures)
  );
  if (distribution.length !== schema.distributionColumns.length) {
    throw new UpstreamPredictionError(
      "distribution",
      `expected ${schema.distributionColumns.length} outputs, received ${distribution.length}`
    );
  }

  return {
    remainingDryingTime,
    distribution: schema.distributionColumns.map((column, i) => ({
      label: `${column}_model`,
      value: distribution[i],
    })),
  };
}

export function formatPrediction({ remainingDryingTime, distribution }: DryerPrediction): string {
  const width = Math.max(...distribution.map(({ label }) => label.length));
  const rows = distribution.map(({ label, value }) => `${label.padEnd(width)}    ${value}`);

  return (
    `The predicted remaining drying time is ${remainingDryingTime} hrs \n\n` +
    `The predicted distribution after this time is \n${rows.join("\n")}`
  );
}
