/**
 * Dryer feature schema
 *
 * クエリ `q` の値はこの順序で並んでいる前提。
 */

export interface FeatureSchema {
  /** Order of the values in the request. */
  features: readonly string[];
  /** Inputs to the remaining-drying-time model. */
  remainingTimeFeatures: readonly string[];
  /** Inputs to the moisture distribution model. */
  distributionFeatures: readonly string[];
  /** Outputs of the distribution model, labelled `<column>_model`. */
  distributionColumns: readonly string[];
  /** Feature the predicted remaining time is added to. */
  elapsedTimeFeature: string;
}

export const dryerFeatureSchema: FeatureSchema = {
  features: [
    "elapsed_time",
    "inlet_air_temp",
    "outlet_air_temp",
    "ambient_humidity",
    "moisture_mean",
    "moisture_std",
  ],
  remainingTimeFeatures: [
    "inlet_air_temp",
    "outlet_air_temp",
    "ambient_humidity",
    "moisture_mean",
    "moisture_std",
  ],
  distributionFeatures: ["elapsed_time", "inlet_air_temp", "outlet_air_temp", "ambient_humidity"],
  distributionColumns: ["moisture_mean", "moisture_std"],
  elapsedTimeFeature: "elapsed_time",
};
