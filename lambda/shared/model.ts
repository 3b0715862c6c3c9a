/**
 * Model artifacts
 *
 * キャッシュ層はアーティファクトの中身を知らない。バイト列 → Model の変換は
 * ModelCodec が担当する。
 */

export interface Model {
  /** Number of inputs `predict` expects, when the artifact declares it. */
  readonly featureCount?: number;
  predict(features: readonly number[]): number[];
}

export interface ModelCodec {
  deserialize(bytes: Buffer): Model;
}

/**
 * Multi-output linear model serialised as JSON:
 * `{ "format": "linear", "coefficients": [[...], ...], "intercepts": [...] }`
 * with one coefficient row and one intercept per output.
 */
export interface LinearModelArtifact {
  format: "linear";
  coefficients: number[][];
  intercepts: number[];
}

const isNumberArray = (value: unknown): value is number[] =>
  Array.isArray(value) && value.every((v) => typeof v === "number" && Number.isFinite(v));

function isLinearModelArtifact(value: unknown): value is LinearModelArtifact {
  if (typeof value !== "object" || value === null) return false;
  if (!("format" in value) || value.format !== "linear") return false;
  if (!("coefficients" in value) || !("intercepts" in value)) return false;

  const { coefficients, intercepts } = value;
  if (!Array.isArray(coefficients) || !isNumberArray(intercepts)) return false;
  if (coefficients.length === 0 || coefficients.length !== intercepts.length) return false;

  const width = Array.isArray(coefficients[0]) ? coefficients[0].length : -1;
  return coefficients.every((row) => isNumberArray(row) && row.length === width);
}

export class LinearModel implements Model {
  constructor(private readonly artifact: LinearModelArtifact) {}

  get featureCount(): number {
    return this.artifact.coefficients[0].length;
  }

  predict(features: readonly number[]): number[] {
    if (features.length !== this.featureCount) {
      throw new Error(
        `Expected ${this.featureCount} features, received ${features.length}`
      );
    }

    return this.artifact.coefficients.map((row, output) =>
      row.reduce((sum, weight, i) => sum + weight * features[i], this.artifact.intercepts[output])
    );
  }
}

export const linearModelCodec: ModelCodec = {
  deserialize(bytes) {
    const parsed: unknown = JSON.parse(bytes.toString("utf-8"));
    if (!isLinearModelArtifact(parsed)) {
      throw new Error("Artifact is not a linear model");
    }
    return new LinearModel(parsed);
  },
};
