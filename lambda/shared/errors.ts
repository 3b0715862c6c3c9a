/**
 * Inference error taxonomy
 *
 * statusCode はハンドラがレスポンスに変換する際に使用する。
 * キャッシュミスはエラーではなく model-cache の読み込み結果として扱う。
 */

export abstract class InferenceError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidModelIdentifierError extends InferenceError {
  readonly code = "INVALID_MODEL_IDENTIFIER";
  readonly statusCode = 500;

  constructor(readonly identifier: string) {
    super(`Invalid model identifier: "${identifier}"`);
  }
}

/** Remote artifact is absent from the bucket. */
export class RemoteNotFoundError extends InferenceError {
  readonly code = "REMOTE_NOT_FOUND";
  readonly statusCode = 502;

  constructor(readonly bucket: string, readonly key: string, options?: { cause?: unknown }) {
    super(`Model artifact not found: s3://${bucket}/${key}`, options);
  }
}

/** The cached file exists but cannot be deserialised. */
export class CorruptArtifactError extends InferenceError {
  readonly code = "CORRUPT_ARTIFACT";
  readonly statusCode = 500;

  constructor(readonly path: string, options?: { cause?: unknown }) {
    super(`Model artifact at ${path} could not be deserialized`, options);
  }
}

export class MalformedInputError extends InferenceError {
  readonly code = "MALFORMED_INPUT";
  readonly statusCode = 400;
}

export class UpstreamPredictionError extends InferenceError {
  readonly code = "UPSTREAM_PREDICTION_FAILED";
  readonly statusCode = 500;

  constructor(readonly model: string, message: string, options?: { cause?: unknown }) {
    super(`Model ${model} failed to predict: ${message}`, options);
  }
}

export class ConfigurationError extends InferenceError {
  readonly code = "CONFIGURATION_ERROR";
  readonly statusCode = 500;
}
