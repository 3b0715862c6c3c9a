import { S3Client } from "@aws-sdk/client-s3";
import type { APIGatewayProxyEventV2 } from "aws-lambda";
import { S3BlobStore } from "./blob-store";
import type { RuntimeConfig } from "./config";
import { MalformedInputError } from "./errors";
import { errorResponse, type HttpResponse } from "./http";
import { createLogger, type Logger } from "./logger";
import { linearModelCodec } from "./model";
import { ModelCache } from "./model-cache";

export type InferenceHandler = (event: APIGatewayProxyEventV2) => Promise<HttpResponse>;

export function createModelCache(config: RuntimeConfig, logger: Logger): ModelCache {
  return new ModelCache({
    localRoot: config.modelMountPath,
    bucket: config.modelsBucket,
    keyPrefix: config.modelsKeyPrefix,
    blobStore: new S3BlobStore(new S3Client({ region: config.region })),
    codec: linearModelCodec,
    logger,
  });
}

export function isPreflight(event: APIGatewayProxyEventV2): boolean {
  return event.requestContext?.http?.method === "OPTIONS";
}

/** The `q` query parameter carrying the feature list. */
export function queryValue(event: APIGatewayProxyEventV2): string {
  const q = event.queryStringParameters?.q;
  if (q === undefined || q === "") {
    throw new MalformedInputError('Missing query parameter "q"');
  }
  return q;
}

/**
 * Build the handler on first invocation so configuration is read inside the
 * execution environment, then reuse it for warm invocations.
 * 構築に失敗した場合 (設定不備など) は JSON エラーを返し、次の呼び出しで再構築する。
 */
export function deferredHandler(service: string, build: () => InferenceHandler): InferenceHandler {
  let built: InferenceHandler | undefined;
  return async (event) => {
    try {
      built ??= build();
    } catch (error) {
      return errorResponse(error, createLogger(service));
    }
    return built(event);
  };
}
