import type { APIGatewayProxyStructuredResultV2 } from "aws-lambda";
import { InferenceError } from "./errors";
import { errorMessage, type Logger } from "./logger";

export type HttpResponse = APIGatewayProxyStructuredResultV2 & {
  statusCode: number;
  headers: Record<string, string>;
  body: string;
};

// Function URL は AuthType NONE, CORS は全オリジン許可
export const corsHeaders = {
  "Access-Control-Allow-Origin": "*",
  "Access-Control-Allow-Headers": "Content-Type",
  "Access-Control-Allow-Methods": "GET,OPTIONS",
};

export function textResponse(statusCode: number, body: string): HttpResponse {
  return {
    isBase64Encoded: false,
    statusCode,
    headers: { ...corsHeaders, "Content-Type": "text/plain; charset=utf-8" },
    body,
  };
}

export function preflightResponse(): HttpResponse {
  return { isBase64Encoded: false, statusCode: 200, headers: corsHeaders, body: "" };
}

/** Map a failure to a JSON error body; unknown errors become 500. */
export function errorResponse(error: unknown, logger: Logger): HttpResponse {
  const statusCode = error instanceof InferenceError ? error.statusCode : 500;
  const code = error instanceof InferenceError ? error.code : "INTERNAL_ERROR";

  const data = { error: errorMessage(error), code, statusCode };
  if (statusCode < 500) {
    logger.warn("Rejected request", data);
  } else {
    logger.error("Inference failed", data);
  }

  return {
    isBase64Encoded: false,
    statusCode,
    headers: { ...corsHeaders, "Content-Type": "application/json" },
    body: JSON.stringify({ error: errorMessage(error), code }),
  };
}
