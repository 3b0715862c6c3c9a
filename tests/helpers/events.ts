import type { APIGatewayProxyEventV2 } from 'aws-lambda';

/** Lambda Function URL event carrying an optional `q` parameter. */
export function functionUrlEvent(q?: string, method = 'GET'): APIGatewayProxyEventV2 {
  const rawQueryString = q === undefined ? '' : `q=${encodeURIComponent(q)}`;

  return {
    version: '2.0',
    routeKey: '$default',
    rawPath: '/',
    rawQueryString,
    headers: { host: 'example.lambda-url.ap-northeast-1.on.aws' },
    queryStringParameters: q === undefined ? undefined : { q },
    requestContext: {
      accountId: 'anonymous',
      apiId: 'example',
      domainName: 'example.lambda-url.ap-northeast-1.on.aws',
      domainPrefix: 'example',
      http: {
        method,
        path: '/',
        protocol: 'HTTP/1.1',
        sourceIp: '192.0.2.1',
        userAgent: 'vitest',
      },
      requestId: 'request-1',
      routeKey: '$default',
      stage: '$default',
      time: '19/Oct/2026:00:00:00 +0000',
      timeEpoch: 0,
    },
    isBase64Encoded: false,
  };
}
