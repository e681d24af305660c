// Minimal API Gateway proxy shapes shared by the handlers.

export interface ApiEvent {
  queryStringParameters?: Record<string, string | undefined> | null;
}

export interface ApiResponse {
  statusCode: number;
  headers: Record<string, string>;
  body: string;
}

export interface LambdaContext {
  awsRequestId?: string;
  functionName?: string;
  functionVersion?: string;
}

export function jsonResponse(statusCode: number, body: unknown): ApiResponse {
  return {
    statusCode,
    headers: {
      "Content-Type": "application/json",
      "Access-Control-Allow-Origin": "*",
    },
    body: JSON.stringify(body),
  };
}
