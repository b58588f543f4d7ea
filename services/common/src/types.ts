export interface TraceContext {
  traceId?: string;
  spanId?: string;
  sampled?: boolean;
  raw?: string;
}

export interface RequestContext {
  requestId: string;
  trace?: TraceContext;
}

export interface ErrorResponse {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

declare module 'fastify' {
  interface FastifyRequest {
    requestContext: RequestContext;
  }
}
