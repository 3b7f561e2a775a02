/**
 * HTTP mapping for admission outcomes, and a `node:http` handler wrapper.
 */

import type { IncomingMessage, ServerResponse } from 'node:http';
import { errorMessage } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import { createLogger } from '../core/logger.js';
import type { RequiredPermission, Resource } from '../core/permissions.js';
import type { ApiKeyRecord } from '../core/types.js';
import type { AdmissionOutcome, AdmissionPipeline } from '../pipeline.js';

export interface HttpRejection {
  statusCode: number;
  headers: Record<string, string>;
  body: unknown;
}

/** Response for a refused request; null when the request was admitted. */
export function toHttpResponse(outcome: AdmissionOutcome): HttpRejection | null {
  if (outcome.admitted) return null;
  return { statusCode: outcome.statusCode, headers: outcome.headers, body: outcome.body };
}

export function sendJson(res: ServerResponse, statusCode: number, body: unknown, headers: Record<string, string> = {}): void {
  const payload = JSON.stringify(body);
  res.writeHead(statusCode, {
    ...headers,
    'Content-Type': 'application/json',
    'Content-Length': Buffer.byteLength(payload),
  });
  res.end(payload);
}

export interface AdmittedRequest {
  record: ApiKeyRecord;
  deprecated: boolean;
}

export type AdmittedHandler = (req: IncomingMessage, res: ServerResponse, admitted: AdmittedRequest) => void | Promise<void>;

export interface WithAdmissionOptions {
  /** Permission each request needs, derived from method and path */
  required?: (method: string, path: string) => { resource: Resource; permission: RequiredPermission } | undefined;
  logger?: Logger;
}

/**
 * Wrap a request handler so it only runs for admitted requests. Rate-limit
 * headers are set on every response the pipeline produced them for.
 */
export function withAdmission(
  pipeline: AdmissionPipeline,
  handler: AdmittedHandler,
  opts: WithAdmissionOptions = {},
): (req: IncomingMessage, res: ServerResponse) => Promise<void> {
  const log = opts.logger ?? createLogger('http');
  return async (req, res) => {
    const method = req.method ?? 'GET';
    const path = new URL(req.url ?? '/', 'http://localhost').pathname;
    try {
      const outcome = await pipeline.admit({
        method,
        path,
        headers: req.headers,
        remoteAddress: req.socket.remoteAddress,
        required: opts.required?.(method, path),
      });
      if (!outcome.admitted) {
        sendJson(res, outcome.statusCode, outcome.body, outcome.headers);
        return;
      }
      for (const [name, value] of Object.entries(outcome.headers)) res.setHeader(name, value);
      await handler(req, res, { record: outcome.record, deprecated: outcome.deprecated });
    } catch (err) {
      log.error('Admission failed', { method, path, error: errorMessage(err) });
      if (!res.headersSent) sendJson(res, 500, { error: 'internal_error', message: 'Internal server error' });
    }
  };
}
