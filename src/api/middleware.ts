/**
 * API middleware: header metadata, call cancellation and error handling.
 */

import { NextFunction, Request, Response } from 'express';
import { apiError, httpStatusFor, invalidArgument, isRpcError, toRpcError } from '../domain/errors';
import { Metadata } from '../rpc/call-context';
import { logger } from '../logger';

/** Request headers as call metadata; repeated headers are comma-joined. */
export function metadataOf(req: Request): Metadata {
  const metadata: Record<string, string> = {};
  for (const [name, value] of Object.entries(req.headers)) {
    if (value === undefined) continue;
    metadata[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : value;
  }
  return metadata;
}

/** A signal that aborts when the client goes away before the response is sent. */
export function callSignal(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) controller.abort();
  });
  return controller.signal;
}

function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && 'body' in err;
}

/** Global error handling middleware. */
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  const rpcError = isBodyParseError(err) ? invalidArgument('request body is not valid JSON') : toRpcError(err);
  const status = httpStatusFor(rpcError.code);

  if (!isRpcError(err) && !isBodyParseError(err)) {
    logger.error('Unhandled request error', { path: req.path, error: rpcError.message });
  }

  res.status(status).json(apiError(rpcError.typedError));
}
