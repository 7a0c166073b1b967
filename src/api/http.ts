/**
 * HTTP binding of the RPC surface: `POST /<package>.<Service>/<Method>`
 * with a JSON body and the bearer token in the authorization header.
 */

import { Router } from 'express';
import { Logger } from '../logger';
import { RpcDispatcher } from '../rpc/dispatcher';
import { callSignal, metadataOf } from './middleware';

export function createRpcRoutes(dispatcher: RpcDispatcher, log: Logger): Router {
  const router = Router();

  router.post('/:service/:method', (req, res, next) => {
    const fullName = `${req.params.service}/${req.params.method}`;
    dispatcher
      .dispatch(fullName, req.body, { metadata: metadataOf(req), signal: callSignal(res), logger: log })
      .then((result) => {
        res.json(result ?? {});
      })
      .catch(next);
  });

  return router;
}
