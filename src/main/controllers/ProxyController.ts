import type { Request, Response } from 'express';
import container from '../config/container';
import type { ProxyRoute } from '../config/proxyRoutes';
import type TenantProxyService from '../services/TenantProxyService';
import { sendError } from '../utils/errors';
import { plainQuery, requireScope } from '../utils/http/requestContext';

class ProxyController {
  private tenantProxyService: TenantProxyService;

  constructor() {
    this.tenantProxyService = container.resolve('tenantProxyService');
    this.forward = this.forward.bind(this);
  }

  /** Handler relaying `route` to its backend on behalf of the request scope. */
  forward(route: ProxyRoute) {
    return async (req: Request, res: Response) => {
      const disconnect = new AbortController();
      res.on('close', () => {
        if (!res.writableFinished) {
          disconnect.abort();
        }
      });

      try {
        const response = await this.tenantProxyService.forward(
          route,
          { params: req.params, query: plainQuery(req), body: req.body },
          requireScope(req),
          disconnect.signal
        );
        if (!disconnect.signal.aborted) {
          res.status(response.status).json(response.body);
        }
      } catch (err) {
        if (!disconnect.signal.aborted) {
          sendError(res, err, container.resolve('logger'));
        }
      }
    };
  }
}

export default ProxyController;
