import type { Request, Response } from 'express';
import container from '../config/container';
import type AggregationService from '../services/AggregationService';
import { sendError } from '../utils/errors';
import { requireScope } from '../utils/http/requestContext';

class GatewayController {
  private aggregationService: AggregationService;

  constructor() {
    this.aggregationService = container.resolve('aggregationService');
    this.health = this.health.bind(this);
    this.services = this.services.bind(this);
    this.dashboard = this.dashboard.bind(this);
  }

  async health(_req: Request, res: Response) {
    try {
      res.json(await this.aggregationService.health());
    } catch (err) {
      sendError(res, err, container.resolve('logger'));
    }
  }

  async services(_req: Request, res: Response) {
    try {
      res.json(await this.aggregationService.listServices());
    } catch (err) {
      sendError(res, err, container.resolve('logger'));
    }
  }

  async dashboard(req: Request, res: Response) {
    // A client that goes away abandons the backend calls still in flight
    const disconnect = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) {
        disconnect.abort();
      }
    });

    try {
      const view = await this.aggregationService.dashboard(requireScope(req), disconnect.signal);
      if (!disconnect.signal.aborted) {
        res.json(view);
      }
    } catch (err) {
      if (!disconnect.signal.aborted) {
        sendError(res, err, container.resolve('logger'));
      }
    }
  }
}

export default GatewayController;
