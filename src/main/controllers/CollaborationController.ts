import type { Request, Response } from 'express';
import container from '../config/container';
import type CollaborationService from '../services/CollaborationService';
import { sendError } from '../utils/errors';
import { requireScope } from '../utils/http/requestContext';

class CollaborationController {
  private collaborationService: CollaborationService;

  constructor() {
    this.collaborationService = container.resolve('collaborationService');
    this.suggestions = this.suggestions.bind(this);
    this.active = this.active.bind(this);
    this.accept = this.accept.bind(this);
    this.email = this.email.bind(this);
  }

  async suggestions(req: Request, res: Response) {
    try {
      const { scope, data } = await this.collaborationService.suggestions(requireScope(req));
      res.json({ scope, suggestions: data });
    } catch (err) {
      sendError(res, err, container.resolve('logger'));
    }
  }

  async active(req: Request, res: Response) {
    try {
      const { scope, data } = await this.collaborationService.active(requireScope(req));
      res.json({ scope, collaborations: data });
    } catch (err) {
      sendError(res, err, container.resolve('logger'));
    }
  }

  async accept(req: Request, res: Response) {
    try {
      const { scope, data } = await this.collaborationService.accept(
        requireScope(req),
        req.params.labAId,
        req.params.labBId
      );
      res.json({ scope, status: 'accepted', collaboration: data });
    } catch (err) {
      sendError(res, err, container.resolve('logger'));
    }
  }

  async email(req: Request, res: Response) {
    try {
      const { scope, data } = await this.collaborationService.email(
        requireScope(req),
        req.params.labAId,
        req.params.labBId
      );
      res.json({ scope, email: data });
    } catch (err) {
      sendError(res, err, container.resolve('logger'));
    }
  }
}

export default CollaborationController;
