import type { Request, Response } from 'express';
import container from '../config/container';
import type InvitationService from '../services/InvitationService';
import { sendError } from '../utils/errors';
import { requirePrincipal } from '../utils/http/requestContext';

class InvitationController {
  private invitationService: InvitationService;

  constructor() {
    this.invitationService = container.resolve('invitationService');
    this.listMine = this.listMine.bind(this);
    this.accept = this.accept.bind(this);
    this.reject = this.reject.bind(this);
  }

  async listMine(req: Request, res: Response) {
    try {
      const invitations = await this.invitationService.listMine(requirePrincipal(req));
      res.json(invitations);
    } catch (err) {
      sendError(res, err, container.resolve('logger'));
    }
  }

  async accept(req: Request, res: Response) {
    try {
      const accepted = await this.invitationService.accept(requirePrincipal(req), req.params.invitationId);
      res.json(accepted);
    } catch (err) {
      sendError(res, err, container.resolve('logger'));
    }
  }

  async reject(req: Request, res: Response) {
    try {
      const invitation = await this.invitationService.reject(requirePrincipal(req), req.params.invitationId);
      res.json(invitation);
    } catch (err) {
      sendError(res, err, container.resolve('logger'));
    }
  }
}

export default InvitationController;
