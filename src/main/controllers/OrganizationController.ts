import type { Request, Response } from 'express';
import container from '../config/container';
import type InvitationService from '../services/InvitationService';
import type OrganizationService from '../services/OrganizationService';
import { sendError } from '../utils/errors';
import { requirePrincipal, requireScope } from '../utils/http/requestContext';

class OrganizationController {
  private organizationService: OrganizationService;
  private invitationService: InvitationService;

  constructor() {
    this.organizationService = container.resolve('organizationService');
    this.invitationService = container.resolve('invitationService');
    this.listMine = this.listMine.bind(this);
    this.create = this.create.bind(this);
    this.getCurrent = this.getCurrent.bind(this);
    this.getById = this.getById.bind(this);
    this.listMembers = this.listMembers.bind(this);
    this.updateMemberRole = this.updateMemberRole.bind(this);
    this.removeMember = this.removeMember.bind(this);
    this.createInvitation = this.createInvitation.bind(this);
    this.listInvitations = this.listInvitations.bind(this);
  }

  async listMine(req: Request, res: Response) {
    try {
      const memberships = await this.organizationService.listMine(requirePrincipal(req).userId);
      res.json(memberships);
    } catch (err) {
      sendError(res, err, container.resolve('logger'));
    }
  }

  async create(req: Request, res: Response) {
    try {
      const { name, description } = req.body;
      const organization = await this.organizationService.create(requirePrincipal(req).userId, { name, description });
      res.status(201).json(organization);
    } catch (err) {
      sendError(res, err, container.resolve('logger'));
    }
  }

  async getCurrent(req: Request, res: Response) {
    try {
      const organization = await this.organizationService.current(requireScope(req));
      res.json(organization);
    } catch (err) {
      sendError(res, err, container.resolve('logger'));
    }
  }

  async getById(req: Request, res: Response) {
    try {
      const organization = await this.organizationService.getScoped(requireScope(req), req.params.organizationId);
      res.json(organization);
    } catch (err) {
      sendError(res, err, container.resolve('logger'));
    }
  }

  async listMembers(req: Request, res: Response) {
    try {
      const members = await this.organizationService.listMembers(requireScope(req), req.params.organizationId);
      res.json(members);
    } catch (err) {
      sendError(res, err, container.resolve('logger'));
    }
  }

  async updateMemberRole(req: Request, res: Response) {
    try {
      const member = await this.organizationService.updateMemberRole(
        requireScope(req),
        req.params.organizationId,
        req.params.userId,
        req.body.role
      );
      res.json(member);
    } catch (err) {
      sendError(res, err, container.resolve('logger'));
    }
  }

  async removeMember(req: Request, res: Response) {
    try {
      await this.organizationService.removeMember(requireScope(req), req.params.organizationId, req.params.userId);
      res.status(204).send();
    } catch (err) {
      sendError(res, err, container.resolve('logger'));
    }
  }

  async createInvitation(req: Request, res: Response) {
    try {
      const { email, role } = req.body;
      const invitation = await this.invitationService.create(requireScope(req), req.params.organizationId, {
        email,
        role: role ?? 'member',
      });
      res.status(201).json(invitation);
    } catch (err) {
      sendError(res, err, container.resolve('logger'));
    }
  }

  async listInvitations(req: Request, res: Response) {
    try {
      const invitations = await this.invitationService.listForOrganization(
        requireScope(req),
        req.params.organizationId
      );
      res.json(invitations);
    } catch (err) {
      sendError(res, err, container.resolve('logger'));
    }
  }
}

export default OrganizationController;
