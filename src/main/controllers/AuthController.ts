import type { Request, Response } from 'express';
import container from '../config/container';
import type UserService from '../services/UserService';
import { sendError } from '../utils/errors';
import { requirePrincipal } from '../utils/http/requestContext';

class AuthController {
  private userService: UserService;

  constructor() {
    this.userService = container.resolve('userService');
    this.register = this.register.bind(this);
    this.login = this.login.bind(this);
    this.me = this.me.bind(this);
    this.switchOrganization = this.switchOrganization.bind(this);
  }

  async register(req: Request, res: Response) {
    try {
      const { email, name, password } = req.body;
      const session = await this.userService.register({ email, name, password });
      res.status(201).json(session);
    } catch (err) {
      sendError(res, err, container.resolve('logger'));
    }
  }

  async login(req: Request, res: Response) {
    try {
      const { email, password } = req.body;
      const session = await this.userService.login(email, password);
      res.json(session);
    } catch (err) {
      sendError(res, err, container.resolve('logger'));
    }
  }

  async me(req: Request, res: Response) {
    try {
      const profile = await this.userService.me(requirePrincipal(req));
      res.json(profile);
    } catch (err) {
      sendError(res, err, container.resolve('logger'));
    }
  }

  async switchOrganization(req: Request, res: Response) {
    try {
      const session = await this.userService.switchOrganization(requirePrincipal(req), req.body.organizationId);
      res.json(session);
    } catch (err) {
      sendError(res, err, container.resolve('logger'));
    }
  }
}

export default AuthController;
