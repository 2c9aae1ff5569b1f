/**
 * TypeScript declaration file to extend Express types
 */

import type { OrganizationContext } from './models/Organization';
import type { Principal } from './models/User';

declare global {
  namespace Express {
    interface Request {
      /**
       * Populated from a valid bearer token
       */
      principal?: Principal;

      /**
       * Populated for routes bound to the token's organization, with the role
       * the principal currently holds there
       */
      scope?: OrganizationContext;
    }
  }
}

export {};
