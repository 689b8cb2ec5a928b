import type { ApiKeyPrincipal } from '../../auth/types.js';

declare global {
  namespace Express {
    interface Request {
      principal?: ApiKeyPrincipal;
    }
  }
}

export {};
