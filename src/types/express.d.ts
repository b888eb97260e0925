import type { AuthUser } from '../middleware/verifyToken';

declare global {
  namespace Express {
    interface Request {
      user?: AuthUser;
    }
  }
}

export {};
