import { Router, RequestHandler } from 'express';
import { asyncHandler } from '../middleware/async-handler.js';
import { AuthService } from '../services/auth/auth.service.js';
import { UserService } from '../services/auth/user.service.js';
import { AuthError } from '../errors.js';
import { loginSchema, parseInput, registerSchema } from './schemas.js';

export interface AuthRouterDeps {
  auth: AuthService;
  users: UserService;
  requireAuth: RequestHandler;
}

export function createAuthRouter({ auth, users, requireAuth }: AuthRouterDeps): Router {
  const router = Router();

  /**
   * POST /auth/register
   * Create an account; JSON or form-encoded body
   */
  router.post(
    '/register',
    asyncHandler(async (req, res) => {
      const input = parseInput(registerSchema, req.body);
      const user = await users.register(input);
      res.status(201).json(user);
    })
  );

  /**
   * POST /auth/login
   * Exchange username/password for a bearer token
   */
  router.post(
    '/login',
    asyncHandler(async (req, res) => {
      const { username, password } = parseInput(loginSchema, req.body);
      res.json(await auth.login(username, password));
    })
  );

  /**
   * GET /auth/me
   */
  router.get(
    '/me',
    requireAuth,
    asyncHandler(async (req, res) => {
      if (!req.user) {
        throw new AuthError('Not authenticated');
      }
      res.json(req.user);
    })
  );

  return router;
}
