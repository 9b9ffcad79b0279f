import { Router } from 'express';
import { z } from 'zod';
import type { AuthService } from '../auth.js';
import { HttpError, bearerToken, currentUserId, parseWith, requireUser } from '../http.js';
import type { Repository } from '../repo.js';
import { serializeUser } from '../serialize.js';

const registerSchema = z.object({
  name: z.string().trim().max(100),
  email: z.string().trim().max(120),
  password: z.string(),
  confirm_password: z.string().optional(),
});

const loginSchema = z.object({
  email: z.string(),
  password: z.string(),
});

export function authRouter(auth: AuthService, repo: Repository, now: () => Date): Router {
  const router = Router();

  // POST /auth/register - Create an account and sign in
  router.post('/register', (req, res) => {
    const body = parseWith(registerSchema, req.body);
    if (body.confirm_password !== undefined && body.confirm_password !== body.password) {
      throw new HttpError(400, 'Passwords do not match.');
    }

    const result = auth.register(body.name, body.email, body.password);
    if (!result.ok) {
      throw new HttpError(result.reason === 'duplicate' ? 409 : 400, result.error);
    }

    const session = auth.startSession(result.user.id);
    console.log(`Registered user ${result.user.id}`);
    res.status(201).json({
      user: serializeUser(result.user),
      token: session.token,
      expires_at: session.expiresAt.toISOString(),
    });
  });

  // POST /auth/login - Exchange credentials for a session token
  router.post('/login', (req, res) => {
    const body = parseWith(loginSchema, req.body);
    const user = auth.authenticate(body.email, body.password);
    if (!user) {
      throw new HttpError(401, 'Invalid email or password.');
    }
    const session = auth.startSession(user.id);
    res.json({
      user: serializeUser(user),
      token: session.token,
      expires_at: session.expiresAt.toISOString(),
    });
  });

  // POST /auth/logout - Drop the current session
  router.post('/logout', (req, res) => {
    const token = bearerToken(req);
    if (token) auth.endSession(token);
    res.json({ ok: true });
  });

  // GET /auth/me - The signed-in user
  router.get('/me', requireUser(repo, now), (_req, res) => {
    const user = repo.findUserById(currentUserId(res));
    if (!user) {
      throw new HttpError(404, 'User not found');
    }
    res.json(serializeUser(user));
  });

  return router;
}
