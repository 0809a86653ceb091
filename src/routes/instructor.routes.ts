import { Router } from 'express';
import {
  register,
  login,
  getMe,
  updateMe,
  listApiKeys,
  createApiKey,
  revokeApiKey,
} from '../controllers/instructor.controller';
import { authenticate } from '../middleware/auth.middleware';
import { validate, validateParams } from '../middleware/validation.middleware';
import type { RateLimiters } from '../middleware/rate-limit.middleware';
import {
  registerSchema,
  loginSchema,
  updateProfileSchema,
  createApiKeySchema,
  keyIdParamsSchema,
} from '../utils/validation.schemas';

export function createInstructorRoutes(limiters: RateLimiters): Router {
  const router = Router();

  // Public identity endpoints
  router.post('/register', limiters.register, validate(registerSchema), register);
  router.post('/login', limiters.login, validate(loginSchema), login);

  // Profile
  router.get('/me', authenticate, getMe);
  router.put('/me', authenticate, validate(updateProfileSchema), updateMe);

  // API keys
  router.get('/me/api-keys', authenticate, listApiKeys);
  router.post('/me/api-keys', authenticate, validate(createApiKeySchema), createApiKey);
  router.delete('/me/api-keys/:keyId', authenticate, validateParams(keyIdParamsSchema), revokeApiKey);

  return router;
}
