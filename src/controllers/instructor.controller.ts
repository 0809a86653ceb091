import type { Request, Response, NextFunction } from 'express';
import { getCompositionRoot } from '../app/composition-root';
import { requireAuth } from '../middleware/auth.middleware';
import { ok } from '../utils/api-response';
import type { LoginBody, RegisterBody, UpdateProfileBody } from '../utils/validation.schemas';

/**
 * POST /api/v1/instructors/register
 * Creates the account and reveals its primary API key once.
 */
export async function register(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const body: RegisterBody = req.body;
    const result = await getCompositionRoot().getInstructorService().register({
      username: body.username,
      password: body.password,
      email: body.email ?? null,
      displayName: body.displayName ?? null,
    });
    ok(res, result, 201);
  } catch (error) {
    next(error);
  }
}

/**
 * POST /api/v1/instructors/login
 */
export async function login(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const body: LoginBody = req.body;
    const result = await getCompositionRoot().getInstructorService().login(body.login, body.password);
    ok(res, result);
  } catch (error) {
    next(error);
  }
}

export async function getMe(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const profile = await getCompositionRoot().getInstructorService().getProfile(requireAuth(req));
    ok(res, { instructor: profile });
  } catch (error) {
    next(error);
  }
}

export async function updateMe(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const body: UpdateProfileBody = req.body;
    const profile = await getCompositionRoot().getInstructorService().updateProfile(requireAuth(req), body);
    ok(res, { instructor: profile });
  } catch (error) {
    next(error);
  }
}

export async function listApiKeys(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const keys = await getCompositionRoot().getApiKeyService().listKeys(requireAuth(req));
    ok(res, { apiKeys: keys });
  } catch (error) {
    next(error);
  }
}

/**
 * POST /api/v1/instructors/me/api-keys
 * The full key is only ever returned here.
 */
export async function createApiKey(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { name }: { name: string } = req.body;
    const key = await getCompositionRoot().getApiKeyService().createKey(requireAuth(req), name);
    ok(res, { apiKey: key }, 201);
  } catch (error) {
    next(error);
  }
}

export async function revokeApiKey(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { keyId }: { keyId: number } = res.locals.params;
    await getCompositionRoot().getApiKeyService().revokeKey(requireAuth(req), keyId);
    ok(res, { revoked: true, keyId });
  } catch (error) {
    next(error);
  }
}
