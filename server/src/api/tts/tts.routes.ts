import { Router } from 'express';
import type { Config } from '../../config';
import { createRateLimiter } from '../../middleware/rateLimit';
import validate from '../../middleware/validate';
import asyncHandler from '../../utils/asyncHandler';
import type { TtsController } from './tts.controller';
import { synthesizeBodySchema } from './tts.validation';

export const createTtsRoutes = (controller: TtsController, rateLimitConfig: Config['rateLimit']) => {
  const router = Router();

  const ttsLimiter = createRateLimiter({
    enabled: rateLimitConfig.enabled,
    windowMs: rateLimitConfig.windowMs,
    limit: rateLimitConfig.ttsPerWindow,
  });
  const voicesLimiter = createRateLimiter({
    enabled: rateLimitConfig.enabled,
    windowMs: rateLimitConfig.windowMs,
    limit: rateLimitConfig.voicesPerWindow,
  });

  router.post('/tts', ttsLimiter, validate(synthesizeBodySchema), asyncHandler(controller.synthesize));
  router.get('/voices', voicesLimiter, asyncHandler(controller.listVoices));

  return router;
};
