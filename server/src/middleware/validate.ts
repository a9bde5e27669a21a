import type { Request, Response, NextFunction } from 'express';
import type { ZodTypeAny } from 'zod';

export type FieldErrors = Record<string, string[]>;

/** Validates `req.body`, replacing it with the parsed value or answering 422 with per-field messages. */
const validate = (schema: ZodTypeAny) => (req: Request, res: Response, next: NextFunction) => {
  const parsed = schema.safeParse(req.body ?? {});

  if (!parsed.success) {
    const errors: FieldErrors = {};
    for (const issue of parsed.error.issues) {
      const field = issue.path.join('.') || 'body';
      (errors[field] ??= []).push(issue.message);
    }

    res.status(422).json({
      success: false,
      message: 'validation error',
      errors,
    });
    return;
  }

  req.body = parsed.data;
  next();
};

export default validate;
