import type { Request, Response, NextFunction } from 'express';

type AsyncRequestHandler<Req extends Request> = (req: Req, res: Response, next: NextFunction) => Promise<unknown>;

// Express 5 forwards rejections itself, but handlers stay wrapped so unit tests can await them.
const asyncHandler =
  <Req extends Request = Request>(fn: AsyncRequestHandler<Req>) =>
  (req: Req, res: Response, next: NextFunction): Promise<void> =>
    Promise.resolve()
      .then(() => fn(req, res, next))
      .then(
        () => undefined,
        (error: unknown) => next(error)
      );

export default asyncHandler;
