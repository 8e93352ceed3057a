import type { NextFunction, Request, RequestHandler, Response } from 'express';

type AsyncRequestHandler<P> = (req: Request<P>, res: Response, next: NextFunction) => Promise<unknown>;

export function asyncHandler<P = Record<string, string>>(fn: AsyncRequestHandler<P>): RequestHandler<P> {
  return (req, res, next) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
