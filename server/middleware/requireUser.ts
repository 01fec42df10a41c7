import type { Request, Response, NextFunction } from "express";
import { AuthenticationError } from "../utils/errors";
import { updateContext } from "./correlationContext";

declare global {
  namespace Express {
    interface Request {
      callerId?: string;
    }
  }
}

/** Set by the upstream auth layer once the caller is authenticated. */
export const USER_HEADER = "x-user-id";

export function requireUser(req: Request, _res: Response, next: NextFunction): void {
  const userId = req.header(USER_HEADER)?.trim();
  if (!userId) {
    next(new AuthenticationError());
    return;
  }
  req.callerId = userId;
  updateContext({ userId });
  next();
}

export function getCallerId(req: Request): string {
  if (!req.callerId) {
    throw new AuthenticationError();
  }
  return req.callerId;
}
