// src/middleware/auth.ts
import type { NextFunction, Request, RequestHandler, Response } from "express";
import type { UserType } from "../db/schema";
import { AuthError, ForbiddenError } from "../errors";
import type { AuthService } from "../services/auth";
import type { Actor } from "../services/context";

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      actor?: Actor;
    }
  }
}

/** Resolves `Authorization: Bearer <access token>` to `req.actor`. */
export function requireAuth(auth: AuthService): RequestHandler {
  return async (req: Request, _res: Response, next: NextFunction) => {
    try {
      const header = req.header("authorization") ?? "";
      const [scheme, token] = header.split(" ");
      if (scheme?.toLowerCase() !== "bearer" || !token) throw new AuthError("unauthorized", "missing bearer token");
      req.actor = await auth.resolve(token);
      next();
    } catch (e) { next(e); }
  };
}

export function requireRole(...roles: UserType[]): RequestHandler {
  return (req, _res, next) => {
    if (!req.actor) return next(new AuthError());
    if (!roles.includes(req.actor.role)) return next(new ForbiddenError());
    next();
  };
}

export const requireStaff = requireRole("staff", "manager", "admin");

export function actorOf(req: Request): Actor {
  if (!req.actor) throw new AuthError();
  return req.actor;
}
