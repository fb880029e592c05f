import type { NextFunction, Request, RequestHandler, Response } from "express";
import jwt, { type JwtPayload } from "jsonwebtoken";

function bearerToken(req: Request): string | undefined {
  const header = req.header("authorization");
  if (!header) return undefined;
  const [scheme, token] = header.split(" ");
  if (scheme?.toLowerCase() !== "bearer" || !token) return undefined;
  return token;
}

/**
 * Verifies the HS256 access token issued by the identity service and exposes
 * its `sub` claim (the caller's bare JID) through `callerIdentity`.
 */
export function requireIdentity(secret: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const token = bearerToken(req);
    if (!token) {
      res.status(401).json({ ok: false, error: "missing bearer token" });
      return;
    }

    let payload: string | JwtPayload;
    try {
      payload = jwt.verify(token, secret, { algorithms: ["HS256"] });
    } catch (error) {
      const expired = error instanceof jwt.TokenExpiredError;
      res.status(401).json({ ok: false, error: expired ? "token expired" : "invalid token" });
      return;
    }

    if (typeof payload === "string" || typeof payload.sub !== "string" || payload.sub.length === 0) {
      res.status(401).json({ ok: false, error: "token missing sub claim" });
      return;
    }

    res.locals.identity = payload.sub;
    next();
  };
}

export function callerIdentity(res: Response): string {
  const identity: unknown = res.locals.identity;
  if (typeof identity !== "string") {
    throw new Error("requireIdentity middleware did not run");
  }
  return identity;
}
