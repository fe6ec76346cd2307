import { NextFunction, Request, Response } from "express";
import { Account } from "../models/store";
import { ErrorCode, ServiceError } from "../services/errors";
import { IdentityService } from "../services/identityService";
import { authorize, Capability } from "../services/policy";

declare global {
  namespace Express {
    interface Request {
      account?: Account;
    }
  }
}

// Resolves "Authorization: Bearer <token>" to an account, or fails with 401.
export function requireAuth(identity: IdentityService) {
  return (req: Request, _res: Response, next: NextFunction) => {
    const header = req.headers.authorization ?? "";
    const [scheme, token] = header.split(" ");
    if (scheme !== "Bearer" || !token) {
      next(new ServiceError(ErrorCode.UNAUTHENTICATED, "Not authenticated"));
      return;
    }
    try {
      req.account = identity.authenticate(token);
      next();
    } catch (err) {
      next(err);
    }
  };
}

export function currentAccount(req: Request): Account {
  if (!req.account) {
    throw new ServiceError(ErrorCode.UNAUTHENTICATED, "Not authenticated");
  }
  return req.account;
}

// Checks the role before the body is validated, so a wrong role is always 403.
export function requireCapability(capability: Capability) {
  return (req: Request, _res: Response, next: NextFunction) => {
    try {
      authorize(currentAccount(req).role, capability);
      next();
    } catch (err) {
      next(err);
    }
  };
}
