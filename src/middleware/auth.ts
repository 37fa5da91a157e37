import { Request, Response, NextFunction } from "express";
import {
  ANONYMOUS,
  Action,
  Caller,
  Decision,
  DenyReason,
  OwnedResource,
  ResourceType,
  callerFromUser,
  evaluate,
} from "../policy/AccessPolicy";
import { sessionService } from "../services/SessionService";
import { userService } from "../services/UserService";

const DENY_STATUS: Record<DenyReason, number> = {
  NotAuthenticated: 401,
  NotSeller: 403,
  NotOwner: 403,
  Unsupported: 405,
};

const DENY_MESSAGE: Record<DenyReason, string> = {
  NotAuthenticated: "Not authenticated",
  NotSeller: "Seller account required",
  NotOwner: "You do not own this resource",
  Unsupported: "Operation not supported",
};

export const sendDenied = (res: Response, reason: DenyReason) => {
  if (reason === DenyReason.NotAuthenticated) {
    res.setHeader("WWW-Authenticate", "Bearer");
  }
  return res
    .status(DENY_STATUS[reason])
    .json({ error: DENY_MESSAGE[reason], reason });
};

const unauthorized = (res: Response, error: string) => {
  res.setHeader("WWW-Authenticate", "Bearer");
  return res.status(401).json({ error });
};

export const currentCaller = (req: Request): Caller => req.caller ?? ANONYMOUS;

/**
 * Turns the bearer token into `req.caller`. No Authorization header means
 * an anonymous caller; a header that does not resolve to an active user is
 * rejected.
 */
export const identifyCaller = async (
  req: Request,
  res: Response,
  next: NextFunction,
) => {
  try {
    const authHeader = req.headers["authorization"];
    if (!authHeader) {
      req.caller = ANONYMOUS;
      return next();
    }

    const [scheme, token] = authHeader.split(" "); // Bearer TOKEN
    if (scheme.toLowerCase() !== "bearer" || !token) {
      return unauthorized(res, "Invalid authorization header");
    }

    const claims = sessionService.verifyAccessToken(token);
    if (!claims) return unauthorized(res, "Could not validate credentials");

    if (await sessionService.isBlacklisted(claims.jti)) {
      return unauthorized(res, "Token has been revoked");
    }

    const user = await userService.findById(Number(claims.sub));
    if (!user) return unauthorized(res, "User not found or inactive");
    if (!user.is_active) {
      // A deactivated account keeps no sessions to refresh later
      await sessionService.revokeAll(user.id);
      return unauthorized(res, "User not found or inactive");
    }

    req.caller = callerFromUser(user);
    req.accessToken = claims;
    next();
  } catch (error) {
    console.error("Auth Error:", error);
    res.status(500).json({ error: "Internal Server Error" });
  }
};

type ResourceLoader = (req: Request) => Promise<OwnedResource | null>;

/**
 * Route guard around the access policy. When a loader is given, the
 * caller-level checks run first so anonymous and non-seller callers are
 * refused before anything is read; a loader returning null answers 404.
 */
export const authorize = (
  action: Action,
  resourceType: ResourceType,
  loadResource?: ResourceLoader,
) => {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      const caller = currentCaller(req);

      let decision: Decision = evaluate(caller, action, resourceType);
      if (loadResource && (decision.allowed || decision.reason === "NotOwner")) {
        const resource = await loadResource(req);
        if (!resource) return res.status(404).json({ error: "Not found" });
        decision = evaluate(caller, action, resourceType, resource);
      }

      if (!decision.allowed) return sendDenied(res, decision.reason);
      next();
    } catch (error) {
      console.error("Authorization Error:", error);
      res.status(500).json({ error: "Internal Server Error" });
    }
  };
};

export type AuthenticatedCaller = Extract<Caller, { kind: "user" }>;

/** The caller set by identifyCaller when it resolved to a user. */
export const authenticatedCaller = (req: Request): AuthenticatedCaller | null => {
  const caller = currentCaller(req);
  return caller.kind === "user" ? caller : null;
};
