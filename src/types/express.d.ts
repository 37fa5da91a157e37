import type { Caller } from "../policy/AccessPolicy";
import type { AccessTokenClaims } from "../services/SessionService";

declare global {
  namespace Express {
    interface Request {
      caller?: Caller;
      accessToken?: AccessTokenClaims;
    }
  }
}

export {};
