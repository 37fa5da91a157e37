import { Request, Response } from "express";
import { Action, ResourceType, evaluate } from "../policy/AccessPolicy";
import { currentCaller, sendDenied } from "../middleware/auth";
import { loginSchema, refreshTokenRequestSchema } from "../models/schemas";
import { sessionService } from "../services/SessionService";
import { userService } from "../services/UserService";
import { sendValidationError } from "../utils/validation";

export class AuthController {
  static async login(req: Request, res: Response) {
    try {
      const parsed = loginSchema.safeParse(req.body);
      if (!parsed.success) return sendValidationError(res, parsed.error);
      const { email, password } = parsed.data;

      // Same answer for unknown email, wrong password and inactive user
      const user = await userService.findActiveByEmail(email);
      if (!user || !(await userService.verifyPassword(user, password))) {
        res.setHeader("WWW-Authenticate", "Bearer");
        return res.status(401).json({ error: "Incorrect email or password" });
      }

      const tokens = await sessionService.issue(user.id);
      res.json(tokens);
    } catch (error) {
      console.error("Login Error:", error);
      res.status(500).json({ error: "Internal Server Error" });
    }
  }

  static async refresh(req: Request, res: Response) {
    try {
      const parsed = refreshTokenRequestSchema.safeParse(req.body);
      if (!parsed.success) return sendValidationError(res, parsed.error);
      const token = parsed.data.refresh_token;

      const stored = await sessionService.findRefreshToken(token);
      if (!stored) {
        return res
          .status(401)
          .json({ error: "Invalid or expired refresh token" });
      }

      const decision = evaluate(
        currentCaller(req),
        Action.Update,
        ResourceType.Session,
        { ownerId: stored.user_id },
      );
      if (!decision.allowed) return sendDenied(res, decision.reason);

      // Null when a concurrent refresh consumed the token first
      const tokens = await sessionService.renew(token);
      if (!tokens) {
        return res
          .status(401)
          .json({ error: "Invalid or expired refresh token" });
      }

      res.json(tokens);
    } catch (error) {
      console.error("Refresh Error:", error);
      res.status(500).json({ error: "Internal Server Error" });
    }
  }

  static async logout(req: Request, res: Response) {
    try {
      const parsed = refreshTokenRequestSchema.safeParse(req.body);
      if (!parsed.success) return sendValidationError(res, parsed.error);
      const token = parsed.data.refresh_token;

      const stored = await sessionService.findRefreshToken(token);
      if (stored) {
        const decision = evaluate(
          currentCaller(req),
          Action.Delete,
          ResourceType.Session,
          { ownerId: stored.user_id },
        );
        if (!decision.allowed) return sendDenied(res, decision.reason);

        await sessionService.revoke(token);
      }

      if (req.accessToken) {
        await sessionService.blacklistAccessToken(req.accessToken);
      }

      res.status(204).end();
    } catch (error) {
      console.error("Logout Error:", error);
      res.status(500).json({ error: "Internal Server Error" });
    }
  }
}
