import { Request, Response } from "express";
import { authenticatedCaller, sendDenied } from "../middleware/auth";
import { userCreateSchema } from "../models/schemas";
import { toUserPrivate, userService } from "../services/UserService";
import { sendValidationError } from "../utils/validation";

export class UserController {
  static async createUser(req: Request, res: Response) {
    try {
      const parsed = userCreateSchema.safeParse(req.body);
      if (!parsed.success) return sendValidationError(res, parsed.error);
      const input = parsed.data;

      if (await userService.usernameTaken(input.username)) {
        return res.status(400).json({ error: "Username already exists" });
      }
      if (await userService.emailTaken(input.email)) {
        return res.status(400).json({ error: "Email already exists" });
      }

      const user = await userService.create(input);
      if (!user) {
        return res
          .status(400)
          .json({ error: "Username or email already exists" });
      }

      res.status(201).json(user);
    } catch (error) {
      console.error("Create User Error:", error);
      res.status(500).json({ error: "Internal Server Error" });
    }
  }

  static async me(req: Request, res: Response) {
    const caller = authenticatedCaller(req);
    if (!caller) return sendDenied(res, "NotAuthenticated");

    try {
      const user = await userService.findById(caller.id);
      if (!user) return res.status(404).json({ error: "User not found" });

      res.json(toUserPrivate(user));
    } catch (error) {
      console.error("Me Error:", error);
      res.status(500).json({ error: "Internal Server Error" });
    }
  }
}
