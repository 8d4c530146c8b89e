// src/routes/auth.ts
import express from "express";
import type { RequestHandler } from "express";
import bcrypt from "bcryptjs";
import { z } from "zod";
import type { UserRepository } from "../types";
import { validatePassword, validateUsername } from "../util/accounts";
import { requireUser, signToken } from "./_ensureAuth";
import { sendError } from "./_respond";

const SignupBody = z.object({
  username: z.string().default(""),
  password: z.string().default(""),
  confirm_password: z.string().default(""),
});

const LoginBody = z.object({
  username: z.string().default(""),
  password: z.string().default(""),
});

export interface AuthRouterDeps {
  users: UserRepository;
  jwtSecret: string;
  ensureAuth: RequestHandler;
}

export function createAuthRouter(deps: AuthRouterDeps) {
  const auth = express.Router();

  // POST /api/auth/signup  {username, password, confirm_password}
  auth.post("/signup", async (req, res) => {
    try {
      const body = SignupBody.safeParse(req.body ?? {});
      if (!body.success) return res.status(400).json({ error: "invalid_body" });
      const { username, password, confirm_password } = body.data;

      const usernameErr = validateUsername(username);
      if (usernameErr) {
        return res.status(400).json({ error: "invalid_username", message: usernameErr });
      }
      const passwordErr = validatePassword(password);
      if (passwordErr) {
        return res.status(400).json({ error: "invalid_password", message: passwordErr });
      }
      if (password !== confirm_password) {
        return res
          .status(400)
          .json({ error: "passwords_do_not_match", message: "Passwords do not match." });
      }

      const hash = await bcrypt.hash(password, 10);
      const user = await deps.users.create(username.trim(), hash);
      console.log("[AUTH] signup", { user_id: user.id });

      return res.status(201).json({ token: signToken(user.id, deps.jwtSecret), user });
    } catch (e) {
      return sendError(res, e, "[AUTH] signup error", "signup_failed");
    }
  });

  // POST /api/auth/login {username, password}
  auth.post("/login", async (req, res) => {
    try {
      const body = LoginBody.safeParse(req.body ?? {});
      if (!body.success) return res.status(400).json({ error: "invalid_body" });
      const { username, password } = body.data;
      if (!username.trim() || !password) {
        return res.status(400).json({ error: "username_password_required" });
      }

      const found = await deps.users.findByUsername(username);
      // same answer for unknown user and wrong password
      if (!found || !(await bcrypt.compare(password, found.password_hash))) {
        return res
          .status(401)
          .json({ error: "invalid_credentials", message: "Invalid username or password." });
      }

      const user = { id: found.id, username: found.username, created_at: found.created_at };
      return res.json({ token: signToken(user.id, deps.jwtSecret), user });
    } catch (e) {
      return sendError(res, e, "[AUTH] login error", "login_failed");
    }
  });

  // GET /api/auth/me
  auth.get("/me", deps.ensureAuth, async (req, res) => {
    try {
      const { id } = requireUser(req);
      const user = await deps.users.findById(id);
      if (!user) return res.status(404).json({ error: "user_not_found" });
      return res.json({ user });
    } catch (e) {
      return sendError(res, e, "[AUTH] me error", "me_failed");
    }
  });

  return auth;
}
