// src/routes/_ensureAuth.ts
import type { Request, RequestHandler } from "express";
import jwt from "jsonwebtoken";
import { z } from "zod";
import { DomainError, errorMessage } from "../errors";
import { isRowId } from "../db/rows";
import type { UserRepository } from "../types";

declare global {
  namespace Express {
    interface Request {
      user_id?: string;
      username?: string;
    }
  }
}

const TokenPayload = z.object({ user_id: z.string().refine(isRowId) });

export function signToken(userId: string, jwtSecret: string): string {
  return jwt.sign({ user_id: userId }, jwtSecret, { expiresIn: "14d" });
}

export function createEnsureAuth(users: UserRepository, jwtSecret: string): RequestHandler {
  return async (req, res, next) => {
    let userId: string;
    try {
      const h = req.headers.authorization || "";
      const t = h.startsWith("Bearer ") ? h.slice(7) : "";
      userId = TokenPayload.parse(jwt.verify(t, jwtSecret)).user_id;
    } catch {
      // invalid/missing token, jwt.verify failed, or user_id is not a row id
      return res.status(401).json({ error: "unauthorized" });
    }

    try {
      // account may have been removed since the token was issued
      const user = await users.findById(userId);
      if (!user) return res.status(401).json({ error: "unauthorized" });

      req.user_id = user.id;
      req.username = user.username;
      return next();
    } catch (e) {
      console.error("[ensureAuth] user lookup error:", errorMessage(e));
      return res.status(500).json({ error: "auth_lookup_failed" });
    }
  };
}

export function requireUser(req: Request): { id: string; username: string } {
  if (!req.user_id || !req.username) {
    throw new DomainError("Not authenticated", 401, "unauthorized");
  }
  return { id: req.user_id, username: req.username };
}
