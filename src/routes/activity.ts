// src/routes/activity.ts
import express from "express";
import type { RequestHandler } from "express";
import type { DateTime } from "luxon";
import type { ActivityRepository } from "../types";
import { evaluateInactivity } from "../util/inactivity";
import { requireUser } from "./_ensureAuth";
import { sendError } from "./_respond";

export interface ActivityRouterDeps {
  activity: ActivityRepository;
  ensureAuth: RequestHandler;
  thresholdMinutes: number;
  now: () => DateTime;
}

export function createActivityRouter(deps: ActivityRouterDeps) {
  const activity = express.Router();
  activity.use(deps.ensureAuth);

  const touch: RequestHandler = async (req, res) => {
    try {
      const user = requireUser(req);
      const at = deps.now().toISO() ?? new Date().toISOString();
      await deps.activity.touch(user.id, at);
      return res.json({ success: true, last_activity: at });
    } catch (e) {
      return sendError(res, e, "[ACTIVITY] update error", "activity_update_failed");
    }
  };

  // POST /api/activity        (any interaction)
  // POST /api/activity/reset  (user answered the inactivity prompt)
  activity.post("/", touch);
  activity.post("/reset", touch);

  // GET /api/activity/check
  activity.get("/check", async (req, res) => {
    try {
      const user = requireUser(req);
      const last = await deps.activity.getLastActivity(user.id);
      return res.json(evaluateInactivity(last, deps.now(), deps.thresholdMinutes));
    } catch (e) {
      return sendError(res, e, "[ACTIVITY] check error", "activity_check_failed");
    }
  });

  // GET /api/activity/status
  activity.get("/status", async (req, res) => {
    try {
      const user = requireUser(req);
      const last = await deps.activity.getLastActivity(user.id);
      const status = evaluateInactivity(last, deps.now(), deps.thresholdMinutes);
      return res.json({
        last_activity: last,
        is_inactive: status.is_inactive,
        message: status.message,
        inactivity_threshold_minutes: deps.thresholdMinutes,
      });
    } catch (e) {
      return sendError(res, e, "[ACTIVITY] status error", "activity_status_failed");
    }
  });

  return activity;
}
