// src/routes/reminders.ts
import express from "express";
import type { RequestHandler } from "express";
import { isRowId } from "../db/rows";
import type { ReminderRepository } from "../types";
import { parseReminderInput } from "../util/reminders";
import { requireUser } from "./_ensureAuth";
import { sendError } from "./_respond";

export interface RemindersRouterDeps {
  reminders: ReminderRepository;
  ensureAuth: RequestHandler;
}

export function createRemindersRouter(deps: RemindersRouterDeps) {
  const reminders = express.Router();
  reminders.use(deps.ensureAuth);

  // POST /api/reminders {medicine_name, time: "HH:MM"}
  reminders.post("/", async (req, res) => {
    try {
      const user = requireUser(req);
      const input = parseReminderInput(req.body);
      const reminder = await deps.reminders.add(user.id, input.medicineName, input.time);
      console.log("[REMINDERS] added", { user_id: user.id, id: reminder.id, time: reminder.time });
      return res.status(201).json({ success: true, reminder });
    } catch (e) {
      return sendError(res, e, "[REMINDERS] add error", "reminder_add_failed");
    }
  });

  // GET /api/reminders
  reminders.get("/", async (req, res) => {
    try {
      const user = requireUser(req);
      return res.json({ reminders: await deps.reminders.listForUser(user.id) });
    } catch (e) {
      return sendError(res, e, "[REMINDERS] list error", "reminder_list_failed");
    }
  });

  // DELETE /api/reminders/:id
  reminders.delete("/:id", async (req, res) => {
    try {
      const user = requireUser(req);
      if (!isRowId(req.params.id)) return res.status(404).json({ error: "reminder_not_found" });
      const ok = await deps.reminders.delete(req.params.id, user.id);
      if (!ok) return res.status(404).json({ error: "reminder_not_found" });
      return res.json({ success: true });
    } catch (e) {
      return sendError(res, e, "[REMINDERS] delete error", "reminder_delete_failed");
    }
  });

  return reminders;
}
