// src/db/rows.ts
import { z } from "zod";

// bigint identity columns come back as numbers, uuids as strings
export const RowId = z.union([z.string(), z.number()]).transform((v) => String(v));

const ROW_ID = /^\d+$/;

/** Ids are bigint identity columns; anything else never names a row. */
export function isRowId(v: string): boolean {
  return ROW_ID.test(v);
}

export const SenderSchema = z.enum(["user", "bot"]);

/** ilike treats % and _ as wildcards; usernames may contain _ */
export function escapeLike(s: string): string {
  return s.replace(/[\\%_]/g, (c) => `\\${c}`);
}
