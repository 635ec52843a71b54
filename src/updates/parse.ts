/**
 * Update binding - turns a raw update record into a typed Update
 */

import type { ZodIssue } from "zod";
import { MalformedUpdateError } from "../errors.js";
import { UPDATE_KINDS, UpdateSchema } from "./types.js";
import type { Update, UpdateKind } from "./types.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Read update_id from a raw record without validating anything else.
 * Returns null when the record has no integer id.
 */
export function readUpdateId(raw: unknown): number | null {
  if (!isRecord(raw)) return null;
  const id = raw.update_id;
  return typeof id === "number" && Number.isInteger(id) ? id : null;
}

function formatIssue(kind: UpdateKind, issue: ZodIssue): string {
  const path = issue.path.map(String);
  if (path[0] === "payload") path[0] = kind;
  return `${path.join(".")}: ${issue.message}`;
}

/**
 * Validate a raw record and bind it to an Update.
 *
 * @throws MalformedUpdateError when the envelope is broken, when no supported
 *   kind is present, when more than one is, or when the payload is mistyped
 */
export function parseUpdate(raw: unknown): Update {
  if (!isRecord(raw)) {
    throw new MalformedUpdateError("update is not an object");
  }

  const updateId = readUpdateId(raw);
  if (updateId === null) {
    throw new MalformedUpdateError("missing or invalid update_id");
  }

  const present = UPDATE_KINDS.filter((kind) => raw[kind] !== undefined && raw[kind] !== null);

  if (present.length === 0) {
    const others = Object.keys(raw).filter((key) => key !== "update_id");
    const reason =
      others.length > 0
        ? `no supported update kind (found: ${others.join(", ")})`
        : "no update kind present";
    throw new MalformedUpdateError(reason, updateId);
  }

  if (present.length > 1) {
    throw new MalformedUpdateError(
      `more than one update kind present (${present.join(", ")})`,
      updateId
    );
  }

  const kind = present[0];
  const result = UpdateSchema.safeParse({ kind, updateId, payload: raw[kind], raw });
  if (!result.success) {
    const reason = result.error.issues.map((issue) => formatIssue(kind, issue)).join("; ");
    throw new MalformedUpdateError(reason, updateId);
  }

  return result.data;
}
