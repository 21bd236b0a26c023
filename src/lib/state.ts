import fs from "fs";
import path from "path";
import { z } from "zod";
import { ERROR_CODES } from "../constants";
import { ErrorUtils } from "../utils";
import type { LedgerEvent, LedgerSnapshot } from "../types";

/**
 * On-disk form of a ledger as the CLI hosts it: the ledger snapshot plus
 * the event log the host has recorded so far.
 */
export interface StateFile {
  ledger: LedgerSnapshot;
  events: StoredEvent[];
}

const StoredEventSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("transfer"),
    from: z.string().nullable(),
    to: z.string().nullable(),
    value: z.string().regex(/^\d+$/),
  }),
  z.object({
    type: z.literal("approval"),
    owner: z.string(),
    spender: z.string(),
    value: z.string().regex(/^\d+$/),
  }),
]);

export type StoredEvent = z.infer<typeof StoredEventSchema>;

// The ledger part is validated by Ledger.restore
const StateFileSchema = z.object({
  ledger: z.unknown(),
  events: z.array(StoredEventSchema),
});

export function serializeEvent(event: LedgerEvent): StoredEvent {
  return { ...event, value: event.value.toString() };
}

export function deserializeEvent(event: StoredEvent): LedgerEvent {
  return { ...event, value: BigInt(event.value) };
}

export function stateExists(file: string): boolean {
  return fs.existsSync(file);
}

export function readState(file: string): { ledger: unknown; events: StoredEvent[] } {
  if (!fs.existsSync(file)) {
    throw ErrorUtils.createError(
      ERROR_CODES.STATE_NOT_FOUND,
      `No ledger state at ${file}; run 'tally deploy' first`,
      { file }
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, "utf8"));
  } catch (error) {
    throw ErrorUtils.createError(
      ERROR_CODES.INVALID_SNAPSHOT,
      `Unreadable ledger state at ${file}: ${error instanceof Error ? error.message : error}`,
      { file }
    );
  }

  const parsed = StateFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw ErrorUtils.createError(
      ERROR_CODES.INVALID_SNAPSHOT,
      `Invalid ledger state at ${file}: ${parsed.error.errors
        .map((e) => `${e.path.join(".")}: ${e.message}`)
        .join("; ")}`,
      { file }
    );
  }
  return { ledger: parsed.data.ledger, events: parsed.data.events };
}

export function writeState(file: string, state: StateFile): void {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  const tmp = `${file}.tmp`;
  try {
    fs.writeFileSync(tmp, JSON.stringify(state, null, 2) + "\n");
    fs.renameSync(tmp, file);
  } catch (error) {
    fs.rmSync(tmp, { force: true });
    throw error;
  }
}
