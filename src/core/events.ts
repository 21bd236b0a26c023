// src/core/events.ts

import { Cl, cvToHex, type ClarityValue } from "@stacks/transactions";
import type { EventFilter, LedgerEvent, Principal } from "../types";

/**
 * Fire-and-forget destination for ledger events
 */
export interface EventSink {
  emit(event: LedgerEvent): void;
}

export class EventLog implements EventSink {
  private records: LedgerEvent[] = [];

  constructor(initial: LedgerEvent[] = []) {
    this.records = [...initial];
  }

  emit(event: LedgerEvent): void {
    this.records.push(event);
  }

  all(): LedgerEvent[] {
    return [...this.records];
  }

  /**
   * Events whose indexed fields match every field set on the filter.
   * A transfer never matches an owner/spender filter and vice versa.
   */
  filter(filter: EventFilter): LedgerEvent[] {
    return this.records.filter((event) => matchesFilter(event, filter));
  }

  clear(): void {
    this.records = [];
  }

  get size(): number {
    return this.records.length;
  }
}

export function matchesFilter(event: LedgerEvent, filter: EventFilter): boolean {
  const wants = (field: Principal | undefined, actual: Principal | null) =>
    field === undefined || field === actual;

  if (event.type === "transfer") {
    if (filter.owner !== undefined || filter.spender !== undefined) return false;
    return wants(filter.from, event.from) && wants(filter.to, event.to);
  }
  if (filter.from !== undefined || filter.to !== undefined) return false;
  return wants(filter.owner, event.owner) && wants(filter.spender, event.spender);
}

const optionalPrincipal = (principal: Principal | null): ClarityValue =>
  principal === null ? Cl.none() : Cl.some(Cl.principal(principal));

/**
 * Clarity tuple in the shape of a contract `print` event
 */
export function toClarityValue(event: LedgerEvent): ClarityValue {
  switch (event.type) {
    case "transfer":
      return Cl.tuple({
        topic: Cl.stringAscii("transfer"),
        from: optionalPrincipal(event.from),
        to: optionalPrincipal(event.to),
        value: Cl.uint(event.value),
      });
    case "approval":
      return Cl.tuple({
        topic: Cl.stringAscii("approval"),
        owner: Cl.principal(event.owner),
        spender: Cl.principal(event.spender),
        value: Cl.uint(event.value),
      });
  }
}

export function encodeEvent(event: LedgerEvent): string {
  return cvToHex(toClarityValue(event));
}
