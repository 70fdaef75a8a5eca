import { randomUUID } from "node:crypto";

export function newEventId(): string {
  return `EVT-${new Date().toISOString()}-${randomUUID().split("-")[0]}`;
}
