import { randomUUID } from "node:crypto";

export function reqId() {
  return randomUUID();
}
