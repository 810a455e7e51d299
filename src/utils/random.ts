import { randomUUID } from "node:crypto";

export function randomId(prefix = ""): string {
  return `${prefix}${randomUUID().replace(/-/g, "").slice(0, 12)}`;
}
