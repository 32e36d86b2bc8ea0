import { randomUUID } from "node:crypto";

/**
 * Appends a random UUID to `label`. Names are unique in practice but nothing
 * checks for collisions, and tests must not rely on the readable part.
 */
export function uniqueName(label: string): string {
  return `${label} - ${randomUUID()}`;
}
