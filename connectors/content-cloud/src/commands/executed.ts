/** Returns what a command produced, or throws if it has not run yet. */
export function requireExecuted<T>(value: T | null, command: string): T {
  if (value === null) {
    throw new Error(`${command} has not been executed`);
  }
  return value;
}
