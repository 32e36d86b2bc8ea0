import { z } from "zod";

export const LifecycleStateSchema = z.enum([
  "uninitialized",
  "run-active",
  "class-active",
  "test-active",
  "torn-down",
]);
export type LifecycleState = z.infer<typeof LifecycleStateSchema>;
