import { z } from "zod";

const positiveMs = z.number().int().positive();

export const poolConfigSchema = z.object({
  workerCommand: z.string().min(1),
  workerArgs: z.array(z.string()).optional(),
  mappingPath: z.string().min(1),

  poolSize: z.number().int().min(1).optional(),

  // Timeouts
  minimumTimeoutMs: positiveMs.optional(),
  perLineTimeoutMs: z.number().positive().finite().optional(),

  // Process environment
  cwd: z.string().min(1).optional(),
  env: z.record(z.string()).optional(),
});
