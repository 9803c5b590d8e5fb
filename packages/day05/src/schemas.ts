import { z } from 'zod';

export const SolveOptionsSchema = z
  .object({
    /** `position-map` is the linear check; `pairwise` is the quadratic reference. */
    validator: z.enum(['position-map', 'pairwise']).default('position-map'),
    /** Only read by the pairwise validator. */
    ruleLookup: z.enum(['scan', 'indexed']).default('scan'),
  })
  .strict();

export type SolveOptions = z.infer<typeof SolveOptionsSchema>;
export type SolveOptionsInput = z.input<typeof SolveOptionsSchema>;
