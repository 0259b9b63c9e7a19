import { z } from 'zod';

// null means no limit, which is what inspect takes it to mean.
export const ReprConfigSchema = z.object({
  depth: z.number().int().min(0).nullable().default(null),
  maxArrayLength: z.number().int().min(0).nullable().default(null),
  maxStringLength: z.number().int().min(0).nullable().default(null),
});

export type ReprConfig = z.infer<typeof ReprConfigSchema>;

export const DEFAULT_REPR_CONFIG: ReprConfig = ReprConfigSchema.parse({});
