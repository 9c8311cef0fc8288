import { z } from 'zod';

const TRUE_CHOICES = ['t', 'T', 'true', 'True', 'TRUE'] as const;
const FALSE_CHOICES = ['f', 'F', 'false', 'False', 'FALSE'] as const;

const TRUE_SET: ReadonlySet<string> = new Set(TRUE_CHOICES);

const booleanChoiceSchema = z
  .enum([...TRUE_CHOICES, ...FALSE_CHOICES])
  .transform((v) => TRUE_SET.has(v));

export const monitorOptionsSchema = z.object({
  file: z.string().min(1),
  threads: z.coerce.number().int().min(1).default(10),
  // Seconds; fractional values are allowed.
  cycleLength: z.coerce.number().finite().positive().default(15),
  colorize: booleanChoiceSchema.default('true'),
  verbose: booleanChoiceSchema.default('false'),
  statusPort: z.coerce.number().int().min(1).max(65535).optional(),
});

