// src/parsers/intentSchema.ts
import { z } from 'zod';

// Models send null or "" for fields that do not apply; both read as absent
const optionalField = z
  .string()
  .nullish()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

export const IntentSchema = z.object({
  action: z.enum(['create', 'delete', 'move', 'list']),
  title: optionalField,
  date: optionalField,
  time: optionalField,
  end_time: optionalField,
  new_date: optionalField,
  new_time: optionalField,
  new_end_time: optionalField,
  confidence: z.number().min(0).max(1).default(0),
});

export type IntentSchemaOutput = z.output<typeof IntentSchema>;
