/**
 * Rules File Schemas
 * Zod schemas for validating the YAML rules document
 */

import { z } from 'zod';

// Duration text ("6 hrs") or a number of seconds
export const DurationSchema = z.union([
  z.string().min(1, 'duration must not be empty'),
  z.number().nonnegative('duration must be >= 0'),
]);

export const PolicySchema = z
  .object({
    name: z.string().min(1).optional(),
    trackers: z.array(z.string().min(1)).min(1, 'at least one tracker hostname is required'),
    min_file_count: z.number().int().nonnegative().optional(),
    max_file_count: z.number().int().nonnegative().optional(),
    max_ratio: z.number().nonnegative().optional(),
    min_seeding_time: DurationSchema.optional(),
    max_seeding_time: DurationSchema.optional(),
    delete_data: z.boolean().default(true),
  })
  .strict();

export type PolicyInput = z.infer<typeof PolicySchema>;

export const TransmissionSchema = z
  .object({
    url: z.string().url('url must be a valid URL'),
    user: z.string().optional(),
    password: z.string().optional(),
    password_env: z.string().min(1).optional(),
    poll_interval: DurationSchema.optional(),
  })
  .strict()
  .refine((value) => value.password === undefined || value.password_env === undefined, {
    message: 'set either password or password_env, not both',
    path: ['password_env'],
  });

export type TransmissionInput = z.infer<typeof TransmissionSchema>;

export const InstanceSchema = z
  .object({
    transmission: TransmissionSchema,
    policies: z.array(PolicySchema).default([]),
  })
  .strict();

export type InstanceInput = z.infer<typeof InstanceSchema>;

export const RulesFileSchema = z
  .object({
    include: z.array(z.string().min(1)).default([]),
    instances: z.array(InstanceSchema).default([]),
  })
  .strict();

export type RulesFileInput = z.infer<typeof RulesFileSchema>;

/**
 * Validation helper that formats zod errors nicely
 */
export function formatZodError(error: z.ZodError): string {
  const errors = error.issues.map((err: z.ZodIssue) => {
    const path = err.path.join('.');
    return `${path}: ${err.message}`;
  });

  return errors.join(', ');
}
