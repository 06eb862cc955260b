import { z } from 'zod';

/**
 * Zod schema for project template validation
 */

// Ids end up in file names (processors/<id>.py), so keep them path-segment safe
export const IdentifierSchema = z
  .string()
  .min(1)
  .regex(/^[A-Za-z0-9_-]+$/, 'must contain only letters, digits, "_" or "-"');

// Trigger: external event source. Connection params (port, broker, topic...) pass through.
export const TriggerSchema = z
  .object({
    id: IdentifierSchema,
    type: z.string().min(1),
    enabled: z.boolean(),
  })
  .passthrough();

// Processor: unit of transformation. Source reference (script, binary, wasm, args) passes through.
export const ProcessorSchema = z
  .object({
    id: IdentifierSchema,
    type: z.string().min(1),
    parallel: z.boolean(),
    timeout: z.number().int().nonnegative(), // milliseconds
    retry: z.number().int().nonnegative(),
    dependencies: z.array(z.string()),
    environment: z.record(z.string()).optional(),
  })
  .passthrough();

// Output: destination params (path, smtp, url, connection...) pass through
export const OutputSchema = z
  .object({
    id: IdentifierSchema,
    type: z.string().min(1),
    condition: z.string().optional(),
    batch_size: z.number().int().positive().optional(),
  })
  .passthrough();

const TemplateShapeSchema = z.object({
  name: IdentifierSchema,
  description: z.string(),
  triggers: z.array(TriggerSchema),
  processors: z.array(ProcessorSchema),
  outputs: z.array(OutputSchema),
  dependencies: z.record(z.array(z.string())),
  docker_services: z.array(z.string().min(1)),
  environment_vars: z.record(z.string()),
});

// Root template schema: ids unique per collection, dependencies resolve within processors
export const ProjectTemplateSchema = TemplateShapeSchema.superRefine((template, ctx) => {
  for (const collection of ['triggers', 'processors', 'outputs'] as const) {
    const seen = new Set<string>();
    const records: Array<{ id: string }> = template[collection];
    records.forEach((record, index) => {
      if (seen.has(record.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [collection, index, 'id'],
          message: `Duplicate id '${record.id}' in ${collection}`,
        });
      }
      seen.add(record.id);
    });
  }

  const processorIds = new Set(template.processors.map((processor) => processor.id));
  template.processors.forEach((processor, index) => {
    processor.dependencies.forEach((dependency, depIndex) => {
      if (!processorIds.has(dependency)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['processors', index, 'dependencies', depIndex],
          message: `Processor '${processor.id}' depends on unknown processor '${dependency}'`,
        });
      }
    });
  });
});

// TypeScript types derived from Zod schemas
export type ProjectTemplate = z.infer<typeof ProjectTemplateSchema>;
export type TriggerRecord = z.infer<typeof TriggerSchema>;
export type ProcessorRecord = z.infer<typeof ProcessorSchema>;
export type OutputRecord = z.infer<typeof OutputSchema>;

/**
 * Custom error for template validation failures
 */
export class TemplateValidationError extends Error {
  constructor(
    message: string,
    public errors?: z.ZodError
  ) {
    super(message);
    this.name = 'TemplateValidationError';
  }

  /**
   * Get formatted error details
   */
  getDetails(): string {
    if (!this.errors) return this.message;

    return this.errors.errors.map((err) => `${err.path.join('.')}: ${err.message}`).join('\n');
  }
}
