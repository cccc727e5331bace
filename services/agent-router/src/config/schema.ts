import { z } from 'zod';

// Keeps every model's weight total an exact integer
export const MAX_AGENT_WEIGHT = 1_000_000;

const weightSchema = z.number().int().nonnegative().max(MAX_AGENT_WEIGHT);

/**
 * One entry of the `agents` sequence. Keys the router does not read
 * (temperature, tools, instructions, ...) belong to agent provisioning and pass through.
 */
const agentEntrySchema = z
  .object({
    name: z.string().min(1),
    model: z.string().min(1),
    weight: weightSchema.optional(),
    enabled: z.boolean().optional(),
    external_id: z.string().optional(),
  })
  .passthrough();

const modelEntrySchema = z
  .object({
    enabled: z.boolean().default(true),
    capacity: z.number().nonnegative().optional(),
  })
  .passthrough();

export const agentConfigDocumentSchema = z
  .object({
    defaults: z
      .object({
        weight: weightSchema.optional(),
        enabled: z.boolean().optional(),
      })
      .passthrough()
      .optional(),
    // `gpt-4o:` with nothing under it parses as null
    models: z.record(z.string(), modelEntrySchema.nullable()).default({}),
    agents: z.array(agentEntrySchema).default([]),
  })
  .passthrough();

export const weightUpdateSchema = z.object({
  weight: weightSchema,
});

/**
 * Flatten zod issues into `path: message` lines
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
