import { z } from 'zod';
import type { DetailLevel } from '@/types/core';

const booleanish = z.union([z.boolean(), z.enum(['true', 'false'])]).transform((v) => v === true || v === 'true');

const CONCISE_FLAG = /(^|\s)--concise(?=\s|$)/;

// Main research request body schema
export const researchRequestSchema = z
  .object({
    // emptiness is checked after --concise is stripped
    query: z.string().trim().max(1000, 'Query is too long'),
    maxIterations: z.coerce.number().int().min(1).max(10).optional(),
    temperature: z.coerce.number().min(0).max(2).optional(),
    offline: booleanish.optional().default(false),
    /** Shorthand for detailLevel "concise". */
    concise: booleanish.optional(),
    detailLevel: z.enum(['concise', 'standard', 'detailed']).optional(),
    stream: booleanish.optional().default(false),
  })
  .transform(({ concise, ...body }) => {
    // "--concise" typed into the query works like the concise flag
    const flagged = CONCISE_FLAG.test(body.query);
    const query = flagged ? body.query.split('--concise').join(' ').replace(/\s+/g, ' ').trim() : body.query;
    const detailLevel: DetailLevel | undefined = body.detailLevel ?? (concise || flagged ? 'concise' : undefined);
    return { ...body, query, detailLevel };
  })
  .refine((body) => body.query.length > 0, { message: 'Query is required and cannot be empty', path: ['query'] });

export type ResearchRequestBody = z.infer<typeof researchRequestSchema>;

export const calculateRequestSchema = z.object({
  expression: z.string().trim().min(1, 'Expression is required').max(512, 'Expression is too long'),
});

export type CalculateRequestBody = z.infer<typeof calculateRequestSchema>;

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: Array<{ path: string; message: string }> };

function validate<T extends z.ZodTypeAny>(schema: T, data: unknown): ValidationResult<z.infer<T>> {
  const result = schema.safeParse(data);

  if (!result.success) {
    return {
      success: false,
      error: result.error.errors.map((e) => ({
        path: e.path.join('.') || 'root',
        message: e.message,
      })),
    };
  }

  return { success: true, data: result.data };
}

export function validateResearchRequest(data: unknown): ValidationResult<ResearchRequestBody> {
  return validate(researchRequestSchema, data);
}

export function validateCalculateRequest(data: unknown): ValidationResult<CalculateRequestBody> {
  return validate(calculateRequestSchema, data);
}
