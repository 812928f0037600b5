import { z } from 'zod';

/** Request bodies for the query and conversation routes. */

export const queryRequestSchema = z.object({
  query: z
    .string({ required_error: 'Query is required', invalid_type_error: 'Query must be a string' })
    .trim()
    .min(1, 'Query cannot be empty'),
});

export const followUpRequestSchema = z.object({
  message: z
    .string({ required_error: 'Message is required', invalid_type_error: 'Message must be a string' })
    .trim()
    .min(1, 'Message cannot be empty'),
});

export const feedbackRequestSchema = z.object({
  feedback: z.string().trim().min(1).optional(),
});

export type QueryRequestBody = z.infer<typeof queryRequestSchema>;
export type FollowUpRequestBody = z.infer<typeof followUpRequestSchema>;
export type FeedbackRequestBody = z.infer<typeof feedbackRequestSchema>;

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: Array<{ path: string; message: string }> };

export function validateBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): ValidationResult<T> {
  const result = schema.safeParse(data ?? {});

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
