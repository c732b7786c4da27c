import { z } from 'zod';

/** Max length for a natural-language question (chars). */
export const MAX_QUESTION_LENGTH = 2000;

export const queryRequestSchema = z.object({
  question: z
    .string({ required_error: 'Body must include "question" (string).', invalid_type_error: '"question" must be a string.' })
    .trim()
    .min(1, '"question" cannot be empty.')
    .max(MAX_QUESTION_LENGTH, `"question" must be at most ${MAX_QUESTION_LENGTH} characters.`),
  connectionId: z
    .string({ required_error: 'Body must include "connectionId" (string).', invalid_type_error: '"connectionId" must be a string.' })
    .min(1, '"connectionId" cannot be empty.'),
});

export type QueryRequestDto = z.infer<typeof queryRequestSchema>;

export function parseQueryRequest(body: unknown): { ok: true; value: QueryRequestDto } | { ok: false; message: string } {
  const parsed = queryRequestSchema.safeParse(body ?? {});
  if (parsed.success) return { ok: true, value: parsed.data };
  return { ok: false, message: parsed.error.issues[0]?.message ?? 'Invalid request body.' };
}
