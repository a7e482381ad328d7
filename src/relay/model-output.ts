/**
 * Parsing of the model's structured reply into a dispatch request.
 */

import { z } from 'zod';
import { MalformedModelOutputError } from '../errors.js';

const OPENING_FENCE = /^```[a-z]*[ \t]*\r?\n?/i;
const CLOSING_FENCE = /\r?\n?```\s*$/;

/** Removes a surrounding ``` / ```json fence. */
export function stripCodeFences(text: string): string {
  return text.trim().replace(OPENING_FENCE, '').replace(CLOSING_FENCE, '').trim();
}

export const DispatchRequestSchema = z.object({
  url: z
    .string()
    .url()
    .refine((value) => /^https?:\/\//i.test(value), 'url must use http or https'),
  /** Path appended to the path of `url`; a leading `/` does not reset it. */
  endpoint: z.string().default('/'),
  method: z
    .string()
    .transform((value) => value.toUpperCase())
    .pipe(z.enum(['GET', 'POST', 'PUT', 'PATCH', 'DELETE']))
    .default('POST'),
  headers: z.record(z.string()).default({}),
  params: z.record(z.unknown()).default({}),
});

export type DispatchRequest = z.infer<typeof DispatchRequestSchema>;

export function parseModelOutput(output: string): DispatchRequest {
  let decoded: unknown;
  try {
    decoded = JSON.parse(stripCodeFences(output));
  } catch (error) {
    throw new MalformedModelOutputError(
      error instanceof Error ? error.message : 'not JSON',
      output
    );
  }

  const result = DispatchRequestSchema.safeParse(decoded);
  if (!result.success) {
    const reason = result.error.issues
      .map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`)
      .join('; ');
    throw new MalformedModelOutputError(reason, output);
  }
  return result.data;
}
