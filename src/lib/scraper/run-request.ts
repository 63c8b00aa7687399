import type { RunRequest } from '@/types';
import { z } from 'zod';
import { InvalidRunRequestError } from '../errors';

// Half-width, full-width and Japanese commas all separate regions
const REGION_SEPARATOR = /[,，、]/;

/**
 * Split operator input into trimmed, non-blank regions, keeping order
 */
export function parseRegions(input: string | readonly string[]): string[] {
  const parts = typeof input === 'string' ? input.split(REGION_SEPARATOR) : input.flatMap((r) => r.split(REGION_SEPARATOR));
  return parts.map((region) => region.trim()).filter((region) => region.length > 0);
}

export function createRunRequestSchema(maxRegions: number) {
  return z.object({
    regions: z
      .union([z.string(), z.array(z.string())])
      .transform((value) => parseRegions(value))
      .pipe(
        z
          .array(z.string())
          .min(1, 'At least one region is required')
          .max(maxRegions, `At most ${maxRegions} regions per run`)
      ),
    previewMode: z.boolean().default(false),
  });
}

export function parseRunRequest(input: unknown, maxRegions: number): RunRequest {
  const result = createRunRequestSchema(maxRegions).safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || 'request'}: ${issue.message}`);
    throw new InvalidRunRequestError(`Invalid run request: ${issues.join('; ')}`, issues);
  }
  return result.data;
}
