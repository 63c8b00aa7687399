/**
 * AI Clinic Verifier
 *
 * Asks a language model whether a listing that survived the exclusion filter
 * is a genuine independent clinic, and for its canonical name. The retry and
 * timeout policy lives here, not in the SDK.
 */

import type { RawCandidate, Verdict, VerifiedCandidate } from '@/types';
import { APICallError, generateText, type LanguageModel } from 'ai';
import { z } from 'zod';
import { ClassificationServiceError, errorMessage, VerificationFailedError } from '../errors';
import { createCallSignal, sleepWithCancellation, type CancellationToken } from '../scraper/cancellation';
import { runWithConcurrency } from '../utils';
import { buildVerificationPrompt, CLINIC_VERIFIER_SYSTEM_PROMPT } from './prompts';

export interface ClassificationRequest {
  system: string;
  prompt: string;
  signal?: AbortSignal;
}

/**
 * Boundary to the classification model. Implementations throw
 * ClassificationServiceError for every failure they can name.
 */
export interface ClassificationService {
  classify(request: ClassificationRequest): Promise<Verdict>;
}

export interface RetryPolicy {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  timeoutMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 2,
  baseDelayMs: 1000,
  maxDelayMs: 8000,
  timeoutMs: 30000,
};

export type VerificationOutcome =
  | { status: 'verified'; candidate: VerifiedCandidate }
  | { status: 'failed'; candidate: RawCandidate; attempts: number; error: VerificationFailedError };

const verdictSchema = z.object({
  qualifies: z.boolean(),
  normalizedName: z.string(),
  rationale: z.string().default(''),
});

/**
 * Parse model output into a verdict. Tolerates a surrounding code fence.
 */
export function parseVerdict(text: string): Verdict {
  // Clean the response - remove markdown code blocks if present
  let cleanedText = text.trim();
  if (cleanedText.startsWith('```json')) {
    cleanedText = cleanedText.slice(7);
  } else if (cleanedText.startsWith('```')) {
    cleanedText = cleanedText.slice(3);
  }
  if (cleanedText.endsWith('```')) {
    cleanedText = cleanedText.slice(0, -3);
  }
  cleanedText = cleanedText.trim();

  let json: unknown;
  try {
    json = JSON.parse(cleanedText);
  } catch {
    throw new ClassificationServiceError('malformed-response', `Response is not JSON: ${cleanedText.slice(0, 120)}`);
  }

  const result = verdictSchema.safeParse(json);
  if (!result.success) {
    throw new ClassificationServiceError(
      'malformed-response',
      `Response does not match the verdict shape: ${result.error.issues.map((i) => i.message).join('; ')}`
    );
  }
  return result.data;
}

export class AiClassificationService implements ClassificationService {
  private readonly model: LanguageModel;

  constructor(model: LanguageModel) {
    this.model = model;
  }

  async classify(request: ClassificationRequest): Promise<Verdict> {
    let text: string;
    try {
      const result = await generateText({
        model: this.model,
        system: request.system,
        prompt: request.prompt,
        temperature: 0.2,
        maxOutputTokens: 400,
        maxRetries: 0,
        abortSignal: request.signal,
      });
      text = result.text;
    } catch (error) {
      if (APICallError.isInstance(error) && error.statusCode === 429) {
        throw new ClassificationServiceError('rate-limited', error.message);
      }
      throw new ClassificationServiceError('unavailable', errorMessage(error));
    }

    return parseVerdict(text);
  }
}

export function backoffDelay(attempt: number, policy: RetryPolicy): number {
  return Math.min(policy.baseDelayMs * 2 ** attempt, policy.maxDelayMs);
}

async function classifyWithTimeout(
  service: ClassificationService,
  request: ClassificationRequest,
  timeoutMs: number,
  token?: CancellationToken
): Promise<Verdict> {
  const call = createCallSignal(timeoutMs, token?.signal);
  const stopped = new Promise<never>((_, reject) => {
    call.signal.addEventListener(
      'abort',
      () => reject(new ClassificationServiceError('timeout', `No response within ${timeoutMs}ms`)),
      { once: true }
    );
  });

  try {
    return await Promise.race([service.classify({ ...request, signal: call.signal }), stopped]);
  } catch (error) {
    if (call.timedOut()) {
      throw new ClassificationServiceError('timeout', `No response within ${timeoutMs}ms`);
    }
    throw error;
  } finally {
    call.dispose();
  }
}

/**
 * Verify one candidate. Retries any ClassificationServiceError up to
 * `policy.maxRetries` times; other errors fail immediately. Throws only
 * when the run's hard stop fires.
 */
export async function verifyCandidate(
  candidate: RawCandidate,
  service: ClassificationService,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  token?: CancellationToken
): Promise<VerificationOutcome> {
  const request: ClassificationRequest = {
    system: CLINIC_VERIFIER_SYSTEM_PROMPT,
    prompt: buildVerificationPrompt(candidate),
  };

  let attempts = 0;
  let lastError = '';

  for (let attempt = 0; attempt <= policy.maxRetries; attempt++) {
    token?.throwIfExpired();
    attempts = attempt + 1;

    try {
      const verdict = await classifyWithTimeout(service, request, policy.timeoutMs, token);
      return {
        status: 'verified',
        candidate: {
          ...candidate,
          verdict: { ...verdict, normalizedName: verdict.normalizedName.trim() || candidate.name },
          attempts,
        },
      };
    } catch (error) {
      token?.throwIfExpired();

      if (!(error instanceof ClassificationServiceError)) {
        lastError = errorMessage(error);
        break;
      }

      lastError = `${error.kind}: ${error.message}`;
      if (attempt < policy.maxRetries) {
        const delay = backoffDelay(attempt, policy);
        console.log(
          `[Verifier] ${candidate.name}: ${error.kind}, retrying in ${delay}ms (${attempt + 1}/${policy.maxRetries})`
        );
        await sleepWithCancellation(delay, token);
      }
    }
  }

  const failure = new VerificationFailedError(candidate.name, attempts, lastError);
  console.error(`[Verifier] ${failure.message}`);
  return { status: 'failed', candidate, attempts, error: failure };
}

export interface VerifyCandidatesOptions {
  concurrency: number;
  policy?: RetryPolicy;
  token?: CancellationToken;
  onOutcome?: (outcome: VerificationOutcome) => void;
}

/**
 * Verify candidates through a bounded pool. One outcome per candidate, in input order.
 */
export async function verifyCandidates(
  candidates: readonly RawCandidate[],
  service: ClassificationService,
  options: VerifyCandidatesOptions
): Promise<VerificationOutcome[]> {
  return runWithConcurrency(candidates, options.concurrency, async (candidate) => {
    const outcome = await verifyCandidate(candidate, service, options.policy, options.token);
    options.onOutcome?.(outcome);
    return outcome;
  });
}

export function createAiClassificationService(model: LanguageModel): AiClassificationService {
  return new AiClassificationService(model);
}
