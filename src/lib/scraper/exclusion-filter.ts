/**
 * Exclusion Filter
 *
 * Drops listings that are not outreach targets: paid placements, listings
 * whose website is an affiliate or portal domain, and large chains matched
 * by keyword. Pure and synchronous.
 */

import {
  ExclusionRule,
  type ExcludedCandidate,
  type ExclusionReason,
  type ExclusionRuleSet,
  type FilterResult,
  type RawCandidate,
} from '@/types';
import { z } from 'zod';
import { RuleSetInvalidError } from '../errors';
import { normalizeText } from '../utils';

const DOMAIN_PATTERN = /^(?!-)[a-z0-9-]+(?:\.[a-z0-9-]+)+$/;

export const ruleSetSchema = z.object({
  chainKeywords: z.array(
    z
      .string()
      .transform((keyword) => keyword.trim())
      .refine((keyword) => normalizeText(keyword).length > 0, 'Keyword must not be blank')
  ),
  affiliateDomains: z.array(
    z
      .string()
      .transform((domain) => domain.trim().toLowerCase())
      .refine((domain) => DOMAIN_PATTERN.test(domain), (domain) => ({ message: `Malformed domain: "${domain}"` }))
  ),
  excludeSponsored: z.boolean(),
});

/**
 * Parse unknown input into a rule set, or throw RuleSetInvalid
 */
export function validateRuleSet(input: unknown): ExclusionRuleSet {
  const result = ruleSetSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || 'ruleSet'}: ${issue.message}`);
    throw new RuleSetInvalidError(`Invalid exclusion rule set: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

/**
 * Host of a website URL, lower case, without a leading "www.". '' when unparseable.
 */
export function websiteHost(website: string): string {
  const trimmed = website.trim();
  if (!trimmed) return '';

  try {
    const url = new URL(/^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`);
    return url.hostname.toLowerCase().replace(/^www\./, '');
  } catch {
    return '';
  }
}

function matchesDomain(host: string, domain: string): boolean {
  return host === domain || host.endsWith(`.${domain}`);
}

/**
 * First matching exclusion reason, or null when the candidate is kept.
 * Rule families are checked in order: sponsored, affiliate domain, chain keyword.
 */
export function evaluateCandidate(candidate: RawCandidate, ruleSet: ExclusionRuleSet): ExclusionReason | null {
  if (ruleSet.excludeSponsored && candidate.sponsored) {
    return { rule: ExclusionRule.SPONSORED, pattern: 'sponsored' };
  }

  const host = websiteHost(candidate.website);
  if (host) {
    const domain = ruleSet.affiliateDomains.find((d) => matchesDomain(host, d.toLowerCase()));
    if (domain) {
      return { rule: ExclusionRule.AFFILIATE_DOMAIN, pattern: domain };
    }
  }

  const name = normalizeText(candidate.name);
  const website = normalizeText(candidate.website);
  const keyword = ruleSet.chainKeywords.find((k) => {
    const normalized = normalizeText(k);
    return normalized.length > 0 && (name.includes(normalized) || website.includes(normalized));
  });
  if (keyword) {
    return { rule: ExclusionRule.CHAIN_KEYWORD, pattern: keyword };
  }

  return null;
}

/**
 * Split candidates into kept and excluded. `kept` keeps input order.
 */
export function filterCandidates(candidates: readonly RawCandidate[], ruleSet: ExclusionRuleSet): FilterResult {
  const kept: RawCandidate[] = [];
  const excluded: ExcludedCandidate[] = [];

  for (const candidate of candidates) {
    const reason = evaluateCandidate(candidate, ruleSet);
    if (reason) {
      excluded.push({ candidate, reason });
    } else {
      kept.push(candidate);
    }
  }

  return { kept, excluded };
}
