/**
 * Retirement cause policy
 *
 * Ordered rules over the free-text result status. The first rule that matches
 * wins; a status no rule recognises falls into the conservative bucket
 * (Mechanical Problem) and is marked ambiguous for manual review.
 */

import { RetirementCause } from '../../types/derived';
import mechanicalKeywords from '../../config/mechanical-status-keywords.json';

export type StatusClassification =
  | { kind: 'finished' }
  | { kind: 'lapped' }
  | { kind: 'retirement'; cause: RetirementCause; ambiguous: boolean };

const DISQUALIFICATION = /disqualif|excluded/i;
const DRIVER_ERROR = /accident|collision|spun off|spin|crash/i;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

const KNOWN_MECHANICAL: readonly RegExp[] = mechanicalKeywords.keywords.map(
  keyword => new RegExp(`\\b${escapeRegExp(keyword)}\\b`, 'i')
);

export function isKnownMechanicalStatus(status: string): boolean {
  return KNOWN_MECHANICAL.some(pattern => pattern.test(status));
}

export function classifyStatus(rawStatus: string): StatusClassification {
  const status = rawStatus.trim();

  if (status === 'Finished') {
    return { kind: 'finished' };
  }
  if (status.startsWith('+')) {
    return { kind: 'lapped' };
  }
  if (DISQUALIFICATION.test(status)) {
    return { kind: 'retirement', cause: 'Disqualification', ambiguous: false };
  }
  if (DRIVER_ERROR.test(status)) {
    return { kind: 'retirement', cause: 'Driver Error', ambiguous: false };
  }
  return {
    kind: 'retirement',
    cause: 'Mechanical Problem',
    ambiguous: !isKnownMechanicalStatus(status)
  };
}
