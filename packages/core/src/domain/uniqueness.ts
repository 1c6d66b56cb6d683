import { isWellFormed } from './models';
import type { Question, QuestionBank } from './models';

export type CandidateVerdict = 'accepted' | 'malformed' | 'duplicate';

/** Exact, case-sensitive comparison of prompts. Empty prompts are never unique. */
export function isUnique(candidate: Question, bank: QuestionBank): boolean {
  if (!candidate.prompt) {
    return false;
  }

  for (const existing of bank) {
    if (existing.prompt === candidate.prompt) {
      return false;
    }
  }

  return true;
}

export function validateCandidate(candidate: Question, bank: QuestionBank): CandidateVerdict {
  if (!isWellFormed(candidate)) {
    return 'malformed';
  }

  return isUnique(candidate, bank) ? 'accepted' : 'duplicate';
}
