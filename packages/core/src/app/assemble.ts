import { ConfigurationError, GeneratorUnavailableError } from '../domain/errors';
import { DEFAULT_MAX_RETRIES_PER_SLOT, MAX_QUESTIONS } from '../domain/models';
import type { GenerationRequest, Question, QuestionBank } from '../domain/models';
import { describeParseError, parseQuestion } from '../domain/parser';
import { validateCandidate } from '../domain/uniqueness';

export interface CycleInfo {
  slot: number;
  attempt: number;
}

export type CandidateSource = (cycle: CycleInfo) => Promise<string>;

export interface AssemblyLogger {
  debug(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
}

export interface AssembleOptions {
  maxRetriesPerSlot?: number;
  signal?: AbortSignal;
  logger?: AssemblyLogger;
}

export interface AssemblyResult {
  bank: QuestionBank;
  requested: number;
  shortfall: number;
  complete: boolean;
  calls: number;
  exhaustedSlots: number[];
  cancelled: boolean;
}

type CycleOutcome =
  | { status: 'accepted'; question: Question }
  | { status: 'call_failed' | 'parse_failure' | 'rejected'; reason: string };

/**
 * Fills `request.targetCount` slots one after another. Every slot gets at
 * most `maxRetriesPerSlot` cycles; a slot that runs out is skipped rather
 * than failing the run. Only GeneratorUnavailableError escapes a cycle.
 */
export async function assemble(
  request: GenerationRequest,
  synthesize: CandidateSource,
  options: AssembleOptions = {}
): Promise<AssemblyResult> {
  const maxRetriesPerSlot = options.maxRetriesPerSlot ?? DEFAULT_MAX_RETRIES_PER_SLOT;
  assertAssemblyBounds(request.targetCount, maxRetriesPerSlot);

  const logger = options.logger;
  const bank: Question[] = [];
  const exhaustedSlots: number[] = [];
  let calls = 0;
  let cancelled = false;

  slots: for (let slot = 0; slot < request.targetCount; slot++) {
    let filled = false;

    for (let attempt = 1; attempt <= maxRetriesPerSlot; attempt++) {
      if (options.signal?.aborted) {
        cancelled = true;
        break slots;
      }

      calls++;
      const outcome = await runCycle(synthesize, { slot, attempt }, bank);

      if (outcome.status === 'accepted') {
        bank.push(outcome.question);
        filled = true;
        logger?.debug('Accepted unique question', { slot, attempt });
        break;
      }

      logger?.debug('Cycle did not produce an acceptable question', {
        slot,
        attempt,
        outcome: outcome.status,
        reason: outcome.reason
      });
    }

    if (!filled) {
      exhaustedSlots.push(slot);
      logger?.warn('Slot exhausted without a unique question', {
        slot,
        maxRetriesPerSlot,
        topic: request.topic
      });
    }
  }

  const shortfall = request.targetCount - bank.length;
  if (cancelled) {
    logger?.warn('Quiz assembly cancelled', { accepted: bank.length, requested: request.targetCount });
  } else if (shortfall > 0) {
    logger?.warn('Quiz assembled with fewer questions than requested', {
      accepted: bank.length,
      requested: request.targetCount
    });
  }

  return {
    bank: Object.freeze([...bank]),
    requested: request.targetCount,
    shortfall,
    complete: shortfall === 0,
    calls,
    exhaustedSlots,
    cancelled
  };
}

async function runCycle(
  synthesize: CandidateSource,
  cycle: CycleInfo,
  bank: QuestionBank
): Promise<CycleOutcome> {
  let raw: string;
  try {
    raw = await synthesize(cycle);
  } catch (error) {
    if (error instanceof GeneratorUnavailableError) {
      throw error;
    }
    return {
      status: 'call_failed',
      reason: error instanceof Error ? error.message : String(error)
    };
  }

  const parsed = parseQuestion(raw);
  if (!parsed.ok) {
    return { status: 'parse_failure', reason: describeParseError(parsed.error) };
  }

  const verdict = validateCandidate(parsed.question, bank);
  if (verdict !== 'accepted') {
    return { status: 'rejected', reason: verdict };
  }

  return { status: 'accepted', question: parsed.question };
}

function assertAssemblyBounds(targetCount: number, maxRetriesPerSlot: number): void {
  const issues: string[] = [];
  if (!Number.isInteger(targetCount) || targetCount < 0 || targetCount > MAX_QUESTIONS) {
    issues.push(`Target count must be an integer between 0 and ${MAX_QUESTIONS}.`);
  }
  if (!Number.isInteger(maxRetriesPerSlot) || maxRetriesPerSlot < 1) {
    issues.push('Retries per slot must be a positive integer.');
  }
  if (issues.length > 0) {
    throw new ConfigurationError(issues[0], issues);
  }
}
