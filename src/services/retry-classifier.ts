import { MigrationError } from '../errors.js';
import type { FailureKind } from '../types/migration.js';
import type { RetryOptions } from '../types/pipeline.js';

export type RetryDecision =
  | { action: 'retry'; delayMs: number; nextAttemptAt: string }
  | { action: 'fail' }
  | { action: 'await-operator' }
  | { action: 'defer' };

export interface ClassifyContext {
  phase?: string;
  unitId?: string;
}

const TRANSIENT_CODES = new Set([
  'ETIMEDOUT',
  'ECONNRESET',
  'ECONNABORTED',
  'EAI_AGAIN',
  'ECONNREFUSED',
  'ENETUNREACH',
  'EHOSTUNREACH',
  'EPIPE',
  'EBUSY',
  'EAGAIN',
  'EMFILE',
  'ENFILE',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT'
]);

const EXHAUSTED_CODES = new Set(['ENOSPC', 'EDQUOT']);

const TRANSIENT_MESSAGE_RE = /rate.?limit|too many requests|timed? ?out|temporar(il)?y unavailable|socket hang up/i;
const CORRUPT_MESSAGE_RE =
  /bad archive|invalid (loc|cen|central directory|zip)|end of central directory|crc|unexpected end of (file|data)|corrupt|truncated/i;

const readProperty = (value: object, key: string): unknown =>
  key in value ? Reflect.get(value, key) : undefined;

const statusOf = (error: object): number | undefined => {
  for (const key of ['status', 'statusCode']) {
    const raw = readProperty(error, key);
    if (typeof raw === 'number') {
      return raw;
    }
  }
  const response = readProperty(error, 'response');
  if (response && typeof response === 'object') {
    const raw = readProperty(response, 'status');
    return typeof raw === 'number' ? raw : undefined;
  }
  return undefined;
};

const isTransientStatus = (status: number): boolean =>
  status === 408 || status === 425 || status === 429 || (status >= 500 && status < 600);

/**
 * Maps whatever a collaborator threw onto the closed failure taxonomy and
 * decides what happens next. Errors raised by the pipeline itself carry their
 * kind; anything unrecognised is permanent.
 */
export class RetryClassifier {
  constructor(
    private readonly options: RetryOptions,
    private readonly random: () => number = Math.random,
    private readonly clock: () => number = Date.now
  ) {}

  classify(error: unknown, _context: ClassifyContext = {}): FailureKind {
    if (error instanceof MigrationError) {
      return error.kind;
    }
    if (!error || typeof error !== 'object') {
      return 'permanent';
    }
    const code = readProperty(error, 'code');
    if (typeof code === 'string') {
      if (EXHAUSTED_CODES.has(code)) {
        return 'resource-exhausted';
      }
      if (TRANSIENT_CODES.has(code)) {
        return 'transient';
      }
    }
    const status = statusOf(error);
    if (status !== undefined && isTransientStatus(status)) {
      return 'transient';
    }
    const message = readProperty(error, 'message');
    if (typeof message === 'string') {
      if (CORRUPT_MESSAGE_RE.test(message)) {
        return 'corrupt-input';
      }
      if (TRANSIENT_MESSAGE_RE.test(message)) {
        return 'transient';
      }
    }
    const cause = readProperty(error, 'cause');
    if (cause !== undefined && cause !== error) {
      return this.classify(cause);
    }
    return 'permanent';
  }

  /** `attempt` is the 1-based number of the attempt that just failed. */
  decide(kind: FailureKind, attempt: number): RetryDecision {
    switch (kind) {
      case 'transient': {
        if (attempt >= this.options.maxAttempts) {
          return { action: 'fail' };
        }
        const delayMs = this.backoff(attempt);
        return { action: 'retry', delayMs, nextAttemptAt: new Date(this.clock() + delayMs).toISOString() };
      }
      case 'corrupt-input':
        return { action: 'await-operator' };
      case 'resource-exhausted':
        return { action: 'defer' };
      case 'permanent':
        return { action: 'fail' };
    }
  }

  /** Equal jitter: half the capped exponential delay is fixed, the rest random. */
  backoff(attempt: number): number {
    const exponent = Math.max(0, attempt - 1);
    const cap = Math.min(this.options.maxDelayMs, this.options.baseDelayMs * 2 ** exponent);
    const half = cap / 2;
    return Math.round(half + this.random() * half);
  }
}
