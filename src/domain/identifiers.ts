// src/domain/identifiers.ts
import { DuplicateIdentifierError, UniqueViolationError } from "../errors";
import { randomSuffix } from "../utils/id";
import { yymmdd, yymmddhhmm } from "../utils/dates";

export type Clock = () => Date;
export type Random = () => number;

/** Anything that can hand out the next value of a named counter atomically. */
export interface SequenceSource {
  next(scope: string): Promise<number>;
}

const digits = (random: Random, n: number) =>
  Array.from({ length: n }, () => Math.floor(random() * 10)).join("");

const seq4 = (n: number) => String(n).padStart(4, "0");

export class IdentifierGenerator {
  constructor(
    private readonly sequences: SequenceSource,
    private readonly now: Clock = () => new Date(),
    private readonly random: Random = Math.random,
  ) {}

  /** BK + yymmdd + 4 random digits */
  bookingReference() {
    return `BK${yymmdd(this.now())}${digits(this.random, 4)}`;
  }

  /** TXN + yymmddhhmm + 4 random digits */
  transactionId() {
    return `TXN${yymmddhhmm(this.now())}${digits(this.random, 4)}`;
  }

  /** TKT + yymmdd + 6 chars of a fresh ULID */
  ticketNumber() {
    return `TKT${yymmdd(this.now())}${randomSuffix(6)}`;
  }

  /** INV + yyyy + per-year sequence */
  async invoiceNumber() {
    const scope = `INV${this.now().getUTCFullYear()}`;
    return `${scope}${seq4(await this.sequences.next(scope))}`;
  }

  /** RCP + yymmdd + per-day sequence */
  async receiptNumber() {
    const scope = `RCP${yymmdd(this.now())}`;
    return `${scope}${seq4(await this.sequences.next(scope))}`;
  }
}

export const MAX_IDENTIFIER_ATTEMPTS = 5;

/**
 * Insert a row keyed by a randomly generated identifier, regenerating the
 * identifier whenever the store reports a collision on `constraint`.
 * Collisions on any other unique key propagate untouched.
 */
export async function insertWithUniqueIdentifier<T>(
  constraint: string,
  generate: () => string,
  insert: (identifier: string) => Promise<T>,
  attempts = MAX_IDENTIFIER_ATTEMPTS,
): Promise<T> {
  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await insert(generate());
    } catch (err) {
      if (!(err instanceof UniqueViolationError) || err.constraint !== constraint) throw err;
    }
  }
  throw new DuplicateIdentifierError(constraint);
}
