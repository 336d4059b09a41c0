// src/store/drizzle/unique.ts
import { DatabaseError } from "pg";
import { UniqueViolationError } from "../../errors";

const UNIQUE_VIOLATION = "23505";

function asUniqueViolation(err: unknown): UniqueViolationError | undefined {
  const candidate = err instanceof Error && err.cause instanceof DatabaseError ? err.cause : err;
  if (candidate instanceof DatabaseError && candidate.code === UNIQUE_VIOLATION) {
    return new UniqueViolationError(candidate.constraint ?? "unknown");
  }
  return undefined;
}

/** Await a write, translating Postgres unique violations into UniqueViolationError. */
export async function guarded<T>(query: PromiseLike<T>): Promise<T> {
  try {
    return await query;
  } catch (err) {
    throw asUniqueViolation(err) ?? err;
  }
}

export function first<T>(rows: T[]): T | undefined {
  return rows[0];
}
