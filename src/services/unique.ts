// src/services/unique.ts
import { ConflictError, UniqueViolationError } from "../errors";

/** Run a write, turning a unique violation on a listed constraint into a ConflictError with its code. */
export async function mapUnique<T>(work: Promise<T>, codes: { [constraint: string]: string }): Promise<T> {
  try {
    return await work;
  } catch (err) {
    if (err instanceof UniqueViolationError) {
      const code = codes[err.constraint];
      if (code) throw new ConflictError(code);
    }
    throw err;
  }
}
