// src/domain/money.ts

/** Decimal major units (e.g. 100.5) to integer cents. */
export function toCents(amount: number) {
  return Math.round(amount * 100);
}

export function fromCents(cents: number) {
  return cents / 100;
}

/** `basisPoints` of `cents`, rounded half away from zero (1500 bp = 15%). */
export function basisPointsOf(cents: number, basisPoints: number) {
  return Math.round((cents * basisPoints) / 10000);
}

export function percentOf(cents: number, percent: number) {
  return basisPointsOf(cents, Math.round(percent * 100));
}
