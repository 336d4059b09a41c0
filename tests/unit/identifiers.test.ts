// tests/unit/identifiers.test.ts
import { describe, expect, it } from "@jest/globals";
import { IdentifierGenerator, MAX_IDENTIFIER_ATTEMPTS, insertWithUniqueIdentifier } from "../../src/domain/identifiers";
import { DuplicateIdentifierError, UniqueViolationError } from "../../src/errors";
import { UNIQUE } from "../../src/store/constraints";
import { NOW } from "../support/fixtures";
import { createMemoryStore } from "../support/memory-store";

describe("IdentifierGenerator", () => {
  const generator = () => new IdentifierGenerator(createMemoryStore().sequences, () => NOW, () => 0.5);

  it("formats random identifiers from the clock", () => {
    const ids = generator();
    expect(ids.bookingReference()).toBe("BK2611015555");
    expect(ids.transactionId()).toBe("TXN26110108005555");
    expect(ids.ticketNumber()).toMatch(/^TKT261101[0-9A-Z]{6}$/);
  });

  it("numbers invoices per year and receipts per day", async () => {
    const ids = generator();
    expect(await ids.invoiceNumber()).toBe("INV20260001");
    expect(await ids.invoiceNumber()).toBe("INV20260002");
    expect(await ids.receiptNumber()).toBe("RCP2611010001");
  });
});

describe("insertWithUniqueIdentifier", () => {
  it("regenerates the identifier after a collision", async () => {
    let generated = 0;
    let attempts = 0;
    const row = await insertWithUniqueIdentifier(
      UNIQUE.bookingReference,
      () => `BK${++generated}`,
      async (ref) => {
        attempts++;
        if (attempts < 3) throw new UniqueViolationError(UNIQUE.bookingReference);
        return { ref };
      },
    );
    expect(row).toEqual({ ref: "BK3" });
    expect(generated).toBe(3);
  });

  it("gives up after the attempt limit", async () => {
    let attempts = 0;
    const failing = insertWithUniqueIdentifier(UNIQUE.transactionId, () => "TXN", async () => {
      attempts++;
      throw new UniqueViolationError(UNIQUE.transactionId);
    });
    await expect(failing).rejects.toBeInstanceOf(DuplicateIdentifierError);
    expect(attempts).toBe(MAX_IDENTIFIER_ATTEMPTS);
  });

  it("does not retry collisions on other keys", async () => {
    let attempts = 0;
    const failing = insertWithUniqueIdentifier(UNIQUE.ticketNumber, () => "TKT", async () => {
      attempts++;
      throw new UniqueViolationError(UNIQUE.email);
    });
    await expect(failing).rejects.toMatchObject({ constraint: UNIQUE.email });
    expect(attempts).toBe(1);
  });
});
