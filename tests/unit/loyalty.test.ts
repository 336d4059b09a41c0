// tests/unit/loyalty.test.ts
import { describe, expect, it } from "@jest/globals";
import { pointsEarned, tierDiscount, tierFor } from "../../src/domain/loyalty";

describe("loyalty", () => {
  it("maps points to tiers", () => {
    expect(tierFor(0)).toBe("bronze");
    expect(tierFor(999)).toBe("bronze");
    expect(tierFor(1000)).toBe("silver");
    expect(tierFor(5000)).toBe("gold");
    expect(tierFor(25000)).toBe("platinum");
  });

  it("discounts the subtotal by tier", () => {
    expect(tierDiscount("bronze", 150000)).toBe(0);
    expect(tierDiscount("silver", 150000)).toBe(7500);
    expect(tierDiscount("platinum", 150000)).toBe(22500);
  });

  it("earns points on whole currency units", () => {
    expect(pointsEarned(172550, 1)).toBe(1725);
    expect(pointsEarned(172550, 2)).toBe(3451);
    expect(pointsEarned(172550, 0)).toBe(0);
  });
});
