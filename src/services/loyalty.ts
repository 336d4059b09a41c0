// src/services/loyalty.ts
import { pointsEarned, tierFor } from "../domain/loyalty";
import { NotFoundError } from "../errors";
import { logger } from "../logger";
import type { Store } from "../store/types";

/** Credits points for a completed rental and moves the customer to the tier those points reach. */
export async function awardLoyaltyPoints(store: Store, customerId: string, totalAmount: number, pointsPerUnit: number) {
  const points = pointsEarned(totalAmount, pointsPerUnit);
  if (points === 0) return 0;
  const user = await store.users.addLoyaltyPoints(customerId, points);
  if (!user) throw new NotFoundError("user");
  const tier = tierFor(user.loyaltyPoints);
  if (tier !== user.loyaltyTier) {
    await store.users.update(customerId, { loyaltyTier: tier });
    logger.info({ userId: customerId, from: user.loyaltyTier, to: tier }, "loyalty tier changed");
  }
  return points;
}
