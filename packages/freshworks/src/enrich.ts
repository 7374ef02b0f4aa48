import { stageName } from "./stages.js";
import type { FreshworksDeal, FreshworksUser } from "./types.js";

export function buildOwnerMap(users: FreshworksUser[]): Map<number, FreshworksUser> {
  const owners = new Map<number, FreshworksUser>();
  for (const user of users) {
    owners.set(user.id, user);
  }
  return owners;
}

/**
 * Attaches `owner` and `deal_stage` to each deal of one listing page, in place.
 * Deals without a known owner keep no `owner` property at all.
 */
export function enrichDeals(deals: FreshworksDeal[], users: FreshworksUser[]): FreshworksDeal[] {
  const owners = buildOwnerMap(users);

  for (const deal of deals) {
    const ownerId = deal.owner_id;
    if (ownerId !== undefined && ownerId !== null) {
      const owner = owners.get(ownerId);
      if (owner) {
        deal.owner = owner;
      }
    }

    const stageId = deal.deal_stage_id;
    if (stageId !== undefined && stageId !== null) {
      deal.deal_stage = {
        id: stageId,
        name: stageName(stageId)
      };
    }
  }

  return deals;
}
