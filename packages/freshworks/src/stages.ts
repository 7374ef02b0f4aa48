// Pipeline stage ids of the sales workspace. Update alongside the CRM's deal pipeline setup.
export const DEAL_STAGE_NAMES: ReadonlyMap<number, string> = new Map([
  [402001815652, "Closed Won"],
  [402001815651, "Closed Lost"],
  [402001821236, "Account Not Funded"],
  [402001842536, "Account Funded"],
  [402001815650, "KYC Created"],
  [402001815649, "Proposal Sent"],
  [402001815648, "Qualified"],
  [402001815647, "Contact Made"],
  [402001815646, "New Lead"]
]);

export function stageName(stageId: number): string {
  return DEAL_STAGE_NAMES.get(stageId) ?? `Stage ${stageId}`;
}
