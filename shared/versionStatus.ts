export const VERSION_STATUSES = ["processing", "available", "quarantined"] as const;
export type VersionStatusValue = (typeof VERSION_STATUSES)[number];

// available and quarantined are terminal
const ALLOWED_TRANSITIONS: Record<VersionStatusValue, readonly VersionStatusValue[]> = {
  processing: ["available", "quarantined"],
  available: [],
  quarantined: [],
};

export function canTransitionVersionStatus(from: VersionStatusValue, to: VersionStatusValue): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export function isTerminalVersionStatus(status: VersionStatusValue): boolean {
  return ALLOWED_TRANSITIONS[status].length === 0;
}
