export interface SubscriptionRecord {
  id: string;
  name: string;
}

/**
 * A deletable resource group. `providerId` is the ARM id reported by the
 * Azure CLI and is only ever displayed.
 */
export interface GroupRecord {
  name: string;
  subscriptionId: string;
  subscriptionName: string;
  providerId: string;
}

/**
 * Human-readable `<subscription>.<group>` label used in logs and reports.
 */
export function displayName(group: Pick<GroupRecord, "name" | "subscriptionName">): string {
  return `${group.subscriptionName}.${group.name}`;
}
