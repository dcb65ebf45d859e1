export const Capabilities = {
  workOrdersRead: 'work_orders.read',
  workOrdersWrite: 'work_orders.write',
  workOrdersExecute: 'work_orders.execute',
  workOrdersVerify: 'work_orders.verify',
  workOrdersSchedule: 'work_orders.schedule',
  workOrdersAdmin: 'work_orders.admin'
} as const;

export type Capability = (typeof Capabilities)[keyof typeof Capabilities];

export const RoleCapabilities: Record<string, Capability[]> = {
  admin: Object.values(Capabilities),
  supervisor: [
    Capabilities.workOrdersRead,
    Capabilities.workOrdersWrite,
    Capabilities.workOrdersExecute,
    Capabilities.workOrdersVerify,
    Capabilities.workOrdersSchedule
  ],
  technician: [Capabilities.workOrdersRead, Capabilities.workOrdersExecute],
  viewer: [Capabilities.workOrdersRead]
};

export const expandCapabilitiesFromRoles = (roles: string[]): string[] => {
  const expanded = new Set<string>();
  for (const role of roles) {
    const capabilities = RoleCapabilities[role] ?? [];
    for (const capability of capabilities) {
      expanded.add(capability);
    }
  }
  return [...expanded];
};
