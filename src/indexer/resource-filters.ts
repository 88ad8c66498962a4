export interface ResourceFilter {
  /**
   * Items of one page when the namespace nests them in a way the field table
   * does not describe. `null` falls back to the field table.
   */
  extract?(page: Record<string, unknown>, operation: string): unknown[] | null;
  /** False drops the item before it is counted. */
  keep(item: unknown, operation: string): boolean;
}

export const PASSTHROUGH_FILTER: ResourceFilter = {
  keep: () => true,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function text(item: Record<string, unknown>, ...keys: string[]): string {
  for (const key of keys) {
    const value = item[key];
    if (typeof value === 'string' && value) return value;
  }
  return '';
}

const SERVICE_ROLE_PATHS = ['/aws-service-role/', '/service-role/'];

/** AWS-managed policies and roles, and service-linked roles. */
export function isPlatformManagedIamItem(item: unknown): boolean {
  if (!isRecord(item)) return false;

  const arn = text(item, 'Arn', 'arn', 'ARN');
  if (arn.includes(':iam::aws:')) return true;
  if (SERVICE_ROLE_PATHS.some((segment) => arn.includes(segment))) return true;

  const iamPath = text(item, 'Path', 'path');
  return SERVICE_ROLE_PATHS.some((prefix) => iamPath.startsWith(prefix));
}

export const iamFilter: ResourceFilter = {
  keep: (item) => !isPlatformManagedIamItem(item),
};

export const cloudFormationFilter: ResourceFilter = {
  keep: (item) => !(isRecord(item) && text(item, 'StackStatus').startsWith('DELETE_')),
};

const DELETED_STATES = ['deleted', 'deleting', 'failed'];

/**
 * DocumentDB and Neptune answer the RDS cluster and instance APIs, so their
 * listings include every RDS engine. Keeps `engine` only; instances in a
 * deletion or failed state are dropped.
 */
export function engineFilter(engine: string): ResourceFilter {
  return {
    keep(item, operation) {
      if (operation !== 'DescribeDBClusters' && operation !== 'DescribeDBInstances') return true;
      if (!isRecord(item)) return false;
      if (!text(item, 'Engine').toLowerCase().includes(engine)) return false;

      const status = text(item, 'DBInstanceStatus', 'Status').toLowerCase();
      return !DELETED_STATES.some((state) => status.includes(state));
    },
  };
}

export const ec2Filter: ResourceFilter = {
  extract(page, operation) {
    if (operation !== 'DescribeInstances' || !Array.isArray(page.Reservations)) return null;
    return page.Reservations.flatMap((reservation: unknown) =>
      isRecord(reservation) && Array.isArray(reservation.Instances) ? reservation.Instances : []
    );
  },
  keep: () => true,
};

export const DEFAULT_RESOURCE_FILTERS: ReadonlyMap<string, ResourceFilter> = new Map([
  ['iam', iamFilter],
  ['cloudformation', cloudFormationFilter],
  ['docdb', engineFilter('docdb')],
  ['neptune', engineFilter('neptune')],
  ['ec2', ec2Filter],
]);
