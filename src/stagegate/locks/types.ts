export const LOCK_TYPES = [
  'exists',
  'equals',
  'greater_than',
  'less_than',
  'contains',
  'regex',
  'type_check',
  'range',
  'length',
  'not_empty',
  'in_list',
  'not_in_list',
  'custom',
] as const;

export type LockType = typeof LOCK_TYPES[number];

/** Lock types that may be declared without an expected value. */
export const OPTIONAL_EXPECTATION: ReadonlySet<LockType> = new Set<LockType>(['exists', 'not_empty', 'custom']);

export function isLockType(value: unknown): value is LockType {
  return typeof value === 'string' && LOCK_TYPES.some(t => t === value);
}

export interface LockResult {
  success: boolean;
  propertyPath: string;
  lockType: LockType;
  actualValue: unknown;
  expectedValue: unknown;
  errorMessage: string;
  actionMessage: string;
  metadata: Record<string, unknown>;
}
