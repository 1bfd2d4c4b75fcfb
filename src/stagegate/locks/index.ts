export { Lock, type EvaluationContext, type LockOptions } from './lock';
export { ValidatorRegistry, type CustomValidator } from './registry';
export { LOCK_TYPES, isLockType, type LockType, type LockResult } from './types';
export { failureMessage, actionMessage } from './messages';
