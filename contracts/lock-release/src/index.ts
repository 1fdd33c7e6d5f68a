export { LockReleaseContract, isLockReleaseContract } from './lock-release.contract';
export { LockReleaseClient, deployLockRelease } from './client';
export type { DeployLockReleaseOptions } from './client';
export { computeFeeSplit, FEE_DENOMINATOR } from './fees';
export type { FeeSplit } from './fees';
export { LockReleaseEvents, decodeLockEvent, decodeReleaseEvent } from './events';
export type { LockReleaseEventName, LockEventRecord, ReleaseEventRecord } from './events';
export {
  CONTRACT_NAME,
  DataKey,
  AdminDataSchema,
  FeeConfigSchema,
  LockDataSchema,
} from './types';
export type { AdminData, FeeConfig, LockData, LockRequest, ReleaseRequest } from './types';
