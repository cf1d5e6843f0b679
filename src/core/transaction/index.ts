export { InstallTransaction } from './install-transaction.js';
export type { InstallTransactionOptions, TransactionResult } from './install-transaction.js';
export { acquirePrefixLock, withPrefixLock, getLockPath } from './prefix-lock.js';
export type { PrefixLock } from './prefix-lock.js';
