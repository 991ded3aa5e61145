export { IdempotencyGuard, GuardFlagsSchema } from './idempotency-guard.js';
export type { GuardFlags } from './idempotency-guard.js';
