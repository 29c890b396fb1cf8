/**
 * Charge Executor Interface
 *
 * Abstraction over the external payment capability. The billing engine only
 * knows "charge this amount for this subscription"; gateway protocols live
 * behind implementations of this interface.
 *
 * Idempotency contract:
 * Calling charge() twice with the same idempotencyKey must not produce two
 * real-world charges. The second call returns the outcome of the first.
 * The engine derives the key from the subscription id and the billing date
 * being charged, so a retry after a crash or a timeout reuses the key.
 */

export interface ChargeParams {
  subscriptionId: string;
  userId: number;
  /** Amount in cents, copied from the plan price at charge time */
  amountCents: number;
  /** `${subscriptionId}:${billedDate}` */
  idempotencyKey: string;
  description: string;
}

export type ChargeResult =
  | {
      status: 'succeeded';
      /** Provider transaction id */
      reference: string;
    }
  | {
      status: 'declined';
      reference?: string;
      /** Human readable decline reason, stored on the ledger entry */
      reason: string;
    };

export interface ChargeExecutor {
  /**
   * Execute a charge.
   *
   * Resolves with an affirmative outcome (succeeded or declined). Throws or
   * never settles when the outcome is unknown; the caller treats both as
   * indeterminate, never as declined.
   */
  charge(params: ChargeParams): Promise<ChargeResult>;
}
