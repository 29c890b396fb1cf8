/**
 * Charge Mock Configuration
 *
 * Lets tests (and a dev server running with the mock executor) steer
 * MockChargeExecutor behavior:
 * - Inject artificial delays
 * - Force deterministic declines
 * - Simulate unknown outcomes (executor throws, or never answers)
 * - Script per-subscription outcome sequences
 */

export type ScriptedOutcome = 'succeed' | 'decline' | 'error' | 'hang';

export interface ChargeMockConfig {
  chargeDelayMs?: number;

  // Deterministic failure injection (applies to every subscription)
  forceDecline?: boolean;
  forceDeclineMessage?: string;
  forceError?: boolean;
  forceHang?: boolean;
}

export class ChargeMockConfigManager {
  private config: ChargeMockConfig = {};
  private readonly scripts = new Map<string, ScriptedOutcome[]>();

  setConfig(newConfig: ChargeMockConfig): void {
    this.config = { ...this.config, ...newConfig };
  }

  clearConfig(): void {
    this.config = {};
    this.scripts.clear();
  }

  getConfig(): ChargeMockConfig {
    return { ...this.config };
  }

  /**
   * Queue outcomes for one subscription, consumed one per charge call.
   * When the queue is empty the global config applies again.
   */
  script(subscriptionId: string, outcomes: ScriptedOutcome[]): void {
    const queue = this.scripts.get(subscriptionId) ?? [];
    queue.push(...outcomes);
    this.scripts.set(subscriptionId, queue);
  }

  async applyDelay(): Promise<void> {
    const delay = this.config.chargeDelayMs ?? 0;
    if (delay > 0) {
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }

  /**
   * Outcome for the next call (scripted first, then forced, then success)
   */
  nextOutcome(subscriptionId: string): ScriptedOutcome {
    const scripted = this.scripts.get(subscriptionId)?.shift();
    if (scripted) {
      return scripted;
    }
    if (this.config.forceHang) {
      return 'hang';
    }
    if (this.config.forceError) {
      return 'error';
    }
    if (this.config.forceDecline) {
      return 'decline';
    }
    return 'succeed';
  }

  declineMessage(): string {
    return this.config.forceDeclineMessage ?? 'Your card was declined.';
  }
}
