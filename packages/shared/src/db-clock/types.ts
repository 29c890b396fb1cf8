/**
 * Database clock types for timestamp abstraction
 *
 * DBClock is the single source of "now" for anything the billing engine
 * persists: createdAt, processedAt, and the as-of date used to pick due
 * subscriptions. Injecting it keeps date-based billing logic deterministic
 * under test.
 *
 * SCOPE: persisted timestamps ONLY. Charge timeouts and run timeouts use
 * real timers.
 */

export interface DBClock {
  /**
   * Current timestamp for database storage
   */
  now(): Date;

  /**
   * Today's date at 00:00:00.000 UTC
   * Used as the as-of date when selecting due subscriptions
   */
  today(): Date;
}

/**
 * Configuration for MockDBClock
 */
export interface MockDBClockConfig {
  /**
   * The mocked current time
   * If not set, uses actual system time
   */
  currentTime?: Date;

  /**
   * If true, time advances normally from the mocked time
   * If false, time is frozen at the mocked time
   */
  autoAdvance?: boolean;

  /**
   * Rate at which time advances (1.0 = real time, 100.0 = 100x speed)
   * Only applies when autoAdvance is true
   */
  timeScale?: number;
}
