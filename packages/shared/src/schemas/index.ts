/**
 * Validation schemas for API inputs
 */

export * from './subscription';
export * from './billing';
