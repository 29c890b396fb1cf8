import { z } from 'zod';
import { BILLING_RUN_TRIGGERS } from '../constants';

export const billingRunTriggerSchema = z.enum(BILLING_RUN_TRIGGERS);

export const runBillingCycleSchema = z.object({
  trigger: billingRunTriggerSchema.default('api'),
}).default({});

export const billingRunIdParamSchema = z.object({
  id: z.string().uuid('Invalid billing run id'),
});

export type RunBillingCycleInput = z.input<typeof runBillingCycleSchema>;
