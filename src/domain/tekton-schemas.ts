import { z } from 'zod';

/**
 * Only the parts of Tekton objects the harness reads are modelled; everything
 * else passes through untouched.
 */

export const ConditionSchema = z
  .object({
    type: z.string(),
    status: z.string(),
    reason: z.string().optional(),
    message: z.string().optional(),
  })
  .passthrough();

export const StepResultSchema = z
  .object({
    name: z.string(),
    type: z.string().optional(),
    value: z.unknown().optional(),
  })
  .passthrough();

export const StepStateSchema = z
  .object({
    name: z.string().default(''),
    results: z.array(StepResultSchema).default([]),
  })
  .passthrough();

export const TektonRunSchema = z
  .object({
    kind: z.string().optional(),
    metadata: z
      .object({
        name: z.string().optional(),
        namespace: z.string().optional(),
      })
      .passthrough()
      .default({}),
    status: z
      .object({
        conditions: z.array(ConditionSchema).default([]),
        podName: z.string().optional(),
        steps: z.array(StepStateSchema).default([]),
      })
      .passthrough()
      .default({}),
  })
  .passthrough();

/**
 * `gcloud builds runs describe --format=json`. Conditions appear either at the
 * top level or under `status`, depending on the run type.
 */
export const ManagedRunSchema = z
  .object({
    name: z.string().optional(),
    conditions: z.array(ConditionSchema).optional(),
    status: z
      .object({
        conditions: z.array(ConditionSchema).optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type StepResult = z.infer<typeof StepResultSchema>;
export type StepState = z.infer<typeof StepStateSchema>;
export type TektonRunObject = z.infer<typeof TektonRunSchema>;
export type ManagedRunDescription = z.infer<typeof ManagedRunSchema>;

export function managedConditions(run: ManagedRunDescription): z.infer<typeof ConditionSchema>[] {
  return run.conditions ?? run.status?.conditions ?? [];
}
