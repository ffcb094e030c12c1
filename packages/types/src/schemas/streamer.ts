import { z } from 'zod';
import {
  DEFAULT_X_TOLERANCE,
  DEFAULT_Y_TOLERANCE,
} from '../utils/constants.js';

export const NumericPolicySchema = z.enum(['embedded', 'whole-token']);
export type NumericPolicy = z.infer<typeof NumericPolicySchema>;

export const ColumnPolicySchema = z.enum(['first-match', 'nearest']);
export type ColumnPolicy = z.infer<typeof ColumnPolicySchema>;

export const ClusterPolicySchema = z.enum(['anchor', 'centroid']);
export type ClusterPolicy = z.infer<typeof ClusterPolicySchema>;

export const RowPolicySchema = z.enum(['anchor', 'centroid']);
export type RowPolicy = z.infer<typeof RowPolicySchema>;

export const StreamerOptionsSchema = z.object({
  xTolerance: z.number().nonnegative().default(DEFAULT_X_TOLERANCE),
  yTolerance: z.number().nonnegative().default(DEFAULT_Y_TOLERANCE),
  mask: z.boolean().default(false),
  numericPolicy: NumericPolicySchema.default('embedded'),
  columnPolicy: ColumnPolicySchema.default('first-match'),
  clusterPolicy: ClusterPolicySchema.default('anchor'),
  rowPolicy: RowPolicySchema.default('anchor'),
});
export type StreamerOptions = z.output<typeof StreamerOptionsSchema>;
export type StreamerOptionsInput = z.input<typeof StreamerOptionsSchema>;
