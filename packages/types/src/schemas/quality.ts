/**
 * Quality measure reports
 */
import { z } from 'zod';

import {
  DateSchema,
  DateTimeSchema,
  DecimalSchema,
  IntegerSchema,
  RESOURCE_META_MASK,
  ResourceIdentityInputShape,
  ResourceMetaSchema,
  UUIDSchema,
  optional,
} from './common.js';

export const MEASURE_REPORT_STATUSES = ['complete', 'pending', 'error'] as const;

export const MEASURE_REPORT_TYPES = [
  'individual',
  'subject-list',
  'summary',
  'data-exchange',
] as const;

export const MeasureReportSchema = ResourceMetaSchema.extend({
  measureUrl: z.string().max(2048),
  periodStart: DateSchema,
  periodEnd: DateSchema,
  status: optional(z.string().max(30)),
  type: optional(z.string().max(30)),
  subjectPatientId: optional(UUIDSchema),
  date: optional(DateTimeSchema),
  reporterOrgId: optional(UUIDSchema),
  improvementNotation: optional(z.string().max(20)),
  groupCode: optional(z.string().max(50)),
  groupPopulationCode: optional(z.string().max(50)),
  groupPopulationCount: optional(IntegerSchema.min(0)),
  groupMeasureScore: optional(DecimalSchema),
  note: optional(z.string()),
});

export const CreateMeasureReportSchema = MeasureReportSchema.omit(RESOURCE_META_MASK).extend(
  ResourceIdentityInputShape
);

export type MeasureReport = z.infer<typeof MeasureReportSchema>;
export type CreateMeasureReport = z.infer<typeof CreateMeasureReportSchema>;
