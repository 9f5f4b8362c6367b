import type { AnalyticalQueryDefinition } from '../types.ts';
import { SEGMENT_1_QUERIES } from './segment-1.ts';
import { SEGMENT_2_QUERIES } from './segment-2.ts';
import { SEGMENT_3_QUERIES } from './segment-3.ts';
import { SEGMENT_4_QUERIES } from './segment-4.ts';
import { SEGMENT_5_QUERIES } from './segment-5.ts';
import { SEGMENT_6_QUERIES } from './segment-6.ts';
import { SEGMENT_7_QUERIES } from './segment-7.ts';

export const ANALYTICAL_QUERIES: ReadonlyArray<AnalyticalQueryDefinition> = [
  ...SEGMENT_1_QUERIES,
  ...SEGMENT_2_QUERIES,
  ...SEGMENT_3_QUERIES,
  ...SEGMENT_4_QUERIES,
  ...SEGMENT_5_QUERIES,
  ...SEGMENT_6_QUERIES,
  ...SEGMENT_7_QUERIES,
];
