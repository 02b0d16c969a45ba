/**
 * TIV rules: the dataset as a whole.
 *
 * @module sanity/rules/tier
 */

import { defineChecker, type Checker } from '../checker.js';

export const TIV001 = defineChecker({
  id: 'TIV001',
  name: 'load-dataset',
  severity: 'ERROR',
  description: 'The dataset tables load successfully.',
  requiresSnapshot: false,
  check: (context) => (context.loadError ? [context.loadError.message] : null),
});

export const TIER_RULES: readonly Checker[] = [TIV001];
