/**
 * Transaction Constants
 *
 * Value sets shared by the transaction and scheduled transaction tools.
 */

/**
 * Recurrence frequencies YNAB accepts for scheduled transactions.
 * Listed for tool descriptions only: frequency values are forwarded
 * unchecked and YNAB rejects unknown ones.
 */
export const frequencies = [
  'never',
  'daily',
  'weekly',
  'everyOtherWeek',
  'twiceAMonth',
  'every4Weeks',
  'monthly',
  'everyOtherMonth',
  'every3Months',
  'every4Months',
  'twiceAYear',
  'yearly',
  'everyOtherYear',
] as const;

export const clearedStatuses = ['cleared', 'uncleared', 'reconciled'] as const;

export type ClearedStatus = (typeof clearedStatuses)[number];

/**
 * YNAB transaction flag colors.
 */
export const flagColors = ['red', 'orange', 'yellow', 'green', 'blue', 'purple'] as const;

export type FlagColor = (typeof flagColors)[number];
