/**
 * Analytics Tools Index
 *
 * Exports the spending analysis tools.
 */

export {
  categorySpendingSummaryTool,
  handleCategorySpendingSummary,
} from './category-spending-summary.js';
export { compareSpendingByYearTool, handleCompareSpendingByYear } from './compare-spending-by-year.js';
