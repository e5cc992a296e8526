/**
 * UI Components index
 *
 * @module ui/components
 */

export { PlanTable, type PlanTableProps } from './PlanTable.js';
