/**
 * Scoring Module
 *
 * @module engine/scoring
 */

export {
  score,
  scoreAll,
  scarcity,
  compareScored,
  toGbPerDay,
  updateMetric,
} from './scorer.js';
