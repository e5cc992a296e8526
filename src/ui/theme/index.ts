/**
 * Theme system for seedtier terminal output.
 *
 * @module ui/theme
 *
 * @example
 * ```ts
 * import { colors, tierColors } from '../theme/index.js';
 *
 * <Text color={tierColors[Tier.CACHE]}>cache</Text>
 * ```
 */

export {
  colors,
  tierColors,
  operationColors,
  getStatusColor,
  type Color,
} from './colors.js';
