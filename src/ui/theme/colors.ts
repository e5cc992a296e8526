/**
 * Color palette for seedtier terminal output.
 *
 * This module provides color constants for use with Ink components.
 *
 * @module ui/theme/colors
 */

import { OperationKind, OperationStatus, Tier } from '../../engine/types.js';

// =============================================================================
// Base Color Palette
// =============================================================================

export const colors = {
  /** Primary accent color */
  primary: 'green',

  /** Secondary accent color - for highlights */
  secondary: 'cyan',

  success: 'greenBright',
  warning: 'yellow',
  error: 'red',

  /** Muted color for secondary/disabled content */
  muted: 'gray',

  text: 'white',
} as const;

/**
 * Type representing valid color values from the palette.
 */
export type Color = (typeof colors)[keyof typeof colors];

// =============================================================================
// Tier and Operation Colors
// =============================================================================

/**
 * Colors mapped to storage tiers
 */
export const tierColors: Record<Tier, string> = {
  [Tier.CACHE]: 'greenBright',
  [Tier.MASTER]: 'blue',
  [Tier.UNMANAGED]: 'gray',
};

/**
 * Colors mapped to relocation kinds
 */
export const operationColors: Record<OperationKind, string> = {
  [OperationKind.PROMOTE]: 'green',
  [OperationKind.RELEGATE]: 'yellow',
  [OperationKind.CLEANUP]: 'magenta',
};

/**
 * Color for an operation outcome
 */
export function getStatusColor(status: OperationStatus): string {
  switch (status) {
    case OperationStatus.COMPLETED:
      return colors.success;
    case OperationStatus.FAILED:
      return colors.error;
    case OperationStatus.IN_PROGRESS:
      return colors.secondary;
    default:
      return colors.muted;
  }
}
