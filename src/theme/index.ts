/**
 * CareVault Mobile — Theme Index
 */

export * from './colors';
export * from './typography';
export * from './responsive';
export * from './icons';

import { moderateScale } from './responsive';

export const spacing = {
    xs: moderateScale(4),
    sm: moderateScale(8),
    md: moderateScale(16),
    lg: moderateScale(24),
    xl: moderateScale(32),
} as const;

export const borderRadius = {
    sm: 8,
    md: 12,
    lg: 20,
    xl: 30,
    full: 9999,
} as const;
