/**
 * CareVault Mobile — Responsive Scaling
 *
 *   width: scale(16)         // linear with screen width
 *   fontSize: fontScale(14)  // follows accessibility font size, capped
 *   padding: moderateScale(8) // half-rate scaling
 */

import { Dimensions, PixelRatio } from 'react-native';

// Design baseline: 390pt wide
const BASE_WIDTH = 390;
const MAX_FONT_SCALE = 1.3;

const widthRatio = (): number => Dimensions.get('window').width / BASE_WIDTH;

export const scale = (size: number): number => Math.round(size * widthRatio());

export const moderateScale = (size: number, factor: number = 0.5): number =>
    Math.round(size + (scale(size) - size) * factor);

/**
 * Blend of screen ratio and system font scale, weighted toward the latter.
 */
export const fontScale = (size: number): number => {
    const systemScale = Math.min(PixelRatio.getFontScale(), MAX_FONT_SCALE);
    return Math.round(size * (0.4 * widthRatio() + 0.6 * systemScale));
};
