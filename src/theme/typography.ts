/**
 * CareVault Mobile — Typography
 *
 * Rounded system face on iOS, Roboto elsewhere.
 */

import { Platform, type TextStyle } from 'react-native';
import { fontScale } from './responsive';

const fontFamily = Platform.select({
    ios: 'System',
    android: 'Roboto',
    default: 'System',
});

export const typography = {
    brand: {
        fontFamily,
        fontSize: fontScale(40),
        fontWeight: '700',
        letterSpacing: 0.5,
    },

    tagline: {
        fontFamily,
        fontSize: fontScale(16),
        fontWeight: '500',
    },

    title: {
        fontFamily,
        fontSize: fontScale(28),
        fontWeight: '700',
        lineHeight: fontScale(34),
    },

    headline: {
        fontFamily,
        fontSize: fontScale(20),
        fontWeight: '700',
        lineHeight: fontScale(26),
    },

    section: {
        fontFamily,
        fontSize: fontScale(18),
        fontWeight: '700',
        lineHeight: fontScale(24),
    },

    body: {
        fontFamily,
        fontSize: fontScale(16),
        fontWeight: '400',
        lineHeight: fontScale(22),
    },

    bodyStrong: {
        fontFamily,
        fontSize: fontScale(16),
        fontWeight: '600',
        lineHeight: fontScale(22),
    },

    caption: {
        fontFamily,
        fontSize: fontScale(12),
        fontWeight: '500',
        lineHeight: fontScale(16),
    },

    micro: {
        fontFamily,
        fontSize: fontScale(11),
        fontWeight: '400',
        lineHeight: fontScale(14),
    },
} satisfies Record<string, TextStyle>;
