/**
 * CareVault Mobile — Color Palette
 *
 * Light surfaces over a deep blue launch backdrop.
 * Tints are shared by vault cards and settings rows.
 */

import type { VaultTint } from '../types';

export const colors = {
    // Backgrounds
    background: '#f4f6fb',
    surface: '#ffffff',
    surfaceMuted: 'rgba(17, 24, 39, 0.05)',
    border: 'rgba(17, 24, 39, 0.08)',

    // Text
    textPrimary: '#111827',
    textSecondary: '#4b5563',
    textMuted: '#9ca3af',
    textOnDark: '#ffffff',

    // Accent
    accentPrimary: '#3949ab',
    accentDeep: '#311b92',

    // Semantic
    danger: 'rgba(229, 57, 53, 0.85)',
    dangerSoft: 'rgba(229, 57, 53, 0.2)',
    error: '#c62828',
} as const;

// Splash backdrop: royal blue → indigo → cyan
export const splashPalette = {
    royalBlue: '#1a237e',
    indigo: '#311b92',
    cyan: '#006064',
    orbBlue: 'rgba(33, 150, 243, 0.2)',
    orbCyan: 'rgba(0, 188, 212, 0.2)',
    glassFill: 'rgba(255, 255, 255, 0.14)',
    glassStroke: 'rgba(255, 255, 255, 0.35)',
} as const;

export const tints: Record<VaultTint, string> = {
    blue: '#1e88e5',
    green: '#43a047',
    orange: '#fb8c00',
    purple: '#8e24aa',
    red: '#e53935',
    teal: '#00897b',
    gray: '#757575',
};

export const tintBackground = (tint: VaultTint): string => `${tints[tint]}1f`;
