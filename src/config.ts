/**
 * CareVault Mobile — App Configuration
 */

export const APP_CONFIG = {
    appName: 'CareVault',
    tagline: 'Your Personal Health Companion',
    memberFallbackName: 'CareVault Member',

    splash: {
        readyDelayMs: 2500,
        pulseLegMs: 2000,
        fadeInMs: 500,
    },

    storage: {
        session: '@carevault/session',
    },
} as const;
