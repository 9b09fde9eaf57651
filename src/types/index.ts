/**
 * CareVault Mobile — Type Definitions
 */

// Panels reachable once the splash has finished
export type PanelName = 'VAULT' | 'PROFILE';

// Color tokens used by vault cards and settings rows
export type VaultTint = 'blue' | 'green' | 'orange' | 'purple' | 'red' | 'teal' | 'gray';

export interface VaultCategory {
    readonly name: string;
    readonly icon: string;        // icon token, e.g. "pills.fill"
    readonly color: VaultTint;
}

export interface VaultFile {
    readonly name: string;
    readonly date: string;        // already formatted for display
    readonly type: string;        // "PDF", "JPG", ...
    readonly icon: string;
    readonly color: VaultTint;
}

export interface VaultCatalog {
    readonly categories: readonly VaultCategory[];
    readonly recentFiles: readonly VaultFile[];
}

// Identity as the profile sees it. Owned by the session service.
export interface ProfileIdentity {
    email?: string | null;
    isLoading: boolean;
}

export interface SessionSnapshot {
    currentUserEmail: string | null;
    isAuthenticated: boolean;
    isLoading: boolean;
    errorMessage: string | null;
    memberSince: string | null;   // ISO timestamp
}

export interface StoredSession {
    email: string | null;
    signedInAt: string;           // ISO timestamp
}

export type SignOutResult =
    | { success: true }
    | { success: false; error: string };

export type SplashPhase = 'idle' | 'transitioning' | 'ready';

export interface ProfileStat {
    readonly value: string;
    readonly label: string;
}

export interface ProfileRow {
    readonly icon: string;
    readonly title: string;
    readonly color: VaultTint;
}

export interface ProfileSection {
    readonly title: string;
    readonly rows: readonly ProfileRow[];
}
