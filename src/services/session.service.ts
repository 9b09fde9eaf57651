/**
 * Session Service — Account Session
 *
 * Purpose: Hold the signed-in user and run sign-out.
 * Screens read a snapshot and subscribe for changes; they never keep
 * their own copy of the loading flag.
 */

import AsyncStorage from '@react-native-async-storage/async-storage';
import { APP_CONFIG } from '../config';
import type { SessionSnapshot, SignOutResult, StoredSession } from '../types';

export interface AuthBackend {
    loadSession(): Promise<StoredSession | null>;
    saveSession(session: StoredSession): Promise<void>;
    signOut(): Promise<void>;
}

type SessionListener = (snapshot: SessionSnapshot) => void;

const INITIAL_SNAPSHOT: SessionSnapshot = {
    currentUserEmail: null,
    isAuthenticated: false,
    isLoading: false,
    errorMessage: null,
    memberSince: null,
};

const isStoredSession = (value: unknown): value is StoredSession => {
    if (typeof value !== 'object' || value === null) return false;
    if (!('email' in value) || !('signedInAt' in value)) return false;
    const { email, signedInAt } = value;
    return (email === null || typeof email === 'string') && typeof signedInAt === 'string';
};

/**
 * Device-local backend: the session record lives in AsyncStorage.
 */
export const createLocalAuthBackend = (storageKey: string = APP_CONFIG.storage.session): AuthBackend => ({
    async loadSession() {
        const data = await AsyncStorage.getItem(storageKey);
        if (!data) return null;

        const parsed: unknown = JSON.parse(data);
        if (!isStoredSession(parsed)) {
            console.warn('[SessionService] Ignoring malformed stored session');
            return null;
        }
        return parsed;
    },

    async saveSession(session) {
        await AsyncStorage.setItem(storageKey, JSON.stringify(session));
    },

    async signOut() {
        await AsyncStorage.removeItem(storageKey);
    },
});

const describeError = (error: unknown): string =>
    error instanceof Error ? error.message : String(error);

class SessionServiceClass {
    private backend: AuthBackend = createLocalAuthBackend();
    private snapshot: SessionSnapshot = INITIAL_SNAPSHOT;
    private listeners = new Set<SessionListener>();
    private pendingSignOut: Promise<SignOutResult> | null = null;
    // Bumped whenever the signed-in user changes; a restore that started
    // under an older generation is dropped.
    private generation = 0;

    /**
     * Swap the auth backend (remote auth, tests)
     */
    setBackend(backend: AuthBackend): void {
        this.backend = backend;
    }

    getSnapshot(): SessionSnapshot {
        return this.snapshot;
    }

    /**
     * Listen for snapshot changes. Returns the unsubscribe function.
     */
    subscribe(listener: SessionListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    /**
     * Load the stored session (call on app mount)
     */
    async restore(): Promise<void> {
        const startedAt = this.generation;
        try {
            const stored = await this.backend.loadSession();
            if (this.generation !== startedAt) {
                console.log('[SessionService] Session changed during restore, discarding');
                return;
            }
            if (!stored) {
                console.log('[SessionService] No stored session');
                return;
            }
            this.applyStoredSession(stored);
            console.log('[SessionService] Session restored');
        } catch (error) {
            console.error('[SessionService] Failed to restore session:', error);
        }
    }

    /**
     * Record a freshly signed-in user
     */
    async setUser(email: string | null): Promise<void> {
        const stored: StoredSession = {
            email,
            signedInAt: new Date().toISOString(),
        };
        await this.backend.saveSession(stored);
        this.generation += 1;
        this.applyStoredSession(stored);
    }

    /**
     * Sign out. Calls made while one is running share its result.
     */
    signOut(): Promise<SignOutResult> {
        if (!this.pendingSignOut) {
            this.pendingSignOut = this.performSignOut().finally(() => {
                this.pendingSignOut = null;
            });
        }
        return this.pendingSignOut;
    }

    /**
     * Back to a signed-out, idle state with the local backend
     */
    reset(): void {
        this.backend = createLocalAuthBackend();
        this.pendingSignOut = null;
        this.generation += 1;
        this.update(INITIAL_SNAPSHOT);
    }

    private async performSignOut(): Promise<SignOutResult> {
        this.update({ isLoading: true, errorMessage: null });

        try {
            await this.backend.signOut();
            this.generation += 1;
            this.update({
                currentUserEmail: null,
                isAuthenticated: false,
                memberSince: null,
                isLoading: false,
            });
            console.log('[SessionService] Signed out');
            return { success: true };
        } catch (error) {
            const message = describeError(error);
            console.error('[SessionService] Sign-out failed:', error);
            this.update({ errorMessage: message, isLoading: false });
            return { success: false, error: message };
        }
    }

    private applyStoredSession(stored: StoredSession): void {
        this.update({
            currentUserEmail: stored.email,
            isAuthenticated: true,
            memberSince: stored.signedInAt,
            errorMessage: null,
        });
    }

    private update(patch: Partial<SessionSnapshot>): void {
        this.snapshot = { ...this.snapshot, ...patch };
        for (const listener of this.listeners) {
            listener(this.snapshot);
        }
    }
}

export const SessionService = new SessionServiceClass();

export default SessionService;
