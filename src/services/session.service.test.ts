import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

const storage = vi.hoisted(() => new Map<string, string>());

vi.mock('@react-native-async-storage/async-storage', () => ({
    default: {
        getItem: async (key: string) => storage.get(key) ?? null,
        setItem: async (key: string, value: string) => {
            storage.set(key, value);
        },
        removeItem: async (key: string) => {
            storage.delete(key);
        },
    },
}));

import { SessionService, type AuthBackend } from './session.service';
import type { SessionSnapshot, StoredSession } from '../types';

const SESSION_KEY = '@carevault/session';

function deferred() {
    let resolve: () => void = () => {};
    let reject: (error: Error) => void = () => {};
    const promise = new Promise<void>((res, rej) => {
        resolve = res;
        reject = rej;
    });
    return { promise, resolve, reject };
}

function deferredSession() {
    let resolve: (session: StoredSession | null) => void = () => {};
    const promise = new Promise<StoredSession | null>(res => {
        resolve = res;
    });
    return { promise, resolve };
}

function createBackend(signOut: () => Promise<void>) {
    return {
        loadSession: vi.fn(async (): Promise<StoredSession | null> => null),
        saveSession: vi.fn(async () => {}),
        signOut: vi.fn(signOut),
    } satisfies AuthBackend;
}

describe('SessionService', () => {
    beforeEach(() => {
        storage.clear();
        SessionService.reset();
        vi.spyOn(console, 'log').mockImplementation(() => {});
        vi.spyOn(console, 'warn').mockImplementation(() => {});
        vi.spyOn(console, 'error').mockImplementation(() => {});
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    describe('restore()', () => {
        it('stays signed out when nothing is stored', async () => {
            await SessionService.restore();

            expect(SessionService.getSnapshot()).toEqual({
                currentUserEmail: null,
                isAuthenticated: false,
                isLoading: false,
                errorMessage: null,
                memberSince: null,
            });
        });

        it('publishes the stored user', async () => {
            storage.set(
                SESSION_KEY,
                JSON.stringify({ email: 'asha@example.com', signedInAt: '2026-01-06T12:00:00.000Z' }),
            );

            await SessionService.restore();

            const snapshot = SessionService.getSnapshot();
            expect(snapshot.currentUserEmail).toBe('asha@example.com');
            expect(snapshot.isAuthenticated).toBe(true);
            expect(snapshot.memberSince).toBe('2026-01-06T12:00:00.000Z');
        });

        it('ignores a malformed record', async () => {
            storage.set(SESSION_KEY, JSON.stringify({ email: 42 }));

            await SessionService.restore();

            expect(SessionService.getSnapshot().isAuthenticated).toBe(false);
            expect(console.warn).toHaveBeenCalledWith('[SessionService] Ignoring malformed stored session');
        });

        it('logs and stays signed out when the record is not JSON', async () => {
            storage.set(SESSION_KEY, '{not json');

            await SessionService.restore();

            expect(SessionService.getSnapshot().isAuthenticated).toBe(false);
            expect(console.error).toHaveBeenCalledWith(
                '[SessionService] Failed to restore session:',
                expect.any(SyntaxError),
            );
        });

        it('does not bring back a user signed out while loading', async () => {
            const load = deferredSession();
            const backend = createBackend(async () => {});
            backend.loadSession.mockImplementation(() => load.promise);
            SessionService.setBackend(backend);

            const restoring = SessionService.restore();
            await expect(SessionService.signOut()).resolves.toEqual({ success: true });
            load.resolve({ email: 'asha@example.com', signedInAt: '2026-01-06T12:00:00.000Z' });
            await restoring;

            const snapshot = SessionService.getSnapshot();
            expect(snapshot.isAuthenticated).toBe(false);
            expect(snapshot.currentUserEmail).toBeNull();
        });

        it('keeps a user set while loading', async () => {
            const load = deferredSession();
            const backend = createBackend(async () => {});
            backend.loadSession.mockImplementation(() => load.promise);
            SessionService.setBackend(backend);

            const restoring = SessionService.restore();
            await SessionService.setUser('ravi@example.com');
            load.resolve({ email: 'asha@example.com', signedInAt: '2026-01-06T12:00:00.000Z' });
            await restoring;

            expect(SessionService.getSnapshot().currentUserEmail).toBe('ravi@example.com');
        });
    });

    describe('setUser()', () => {
        it('persists the session and notifies subscribers', async () => {
            const seen: SessionSnapshot[] = [];
            const unsubscribe = SessionService.subscribe(snapshot => {
                seen.push(snapshot);
            });

            await SessionService.setUser('ravi@example.com');
            unsubscribe();

            const stored = storage.get(SESSION_KEY);
            expect(stored).toBeDefined();
            expect(JSON.parse(stored ?? '{}').email).toBe('ravi@example.com');
            expect(seen).toHaveLength(1);
            expect(seen[0].currentUserEmail).toBe('ravi@example.com');
            expect(seen[0].isAuthenticated).toBe(true);
        });
    });

    describe('signOut()', () => {
        it('flags loading while the backend runs, then clears the user', async () => {
            await SessionService.setUser('asha@example.com');
            const gate = deferred();
            SessionService.setBackend(createBackend(() => gate.promise));

            const pending = SessionService.signOut();
            expect(SessionService.getSnapshot().isLoading).toBe(true);

            gate.resolve();
            await expect(pending).resolves.toEqual({ success: true });

            const snapshot = SessionService.getSnapshot();
            expect(snapshot.isLoading).toBe(false);
            expect(snapshot.currentUserEmail).toBeNull();
            expect(snapshot.isAuthenticated).toBe(false);
            expect(snapshot.memberSince).toBeNull();
        });

        it('removes the stored record with the local backend', async () => {
            await SessionService.setUser('asha@example.com');
            expect(storage.has(SESSION_KEY)).toBe(true);

            await SessionService.signOut();

            expect(storage.has(SESSION_KEY)).toBe(false);
        });

        it('keeps the user and reports the error when the backend fails', async () => {
            await SessionService.setUser('asha@example.com');
            SessionService.setBackend(createBackend(async () => {
                throw new Error('Network unreachable');
            }));

            const result = await SessionService.signOut();

            expect(result).toEqual({ success: false, error: 'Network unreachable' });
            const snapshot = SessionService.getSnapshot();
            expect(snapshot.isLoading).toBe(false);
            expect(snapshot.isAuthenticated).toBe(true);
            expect(snapshot.currentUserEmail).toBe('asha@example.com');
            expect(snapshot.errorMessage).toBe('Network unreachable');
        });

        it('clears the previous error when a new attempt starts', async () => {
            let fail = true;
            SessionService.setBackend(createBackend(async () => {
                if (fail) throw new Error('Timed out');
            }));
            await SessionService.signOut();
            expect(SessionService.getSnapshot().errorMessage).toBe('Timed out');

            fail = false;
            const pending = SessionService.signOut();
            expect(SessionService.getSnapshot().errorMessage).toBeNull();
            await expect(pending).resolves.toEqual({ success: true });
        });

        it('describes non-Error rejections', async () => {
            SessionService.setBackend(createBackend(() => Promise.reject('offline')));

            const result = await SessionService.signOut();

            expect(result).toEqual({ success: false, error: 'offline' });
        });

        it('shares one backend call between overlapping requests', async () => {
            const gate = deferred();
            const backend = createBackend(() => gate.promise);
            SessionService.setBackend(backend);

            const first = SessionService.signOut();
            const second = SessionService.signOut();
            gate.resolve();

            expect(second).toBe(first);
            await first;
            expect(backend.signOut).toHaveBeenCalledTimes(1);

            await SessionService.signOut();
            expect(backend.signOut).toHaveBeenCalledTimes(2);
        });
    });

    it('stops notifying after unsubscribe', async () => {
        const listener = vi.fn();
        const unsubscribe = SessionService.subscribe(listener);
        unsubscribe();

        await SessionService.setUser('asha@example.com');

        expect(listener).not.toHaveBeenCalled();
    });
});
