/**
 * useSession Hook — Account Session
 *
 * Purpose: Expose the session snapshot to screens and keep it current.
 * Unsubscribes on unmount, so a sign-out that finishes after the screen
 * is gone never touches it.
 */

import { useState, useEffect, useCallback } from 'react';
import { SessionService } from '../services/session.service';
import type { SessionSnapshot, SignOutResult } from '../types';

export interface SessionActions {
    /** Sign out through the session service */
    signOut: () => Promise<SignOutResult>;
}

export function useSession(): [SessionSnapshot, SessionActions] {
    const [snapshot, setSnapshot] = useState<SessionSnapshot>(() => SessionService.getSnapshot());

    useEffect(() => {
        // Catch anything published between first render and subscribing
        setSnapshot(SessionService.getSnapshot());
        return SessionService.subscribe(setSnapshot);
    }, []);

    const signOut = useCallback((): Promise<SignOutResult> => SessionService.signOut(), []);

    return [snapshot, { signOut }];
}
