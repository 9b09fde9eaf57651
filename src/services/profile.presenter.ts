/**
 * Profile Presenter
 *
 * Derives the PROFILE panel's display state from the session. The sign-out
 * control follows the session's loading flag and nothing else.
 */

import profileData from '../data/profile.json';
import { APP_CONFIG } from '../config';
import { isVaultTint } from './vault.service';
import type { ProfileIdentity, ProfileSection, ProfileStat, SessionSnapshot } from '../types';

export interface ProfileView {
    displayName: string;
    memberSince: string;
    signOutDisabled: boolean;
    showSignOutProgress: boolean;
    signOutError: string | null;
}

export interface ProfileContent {
    stats: readonly ProfileStat[];
    sections: readonly ProfileSection[];
}

/**
 * Email verbatim, or the member fallback when there is none.
 * An empty string is still an email and is shown as-is.
 */
export function resolveDisplayName(email: string | null | undefined): string {
    return email ?? APP_CONFIG.memberFallbackName;
}

export function formatMemberSince(since: string | null, now: Date = new Date()): string {
    const parsed = since ? new Date(since) : now;
    const date = Number.isNaN(parsed.getTime()) ? now : parsed;
    const label = date.toLocaleDateString('en-US', {
        month: 'short',
        day: 'numeric',
        year: 'numeric',
    });
    return `Member since ${label}`;
}

export function buildProfileView(
    identity: ProfileIdentity,
    session: Pick<SessionSnapshot, 'errorMessage' | 'memberSince'> = { errorMessage: null, memberSince: null },
    now: Date = new Date(),
): ProfileView {
    return {
        displayName: resolveDisplayName(identity.email),
        memberSince: formatMemberSince(session.memberSince, now),
        signOutDisabled: identity.isLoading,
        showSignOutProgress: identity.isLoading,
        signOutError: identity.isLoading ? null : session.errorMessage,
    };
}

export const identityFromSession = (snapshot: SessionSnapshot): ProfileIdentity => ({
    email: snapshot.currentUserEmail,
    isLoading: snapshot.isLoading,
});

const loadProfileContent = (): ProfileContent => {
    const sections = profileData.sections.map((section): ProfileSection => ({
        title: section.title,
        rows: section.rows.map(row => {
            if (!isVaultTint(row.color)) {
                throw new Error(`[ProfilePresenter] Unknown row color "${row.color}" in ${section.title}`);
            }
            return { icon: row.icon, title: row.title, color: row.color };
        }),
    }));

    return {
        stats: profileData.stats,
        sections,
    };
};

export const PROFILE_CONTENT: ProfileContent = loadProfileContent();
