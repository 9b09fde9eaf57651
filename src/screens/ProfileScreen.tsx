/**
 * PROFILE Panel — Account
 *
 * Identity card, static health stats, settings, and sign-out.
 * Loading state comes from the session; this screen keeps none.
 */

import React, { useCallback } from 'react';
import {
    View,
    Text,
    StyleSheet,
    ScrollView,
    TouchableOpacity,
    ActivityIndicator,
} from 'react-native';
import { useSession } from '../hooks/useSession';
import { GlassView } from '../components';
import {
    HapticService,
    PROFILE_CONTENT,
    buildProfileView,
    identityFromSession,
    type ProfileContent,
} from '../services';
import { borderRadius, colors, iconGlyph, spacing, tintBackground, tints, typography } from '../theme';
import type { ProfileRow, ProfileStat } from '../types';

interface ProfileScreenProps {
    content?: ProfileContent;
}

export const ProfileScreen: React.FC<ProfileScreenProps> = ({ content = PROFILE_CONTENT }) => {
    const [session, { signOut }] = useSession();
    const view = buildProfileView(identityFromSession(session), session);

    const handleSignOut = useCallback(async () => {
        HapticService.tap();
        const result = await signOut();
        if (!result.success) {
            HapticService.warning();
        }
    }, [signOut]);

    return (
        <ScrollView style={styles.container} contentContainerStyle={styles.content}>
            <Text style={styles.title}>Profile</Text>

            {/* Identity card */}
            <GlassView style={styles.card} radius={borderRadius.xl}>
                <View style={styles.cardBody}>
                    <View style={styles.avatar}>
                        <Text style={styles.avatarGlyph}>{iconGlyph('person.fill')}</Text>
                    </View>

                    <Text style={styles.displayName} numberOfLines={1}>{view.displayName}</Text>
                    <Text style={styles.memberSince}>{view.memberSince}</Text>

                    <View style={styles.statsRow}>
                        {content.stats.map((stat, index) => (
                            <React.Fragment key={stat.label}>
                                {index > 0 && <View style={styles.statDivider} />}
                                <StatTile stat={stat} />
                            </React.Fragment>
                        ))}
                    </View>
                </View>
            </GlassView>

            {content.sections.map(section => (
                <View key={section.title} style={styles.section}>
                    <Text style={styles.sectionTitle}>{section.title}</Text>
                    <GlassView>
                        {section.rows.map((row, index) => (
                            <React.Fragment key={row.title}>
                                {index > 0 && <View style={styles.rowDivider} />}
                                <SettingsRow row={row} />
                            </React.Fragment>
                        ))}
                    </GlassView>
                </View>
            ))}

            {/* Sign out */}
            <TouchableOpacity
                style={[styles.signOutButton, view.signOutDisabled && styles.signOutButtonBusy]}
                onPress={handleSignOut}
                disabled={view.signOutDisabled}
                accessibilityRole="button"
                accessibilityState={{ disabled: view.signOutDisabled, busy: view.showSignOutProgress }}
                activeOpacity={0.8}
            >
                {view.showSignOutProgress ? (
                    <ActivityIndicator color={colors.textOnDark} />
                ) : (
                    <Text style={styles.signOutText}>{iconGlyph('arrow.right.square.fill')}  Sign Out</Text>
                )}
            </TouchableOpacity>

            {view.signOutError !== null && (
                <Text style={styles.errorText}>Couldn't sign out: {view.signOutError}</Text>
            )}
        </ScrollView>
    );
};

const StatTile: React.FC<{ stat: ProfileStat }> = ({ stat }) => (
    <View style={styles.stat}>
        <Text style={styles.statValue}>{stat.value}</Text>
        <Text style={styles.statLabel}>{stat.label}</Text>
    </View>
);

const SettingsRow: React.FC<{ row: ProfileRow }> = ({ row }) => (
    <View style={styles.row}>
        <View style={[styles.rowIcon, { backgroundColor: tintBackground(row.color) }]}>
            <Text style={[styles.rowGlyph, { color: tints[row.color] }]}>{iconGlyph(row.icon)}</Text>
        </View>
        <Text style={styles.rowTitle}>{row.title}</Text>
        <Text style={styles.chevron}>{iconGlyph('chevron.right')}</Text>
    </View>
);

const styles = StyleSheet.create({
    container: {
        flex: 1,
        backgroundColor: colors.background,
    },
    content: {
        paddingHorizontal: spacing.md,
        paddingTop: spacing.xl,
        paddingBottom: spacing.xl * 3,
        gap: spacing.lg,
    },
    title: {
        ...typography.title,
        color: colors.textPrimary,
    },

    // Identity card
    card: {
        alignSelf: 'stretch',
    },
    cardBody: {
        alignItems: 'center',
        padding: spacing.lg,
        gap: spacing.xs,
    },
    avatar: {
        width: 100,
        height: 100,
        borderRadius: 50,
        alignItems: 'center',
        justifyContent: 'center',
        backgroundColor: colors.accentDeep,
        marginBottom: spacing.sm,
    },
    avatarGlyph: {
        fontSize: 45,
    },
    displayName: {
        ...typography.headline,
        color: colors.textPrimary,
    },
    memberSince: {
        ...typography.caption,
        color: colors.textSecondary,
        backgroundColor: colors.surfaceMuted,
        paddingHorizontal: 10,
        paddingVertical: 4,
        borderRadius: borderRadius.full,
        overflow: 'hidden',
    },
    statsRow: {
        flexDirection: 'row',
        alignItems: 'center',
        marginTop: spacing.sm,
        gap: spacing.md,
    },
    stat: {
        alignItems: 'center',
        gap: 2,
    },
    statValue: {
        ...typography.section,
        color: colors.textPrimary,
    },
    statLabel: {
        ...typography.micro,
        color: colors.textSecondary,
    },
    statDivider: {
        width: StyleSheet.hairlineWidth,
        height: 30,
        backgroundColor: colors.border,
    },

    // Settings
    section: {
        gap: spacing.sm,
    },
    sectionTitle: {
        ...typography.section,
        color: colors.textPrimary,
        paddingLeft: spacing.xs,
    },
    row: {
        flexDirection: 'row',
        alignItems: 'center',
        paddingHorizontal: spacing.md,
        paddingVertical: 12,
        gap: 15,
    },
    rowIcon: {
        width: 30,
        height: 30,
        borderRadius: borderRadius.sm,
        alignItems: 'center',
        justifyContent: 'center',
    },
    rowGlyph: {
        fontSize: 15,
    },
    rowTitle: {
        ...typography.body,
        color: colors.textPrimary,
        flex: 1,
    },
    chevron: {
        ...typography.headline,
        color: colors.textMuted,
    },
    rowDivider: {
        height: StyleSheet.hairlineWidth,
        backgroundColor: colors.border,
        marginLeft: 60,
    },

    // Sign out
    signOutButton: {
        minHeight: 54,
        borderRadius: borderRadius.md + 4,
        alignItems: 'center',
        justifyContent: 'center',
        backgroundColor: colors.danger,
        shadowColor: colors.dangerSoft,
        shadowOffset: { width: 0, height: 2 },
        shadowOpacity: 1,
        shadowRadius: 5,
    },
    signOutButtonBusy: {
        opacity: 0.7,
    },
    signOutText: {
        ...typography.bodyStrong,
        color: colors.textOnDark,
    },
    errorText: {
        ...typography.caption,
        color: colors.error,
        textAlign: 'center',
    },
});

export default ProfileScreen;
