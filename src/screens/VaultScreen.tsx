/**
 * VAULT Panel — Medical Documents
 *
 * Category cards and recently added files. Both lists are injected
 * (bundled catalog by default); the screen only draws them.
 */

import React, { useMemo, useState } from 'react';
import { View, Text, TextInput, StyleSheet, ScrollView, TouchableOpacity } from 'react-native';
import { GlassView } from '../components';
import { VaultService, buildCategoryCards, buildFileRows, type CategoryCard, type FileRow } from '../services';
import { borderRadius, colors, iconGlyph, spacing, tintBackground, tints, typography } from '../theme';
import type { VaultCategory, VaultFile } from '../types';

interface VaultScreenProps {
    categories?: readonly VaultCategory[];
    files?: readonly VaultFile[];
}

export const VaultScreen: React.FC<VaultScreenProps> = ({
    categories = VaultService.getCategories(),
    files = VaultService.getRecentFiles(),
}) => {
    // Search field is display-only for now
    const [searchText, setSearchText] = useState('');

    const cards = useMemo(() => buildCategoryCards(categories), [categories]);
    const rows = useMemo(() => buildFileRows(files), [files]);

    return (
        <ScrollView style={styles.container} contentContainerStyle={styles.content}>
            {/* Header */}
            <View style={styles.header}>
                <Text style={styles.title}>Medical Vault</Text>
                <Text style={styles.subtitle}>Your records, in one place</Text>
            </View>

            {/* Search */}
            <GlassView style={styles.searchBox} radius={borderRadius.md}>
                <View style={styles.searchRow}>
                    <Text style={styles.searchGlyph}>{iconGlyph('magnifyingglass')}</Text>
                    <TextInput
                        style={styles.searchInput}
                        placeholder="Search records..."
                        placeholderTextColor={colors.textMuted}
                        value={searchText}
                        onChangeText={setSearchText}
                    />
                    {searchText.length > 0 && (
                        <TouchableOpacity
                            onPress={() => setSearchText('')}
                            accessibilityRole="button"
                            accessibilityLabel="Clear search"
                            hitSlop={8}
                        >
                            <Text style={styles.clearGlyph}>{iconGlyph('xmark.circle.fill')}</Text>
                        </TouchableOpacity>
                    )}
                </View>
            </GlassView>

            {/* Categories */}
            <SectionHeader title="Categories" count={cards.length} />
            <View style={styles.grid}>
                {cards.map(card => (
                    <CategoryTile key={card.key} card={card} />
                ))}
            </View>

            {/* Recent files */}
            <SectionHeader title="Recent Files" count={rows.length} />
            <GlassView>
                {rows.map((row, index) => (
                    <React.Fragment key={row.key}>
                        {index > 0 && <View style={styles.rowDivider} />}
                        <FileRowView row={row} />
                    </React.Fragment>
                ))}
            </GlassView>
        </ScrollView>
    );
};

const SectionHeader: React.FC<{ title: string; count: number }> = ({ title, count }) => (
    <View style={styles.sectionHeader}>
        <Text style={styles.sectionTitle}>{title}</Text>
        <Text style={styles.sectionCount}>{count}</Text>
    </View>
);

const CategoryTile: React.FC<{ card: CategoryCard }> = ({ card }) => (
    <GlassView style={styles.tile}>
        <View style={styles.tileBody}>
            <View style={[styles.tileIcon, { backgroundColor: tintBackground(card.tint) }]}>
                <Text style={[styles.tileGlyph, { color: tints[card.tint] }]}>{iconGlyph(card.icon)}</Text>
            </View>
            <Text style={styles.tileName} numberOfLines={1}>{card.name}</Text>
        </View>
    </GlassView>
);

const FileRowView: React.FC<{ row: FileRow }> = ({ row }) => (
    <View style={styles.fileRow}>
        <View style={[styles.fileIcon, { backgroundColor: tintBackground(row.tint) }]}>
            <Text style={[styles.fileGlyph, { color: tints[row.tint] }]}>{iconGlyph(row.icon)}</Text>
        </View>
        <View style={styles.fileText}>
            <Text style={styles.fileName} numberOfLines={1}>{row.name}</Text>
            <Text style={styles.fileMeta}>{row.meta}</Text>
        </View>
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
        gap: spacing.md,
    },

    // Header
    header: {
        gap: spacing.xs,
    },
    title: {
        ...typography.title,
        color: colors.textPrimary,
    },
    subtitle: {
        ...typography.body,
        color: colors.textSecondary,
    },

    // Search
    searchBox: {
        alignSelf: 'stretch',
    },
    searchRow: {
        flexDirection: 'row',
        alignItems: 'center',
        paddingHorizontal: spacing.md,
        gap: spacing.sm,
    },
    searchGlyph: {
        fontSize: 16,
    },
    searchInput: {
        ...typography.body,
        flex: 1,
        paddingVertical: 12,
        color: colors.textPrimary,
    },
    clearGlyph: {
        fontSize: 16,
        color: colors.textMuted,
    },

    // Sections
    sectionHeader: {
        flexDirection: 'row',
        alignItems: 'baseline',
        justifyContent: 'space-between',
        marginTop: spacing.sm,
    },
    sectionTitle: {
        ...typography.section,
        color: colors.textPrimary,
    },
    sectionCount: {
        ...typography.caption,
        color: colors.textMuted,
    },

    // Category grid
    grid: {
        flexDirection: 'row',
        flexWrap: 'wrap',
        justifyContent: 'space-between',
        rowGap: spacing.md,
    },
    tile: {
        width: '48%',
    },
    tileBody: {
        padding: spacing.md,
        gap: spacing.sm,
    },
    tileIcon: {
        width: 44,
        height: 44,
        borderRadius: borderRadius.md,
        alignItems: 'center',
        justifyContent: 'center',
    },
    tileGlyph: {
        fontSize: 22,
    },
    tileName: {
        ...typography.bodyStrong,
        color: colors.textPrimary,
    },

    // File list
    fileRow: {
        flexDirection: 'row',
        alignItems: 'center',
        paddingHorizontal: spacing.md,
        paddingVertical: 12,
        gap: spacing.md,
    },
    fileIcon: {
        width: 40,
        height: 40,
        borderRadius: borderRadius.sm,
        alignItems: 'center',
        justifyContent: 'center',
    },
    fileGlyph: {
        fontSize: 18,
    },
    fileText: {
        flex: 1,
        gap: 2,
    },
    fileName: {
        ...typography.bodyStrong,
        color: colors.textPrimary,
    },
    fileMeta: {
        ...typography.caption,
        color: colors.textSecondary,
    },
    chevron: {
        ...typography.headline,
        color: colors.textMuted,
    },
    rowDivider: {
        height: StyleSheet.hairlineWidth,
        backgroundColor: colors.border,
        marginLeft: 72,
    },
});

export default VaultScreen;
