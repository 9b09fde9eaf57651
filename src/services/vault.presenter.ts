/**
 * Vault Presenter
 *
 * Turns catalog entries into what the VAULT panel draws. Pure: the screen
 * renders exactly these values, in this order.
 */

import type { VaultCategory, VaultFile, VaultTint } from '../types';

export const FILE_META_SEPARATOR = ' • ';

export interface CategoryCard {
    key: string;
    name: string;
    icon: string;
    tint: VaultTint;
}

export interface FileRow {
    key: string;
    name: string;
    meta: string;
    icon: string;
    tint: VaultTint;
}

export const formatFileMeta = (date: string, type: string): string =>
    `${date}${FILE_META_SEPARATOR}${type}`;

// Names are not guaranteed unique, so keys carry the position
const itemKey = (index: number, name: string): string => `${index}:${name}`;

export function buildCategoryCards(categories: readonly VaultCategory[]): CategoryCard[] {
    return categories.map((category, index) => ({
        key: itemKey(index, category.name),
        name: category.name,
        icon: category.icon,
        tint: category.color,
    }));
}

export function buildFileRows(files: readonly VaultFile[]): FileRow[] {
    return files.map((file, index) => ({
        key: itemKey(index, file.name),
        name: file.name,
        meta: formatFileMeta(file.date, file.type),
        icon: file.icon,
        tint: file.color,
    }));
}
