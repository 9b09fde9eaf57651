/**
 * Vault Service — Medical Document Catalog
 *
 * Categories and recent files shown on the VAULT panel. The catalog ships
 * as JSON with the app and is validated once, on first read.
 */

import catalogData from '../data/vault.json';
import type { VaultCatalog, VaultCategory, VaultFile, VaultTint } from '../types';

export const VAULT_TINTS: readonly VaultTint[] = ['blue', 'green', 'orange', 'purple', 'red', 'teal', 'gray'];

export class VaultCatalogError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'VaultCatalogError';
    }
}

export const isVaultTint = (value: unknown): value is VaultTint =>
    typeof value === 'string' && VAULT_TINTS.some(tint => tint === value);

const readString = (entry: object, field: string, where: string): string => {
    const value: unknown = field in entry ? Reflect.get(entry, field) : undefined;
    if (typeof value !== 'string' || value.length === 0) {
        throw new VaultCatalogError(`${where}: "${field}" must be a non-empty string`);
    }
    return value;
};

const readTint = (entry: object, where: string): VaultTint => {
    const value: unknown = 'color' in entry ? entry.color : undefined;
    if (!isVaultTint(value)) {
        throw new VaultCatalogError(`${where}: unknown color "${String(value)}"`);
    }
    return value;
};

const readEntries = (raw: object, field: 'categories' | 'recentFiles'): object[] => {
    const value: unknown = field in raw ? Reflect.get(raw, field) : undefined;
    if (!Array.isArray(value)) {
        throw new VaultCatalogError(`catalog: "${field}" must be a list`);
    }
    return value.map((entry: unknown, index) => {
        if (typeof entry !== 'object' || entry === null) {
            throw new VaultCatalogError(`${field}[${index}]: expected an object`);
        }
        return entry;
    });
};

/**
 * Validate a raw catalog and freeze it.
 */
export function parseVaultCatalog(raw: unknown): VaultCatalog {
    if (typeof raw !== 'object' || raw === null) {
        throw new VaultCatalogError('catalog: expected an object');
    }

    const categories = readEntries(raw, 'categories').map((entry, index): VaultCategory => {
        const where = `categories[${index}]`;
        return Object.freeze({
            name: readString(entry, 'name', where),
            icon: readString(entry, 'icon', where),
            color: readTint(entry, where),
        });
    });

    const recentFiles = readEntries(raw, 'recentFiles').map((entry, index): VaultFile => {
        const where = `recentFiles[${index}]`;
        return Object.freeze({
            name: readString(entry, 'name', where),
            date: readString(entry, 'date', where),
            type: readString(entry, 'type', where),
            icon: readString(entry, 'icon', where),
            color: readTint(entry, where),
        });
    });

    return Object.freeze({
        categories: Object.freeze(categories),
        recentFiles: Object.freeze(recentFiles),
    });
}

class VaultServiceClass {
    private catalog: VaultCatalog | null = null;

    private load(): VaultCatalog {
        if (!this.catalog) {
            this.catalog = parseVaultCatalog(catalogData);
            console.log(
                '[VaultService] Catalog loaded:',
                this.catalog.categories.length, 'categories,',
                this.catalog.recentFiles.length, 'recent files',
            );
        }
        return this.catalog;
    }

    getCategories(): readonly VaultCategory[] {
        return this.load().categories;
    }

    getRecentFiles(): readonly VaultFile[] {
        return this.load().recentFiles;
    }
}

export const VaultService = new VaultServiceClass();

export default VaultService;
