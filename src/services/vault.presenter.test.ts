import { describe, it, expect } from 'vitest';
import { buildCategoryCards, buildFileRows, formatFileMeta } from './vault.presenter';
import type { VaultCategory, VaultFile } from '../types';

const categories: VaultCategory[] = [
    { name: 'Lab Reports', icon: 'testtube.2', color: 'blue' },
    { name: 'Prescriptions', icon: 'pills.fill', color: 'green' },
    { name: 'Insurance', icon: 'shield.fill', color: 'orange' },
    { name: 'Imaging', icon: 'waveform.path.ecg', color: 'purple' },
];

const files: VaultFile[] = [
    { name: 'Thyroid Panel', date: 'Feb 2, 2026', type: 'PDF', icon: 'doc.text.fill', color: 'blue' },
    { name: 'Knee MRI', date: 'Jan 30, 2026', type: 'DICOM', icon: 'photo.fill', color: 'purple' },
    { name: 'Antibiotic Course', date: 'Jan 14, 2026', type: 'PDF', icon: 'pills.fill', color: 'green' },
    { name: 'Policy Renewal', date: 'Dec 1, 2025', type: 'PNG', icon: 'shield.fill', color: 'orange' },
];

describe('vault presenter', () => {
    it('renders one card per category with name and icon unmodified', () => {
        const cards = buildCategoryCards(categories);

        expect(cards).toHaveLength(4);
        expect(cards.map(card => card.name)).toEqual(['Lab Reports', 'Prescriptions', 'Insurance', 'Imaging']);
        expect(cards.map(card => card.icon)).toEqual(['testtube.2', 'pills.fill', 'shield.fill', 'waveform.path.ecg']);
        expect(cards[3].tint).toBe('purple');
    });

    it('renders one row per file, in order, with "date • type"', () => {
        const rows = buildFileRows(files);

        expect(rows).toHaveLength(4);
        expect(rows.map(row => row.name)).toEqual(['Thyroid Panel', 'Knee MRI', 'Antibiotic Course', 'Policy Renewal']);
        expect(rows.map(row => row.meta)).toEqual([
            'Feb 2, 2026 • PDF',
            'Jan 30, 2026 • DICOM',
            'Jan 14, 2026 • PDF',
            'Dec 1, 2025 • PNG',
        ]);
    });

    it('joins date and type with a single separator', () => {
        expect(formatFileMeta('Mar 3, 2026', 'JPG')).toBe('Mar 3, 2026 • JPG');
    });

    it('keeps keys unique when names repeat', () => {
        const rows = buildFileRows([files[0], files[0]]);

        expect(rows[0].key).toBe('0:Thyroid Panel');
        expect(rows[1].key).toBe('1:Thyroid Panel');
    });

    it('renders nothing for empty lists', () => {
        expect(buildCategoryCards([])).toEqual([]);
        expect(buildFileRows([])).toEqual([]);
    });
});
