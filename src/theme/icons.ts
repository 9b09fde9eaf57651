/**
 * Icon tokens → glyphs.
 * Tokens follow SF Symbol names so the catalog reads the same on every platform.
 */

const ICON_GLYPHS: Record<string, string> = {
    'testtube.2': '🧪',
    'pills.fill': '💊',
    'shield.fill': '🛡️',
    'waveform.path.ecg': '🩺',
    'doc.text.fill': '📄',
    'photo.fill': '🩻',
    'syringe.fill': '💉',
    'person.fill': '👤',
    'heart.fill': '❤️',
    'bell.fill': '🔔',
    'lock.fill': '🔒',
    'questionmark.circle.fill': '❓',
    'info.circle.fill': 'ℹ️',
    'cross.case.fill': '⚕️',
    'magnifyingglass': '🔍',
    'xmark.circle.fill': '✕',
    'chevron.right': '›',
    'arrow.right.square.fill': '⇥',
};

export const FALLBACK_GLYPH = '📁';

export const iconGlyph = (token: string): string => ICON_GLYPHS[token] ?? FALLBACK_GLYPH;
