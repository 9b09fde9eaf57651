/**
 * Services Index
 */

export { SessionService, createLocalAuthBackend, type AuthBackend } from './session.service';
export { VaultService, VaultCatalogError, parseVaultCatalog, isVaultTint } from './vault.service';
export { SplashSequencer, type SplashAnimationDriver, type SplashSequencerOptions } from './splash.sequencer';
export { HapticService } from './haptic.service';
export {
    buildCategoryCards,
    buildFileRows,
    formatFileMeta,
    FILE_META_SEPARATOR,
    type CategoryCard,
    type FileRow,
} from './vault.presenter';
export {
    buildProfileView,
    identityFromSession,
    resolveDisplayName,
    formatMemberSince,
    PROFILE_CONTENT,
    type ProfileView,
    type ProfileContent,
} from './profile.presenter';
