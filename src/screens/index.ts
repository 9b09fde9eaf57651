export { SplashScreen } from './SplashScreen';
export { VaultScreen } from './VaultScreen';
export { ProfileScreen } from './ProfileScreen';
