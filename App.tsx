/**
 * CareVault Mobile — Entry Point
 *
 * Personal health records: splash, medical vault, profile.
 */

import { App } from './src/App';

export default App;
