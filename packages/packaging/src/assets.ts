/**
 * Bundled asset locations (Info.plist template, launcher, Ghidraal build file)
 */

import { dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = dirname(fileURLToPath(import.meta.url));

// Relative to packages/packaging/src
export const ASSETS_DIR = resolve(__dirname, '../assets');

export const INFO_PLIST_TEMPLATE = join(ASSETS_DIR, 'Info.plist');
export const LAUNCHER_TEMPLATE = join(ASSETS_DIR, 'launcher.sh');
export const GHIDRAAL_BUILD_GRADLE = join(ASSETS_DIR, 'ghidraal', 'build.gradle');
