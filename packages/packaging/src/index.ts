/**
 * @ghidra-dmg/packaging
 *
 * Disk image assembly.
 *
 * Responsibilities:
 * - Stage Ghidra.app in a private temporary tree
 * - Install extensions, theme and runtime
 * - Compress the tree into a .dmg at the requested path
 */

export {
  Packager,
  type PackagerOptions,
  type BuildResult,
  type BuildStage,
  type StageEvent,
} from './packager.js';
export { StagingTree, withStagingTree, releaseDirName, APP_NAME } from './staging.js';
export { versionFromName, readApplicationVersion, inspectSource } from './steps/baseApplication.js';
export { renderInfoPlist, renderLauncher } from './steps/appBundle.js';
export { extensionsDir, type InstalledExtension } from './steps/extensions.js';
export { resolveArtifactPath } from './steps/diskImage.js';
export type { StepContext } from './steps/context.js';
