/**
 * @ghidra-dmg/acquisition
 *
 * Everything that reaches outside the machine:
 * - GitHub latest-release lookup
 * - Cached, resumable-by-retry downloads
 * - Git clones
 * - Extension source classification
 */

export { GitHubReleaseClient, type ReleaseAsset, type GitHubReleaseClientOptions } from './releases.js';
export { Downloader, type DownloadProgress, type DownloadResult, type DownloaderOptions } from './downloader.js';
export { ReleaseFetcher, type FetchedRelease } from './releaseFetcher.js';
export { GitClient } from './git.js';
export {
  SourceDetector,
  sourceDetector,
  detectExtensionSource,
  type ExtensionSource,
  type ExtensionSourceType,
} from './sourceDetector.js';
