/**
 * Throwaway Ghidra releases and build configuration for tests
 */

import { mkdir, mkdtemp } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadConfig, type BuildConfig } from '@ghidra-dmg/core';
import { fakeArchive, writeFiles, type FileMap } from './fakeTools.js';

export const GHIDRA_VERSION = '11.0';
export const RELEASE_DIR = `ghidra_${GHIDRA_VERSION}_PUBLIC`;

export const RELEASE_FILES: FileMap = {
  ghidraRun: '#!/bin/sh\necho ghidra\n',
  'Ghidra/application.properties': `application.name=Ghidra\napplication.version=${GHIDRA_VERSION}\n`,
  'Ghidra/Framework/Generic/lib/Generic.jar': 'jar\n',
  'support/launch.properties': 'VMARGS_MACOS=-Dapple.laf.useScreenMenuBar=false\n',
  'support/ghidra.ico': 'ico',
};

export interface Workspace {
  root: string;
  cacheDir: string;
  stagingDir: string;
  outputDir: string;
  config: BuildConfig;
}

export async function createWorkspace(env: NodeJS.ProcessEnv = {}): Promise<Workspace> {
  const root = await mkdtemp(join(tmpdir(), 'ghidra-dmg-test-'));
  const workspace = {
    root,
    cacheDir: join(root, 'cache'),
    stagingDir: join(root, 'staging'),
    outputDir: join(root, 'out'),
  };
  await mkdir(workspace.stagingDir);
  await mkdir(workspace.outputDir);

  return {
    ...workspace,
    config: loadConfig({ NODE_ENV: 'test', GHIDRA_DMG_CACHE_DIR: workspace.cacheDir, ...env }),
  };
}

/**
 * Unpacked release at <root>/ghidra_11.0_PUBLIC
 */
export async function createReleaseDirectory(root: string, files: FileMap = RELEASE_FILES): Promise<string> {
  const dir = join(root, RELEASE_DIR);
  await writeFiles(dir, files);
  return dir;
}

/**
 * Release zip at <root>/ghidra_11.0_PUBLIC_20240101.zip
 */
export async function createReleaseArchive(root: string, files: FileMap = RELEASE_FILES): Promise<string> {
  const entries: FileMap = {};
  for (const [path, content] of Object.entries(files)) {
    entries[`${RELEASE_DIR}/${path}`] = content;
  }
  const archive = join(root, `${RELEASE_DIR}_20240101.zip`);
  await writeFiles(root, { [`${RELEASE_DIR}_20240101.zip`]: fakeArchive(entries) });
  return archive;
}
