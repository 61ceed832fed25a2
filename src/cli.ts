#!/usr/bin/env node
/**
 * Game Manifest Parser - CLI Interface
 *
 * Command-line interface for inspecting binary and JSON build manifests.
 */

import { Command } from 'commander';
import { resolve } from 'node:path';
import { parseManifestAsync } from './manifest-loader.js';
import { computeManifestSizes, filesWithInstallTag, toSerializableManifest } from './manifest-utils.js';
import type { Manifest } from './types/manifest.js';
import type { ManifestWarning, ParseOptions } from './types/warnings.js';

const program = new Command();

const version = '0.1.0';

interface ReadFlags {
  readonly strict?: boolean;
  readonly verbose?: boolean;
}

function parseOptionsFrom(flags: ReadFlags): ParseOptions {
  return {
    strict: flags.strict === true,
    ...(flags.verbose === true ? { logger: console } : {})
  };
}

function formatBytes(bytes: bigint): string {
  const gib = Number(bytes) / 1024 / 1024 / 1024;
  return `${bytes.toLocaleString()} bytes (${gib.toFixed(2)} GiB)`;
}

function printWarnings(warnings: readonly ManifestWarning[]): void {
  for (const warning of warnings) {
    console.warn(`⚠️  [${warning.code}] ${warning.message}`);
  }
}

function printSummary(file: string, manifest: Manifest): void {
  const sizes = computeManifestSizes(manifest);
  console.log(`Manifest: ${file}`);
  console.log(`  Format: ${manifest.format} (version ${manifest.header.version})`);
  if (manifest.meta) {
    console.log(`  App name: ${manifest.meta.appName}`);
    console.log(`  Build version: ${manifest.meta.buildVersion}`);
    console.log(`  Launch exe: ${manifest.meta.launchExe}`);
    if (manifest.meta.buildId !== undefined) {
      console.log(`  Build ID: ${manifest.meta.buildId}`);
    }
  }
  console.log(`  Chunks: ${sizes.chunkCount}`);
  console.log(`  Files: ${sizes.fileCount}`);
  console.log(`  Download size: ${formatBytes(sizes.downloadSize)}`);
  console.log(`  Installed size: ${formatBytes(sizes.installedSize)}`);
  if (manifest.integrity) {
    const verdict = manifest.integrity.sha1Matches && manifest.integrity.complete ? 'ok' : 'FAILED';
    console.log(`  Integrity: ${verdict} (${manifest.integrity.actualSize}/${manifest.integrity.expectedSize} bytes)`);
  }
}

program
  .name('manifest-parser')
  .description('Decode game build manifests (binary or JSON)')
  .version(version);

program
  .command('inspect')
  .description('Print a summary of a manifest file')
  .argument('<file>', 'Path to the manifest file')
  .option('--json', 'Print the decoded manifest as JSON')
  .option('--strict', 'Fail when the payload hash or size does not match the header')
  .option('--verbose', 'Log decoding progress')
  .action(async (file: string, options: ReadFlags & { json?: boolean }) => {
    try {
      const manifest = await parseManifestAsync(resolve(file), parseOptionsFrom(options));

      if (options.json) {
        console.log(JSON.stringify(toSerializableManifest(manifest), null, 2));
        return;
      }

      printSummary(file, manifest);
      printWarnings(manifest.warnings);

    } catch (error) {
      console.error('❌ Inspect failed:', error instanceof Error ? error.message : String(error));
      process.exit(1);
    }
  });

program
  .command('files')
  .description('List the files described by a manifest')
  .argument('<file>', 'Path to the manifest file')
  .option('--tag <tag>', 'Only list files installed with this tag')
  .option('--strict', 'Fail when the payload hash or size does not match the header')
  .action(async (file: string, options: ReadFlags & { tag?: string }) => {
    try {
      const manifest = await parseManifestAsync(resolve(file), parseOptionsFrom(options));
      const files = options.tag !== undefined ? filesWithInstallTag(manifest, options.tag) : manifest.fileList?.fileManifestList ?? [];

      for (const entry of files) {
        const unresolved = entry.hasUnresolvedChunkParts ? ' (unresolved chunks)' : '';
        console.log(`${entry.fileSize.toString().padStart(14)}  ${entry.chunkParts.length.toString().padStart(5)}  ${entry.filename}${unresolved}`);
      }

      console.log('');
      console.log(`${files.length} files`);
      printWarnings(manifest.warnings);

    } catch (error) {
      console.error('❌ Listing failed:', error instanceof Error ? error.message : String(error));
      process.exit(1);
    }
  });

await program.parseAsync();
