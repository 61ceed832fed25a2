/**
 * Shared binary manifest used across parser, loader and query tests.
 */
import type { ManifestFixture } from './manifest-writer.js';

export const CHUNK_A = 'c0ffee00-1111-2222-3333-444444444444';
export const CHUNK_B = 'c0ffee00-5555-6666-7777-888888888888';

export const fixture: ManifestFixture = {
  meta: {
    appId: 7,
    appName: '32dbb6444ce14e9198129b746c0d056f',
    buildVersion: '1.4.30.0',
    launchExe: 'TheFalconeer.exe',
    buildId: 'test-build-id'
  },
  chunks: [
    { guid: CHUNK_A, hash: 0x0123456789abcdefn, sha: '356a192b7913b04c54574d18c28d46e6395428ab', windowSize: 1048576, fileSize: 400000n },
    { guid: CHUNK_B, hash: 0xfedcba9876543210n, sha: 'da4b9237bacccdf19c0760cab7aec4a8359010b0', windowSize: 1048576, fileSize: 300000n }
  ],
  files: [
    {
      filename: 'TheFalconeer.exe',
      sha: '77de68daecd823babbb58edb1c8e14d7106e83bb',
      parts: [{ guid: CHUNK_A, offset: 0, size: 650000 }]
    },
    {
      filename: 'TheFalconeer_Data/level0',
      sha: '1b6453892473a467d07372d45eb05abc2031647a',
      tags: ['base'],
      parts: [
        { guid: CHUNK_A, offset: 650000, size: 398576 },
        { guid: CHUNK_B, offset: 0, size: 200000 }
      ]
    },
    { filename: 'TheFalconeer_Data/readme.txt', parts: [{ guid: CHUNK_B, offset: 200000, size: 123 }] }
  ]
};
