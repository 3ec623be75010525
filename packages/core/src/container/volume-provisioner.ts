/**
 * VolumeProvisioner: numbers and creates throwaway world directories
 * (`tmp-mc-<n>`) under the volume root.
 *
 * Numbering is max existing + 1; gaps are never refilled. Creation is an
 * exclusive mkdir, so two provisioners racing on the same number cannot both
 * win; the loser re-scans and tries the next one.
 */

import { mkdir, readdir } from 'node:fs/promises';
import { join } from 'node:path';

export interface VolumeSlot {
  version: number;
  name: string;
  path: string;
}

const SLOT_RE = /^tmp-mc-(\d+)$/;
const MAX_CREATE_ATTEMPTS = 8;

export function slotName(version: number): string {
  return `tmp-mc-${version}`;
}

export function provisionNext(existingSlotNames: Iterable<string>, root: string): VolumeSlot {
  let max = 0;
  for (const name of existingSlotNames) {
    const match = SLOT_RE.exec(name);
    if (!match) continue;
    const version = Number.parseInt(match[1], 10);
    if (version > max) max = version;
  }

  const version = max + 1;
  const name = slotName(version);
  return { version, name, path: join(root, name) };
}

function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && 'code' in e;
}

/**
 * Scan `root`, create the next slot directory and return it.
 * The root is created if missing.
 */
export async function createNextSlot(root: string): Promise<VolumeSlot> {
  await mkdir(root, { recursive: true });

  for (let attempt = 1; attempt <= MAX_CREATE_ATTEMPTS; attempt++) {
    const slot = provisionNext(await readdir(root), root);
    try {
      await mkdir(slot.path);
      console.log(`[VolumeProvisioner] Created ${slot.path}`);
      return slot;
    } catch (e) {
      if (isErrnoException(e) && e.code === 'EEXIST') {
        console.warn(`[VolumeProvisioner] ${slot.name} claimed concurrently, rescanning (attempt ${attempt})`);
        continue;
      }
      throw e;
    }
  }

  throw new Error(`Could not claim a volume slot under ${root} after ${MAX_CREATE_ATTEMPTS} attempts`);
}
