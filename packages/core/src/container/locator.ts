/**
 * ContainerLocator: picks the newest `<version>-mc-<n>` instance out of a
 * container listing. Pure text parsing; the caller runs the listing.
 */

import { err, ok, type Result } from '../types/result.js';

export interface ContainerRecord {
  name: string;
  subversion: number;
}

export interface NotFound {
  kind: 'NotFound';
  targetVersion: string;
}

const INSTANCE_SUFFIX = '-mc-';

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function instanceName(versionTag: string, subversion: number): string {
  return `${versionTag}${INSTANCE_SUFFIX}${subversion}`;
}

/**
 * Scan `listingText` line by line for `<targetVersion>-mc-<integer>` and
 * return the record with the largest subversion. Ties keep the first
 * occurrence. Names embedded in a longer name (`x1193-mc-2`, `1193-mc-2b`)
 * do not match.
 */
export function findLatest(listingText: string, targetVersion: string): Result<ContainerRecord, NotFound> {
  const pattern = new RegExp(
    `(?:^|[\\s/,])(${escapeRegExp(targetVersion)}${INSTANCE_SUFFIX}(\\d+))(?=[\\s,]|$)`,
    'g',
  );

  let latest: ContainerRecord | undefined;
  for (const line of listingText.split(/\r?\n/)) {
    // A line may carry several comma-separated names
    for (const match of line.matchAll(pattern)) {
      const subversion = Number.parseInt(match[2], 10);
      if (!latest || subversion > latest.subversion) {
        latest = { name: match[1], subversion };
      }
    }
  }

  return latest ? ok(latest) : err({ kind: 'NotFound', targetVersion });
}
