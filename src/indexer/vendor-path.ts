/**
 * Vendor directory location, shared by the loader (which pass to run) and
 * the extractor (provenance of each file).
 */

import { resolve, sep } from 'node:path';

import { VendorPathError } from '../errors/index.js';

export const DEFAULT_VENDOR_DIR = 'vendor';

/**
 * Resolve `<projectRoot>/<vendorDirName>` to an absolute path.
 *
 * @throws VendorPathError when the path cannot be resolved
 */
export function resolveVendorPath(projectRoot: string, vendorDirName = DEFAULT_VENDOR_DIR): string {
  try {
    return resolve(projectRoot, vendorDirName);
  } catch (error) {
    throw new VendorPathError(`${projectRoot}${sep}${vendorDirName}`, error);
  }
}

/**
 * Whether a file path lies inside the vendor directory.
 */
export function isVendoredPath(filePath: string, absVendorPath: string): boolean {
  return filePath.startsWith(absVendorPath + sep);
}
