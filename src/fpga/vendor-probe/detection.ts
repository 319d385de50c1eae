/**
 * Vendor Tool Detection
 *
 * Decides once, at setup, which vendor command-line tool answers
 * temperature and power queries.
 */

import { accessSync, constants, existsSync } from 'node:fs';

export type VendorProtocol =
  | { vendor: 'intel'; command: string }
  | { vendor: 'xilinx'; command: string }
  | { vendor: 'none' };

/**
 * Checks that a path exists and is executable by the current user
 */
export function isExecutable(path: string): boolean {
  if (!path || !existsSync(path)) {
    return false;
  }

  try {
    accessSync(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Picks the vendor protocol. Intel's `fpgainfo` wins when both tools are installed.
 */
export function detectVendorProtocol(intelCmd: string, xilinxCmd: string): VendorProtocol {
  if (isExecutable(intelCmd)) {
    return { vendor: 'intel', command: intelCmd };
  }
  if (isExecutable(xilinxCmd)) {
    return { vendor: 'xilinx', command: xilinxCmd };
  }
  return { vendor: 'none' };
}
