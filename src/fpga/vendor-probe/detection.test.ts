/**
 * Vendor Tool Detection Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { accessSync, existsSync } from 'node:fs';
import { detectVendorProtocol, isExecutable } from './detection.js';

vi.mock('node:fs', () => ({
  existsSync: vi.fn(),
  accessSync: vi.fn(),
  constants: { X_OK: 1 },
}));

const INTEL = '/usr/bin/fpgainfo';
const XILINX = '/opt/xilinx/xrt/bin/xbutil';

describe('Vendor Tool Detection', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.mocked(accessSync).mockReset();
    vi.mocked(existsSync).mockReset();
  });

  describe('isExecutable', () => {
    it('should reject an empty path without touching the filesystem', () => {
      expect(isExecutable('')).toBe(false);
      expect(existsSync).not.toHaveBeenCalled();
    });

    it('should reject a file that is not executable', () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(accessSync).mockImplementation(() => {
        throw new Error('EACCES');
      });

      expect(isExecutable(INTEL)).toBe(false);
    });

    it('should check execute permission', () => {
      vi.mocked(existsSync).mockReturnValue(true);

      expect(isExecutable(INTEL)).toBe(true);
      expect(accessSync).toHaveBeenCalledWith(INTEL, 1);
    });
  });

  describe('detectVendorProtocol', () => {
    it('should prefer the Intel tool when both are installed', () => {
      vi.mocked(existsSync).mockReturnValue(true);

      expect(detectVendorProtocol(INTEL, XILINX)).toEqual({ vendor: 'intel', command: INTEL });
    });

    it('should fall back to the Xilinx tool', () => {
      vi.mocked(existsSync).mockImplementation(path => path === XILINX);

      expect(detectVendorProtocol(INTEL, XILINX)).toEqual({ vendor: 'xilinx', command: XILINX });
    });

    it('should report no vendor when neither tool is usable', () => {
      vi.mocked(existsSync).mockReturnValue(false);

      expect(detectVendorProtocol(INTEL, XILINX)).toEqual({ vendor: 'none' });
    });
  });
});
