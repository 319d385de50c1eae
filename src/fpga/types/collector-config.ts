/**
 * Collector Configuration
 *
 * Settings consumed when the collector is constructed.
 */

export interface FpgaCollectorConfig {
  /** PostgreSQL connection URI */
  dsn: string;
  /** Path to the Intel `fpgainfo` executable */
  intelCmd: string;
  /** Path to the Xilinx `xbutil` executable */
  xilinxCmd: string;
  /** Sample temperature and power through the vendor tool */
  checkTempPower: boolean;
  /** Report PU utilisation and DDR transfer statistics */
  puDdrStatsEnable: boolean;
  /** Reporting interval in seconds */
  updateEvery: number;
}
