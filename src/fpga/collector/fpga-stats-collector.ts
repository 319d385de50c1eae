/**
 * FPGA Stats Collector
 *
 * Host-facing plugin: builds the chart layout at setup, keeps temperature
 * and power sampling running in the background, and on every tick merges
 * those readings with one query against `swarm64da.get_fpga_stats()`.
 */

import { createSubsystemLogger } from '../../logging/subsystem.js';
import { CollectorStateError } from '../errors.js';
import {
  DeviceIdentityMapper,
  MetricRegistry,
  TOTAL_DEVICE,
  deviceName,
  formatSeriesKey,
  seriesKey,
} from '../metrics/index.js';
import { SamplingLoop, samplingIntervalFor } from '../sampling-loop/index.js';
import {
  VendorProbe,
  detectVendorProtocol,
  shellCommandRunner,
  type CommandRunner,
  type ProbeKind,
  type VendorProtocol,
} from '../vendor-probe/index.js';
import {
  COUNT_DEVICES_SQL,
  ENSURE_EXTENSION_SQL,
  FETCH_STATS_SQL,
  createPgStatsClient,
  toMetricValue,
  type StatsClient,
  type StatsClientFactory,
  type StatsResult,
} from './stats-client.js';
import type { ChartDefinition, FpgaCollectorConfig, Snapshot } from '../types/index.js';

export interface FpgaStatsCollectorDependencies {
  clientFactory: StatsClientFactory;
  commandRunner: CommandRunner;
  detectProtocol: (intelCmd: string, xilinxCmd: string) => VendorProtocol;
}

/** Column carrying the database's own device identifier */
const DEVICE_ID_COLUMN = 'fpga_id';
/** Identifier assumed when the stats view has no device column */
const DEFAULT_DEVICE_ID = '0';

export class FpgaStatsCollector {
  private readonly logger = createSubsystemLogger('fpga/collector');
  private readonly dependencies: FpgaStatsCollectorDependencies;
  private readonly mapper = new DeviceIdentityMapper();
  private registry?: MetricRegistry;
  private client?: StatsClient;
  private probe?: VendorProbe;
  private setupPromise?: Promise<void>;
  private readonly loops = new Map<ProbeKind, SamplingLoop>();
  private deviceCount = 1;

  constructor(
    private readonly config: FpgaCollectorConfig,
    dependencies: Partial<FpgaStatsCollectorDependencies> = {},
  ) {
    this.dependencies = {
      clientFactory: createPgStatsClient,
      commandRunner: shellCommandRunner,
      detectProtocol: detectVendorProtocol,
      ...dependencies,
    };
  }

  /**
   * Reports whether the collector can run. The data source is checked by setup.
   */
  check(): boolean {
    return true;
  }

  get devices(): number {
    return this.deviceCount;
  }

  get vendorProtocol(): VendorProtocol | undefined {
    return this.probe?.protocol;
  }

  /** Chart ids in reporting order */
  get order(): string[] {
    return this.registry?.order ?? [];
  }

  get definitions(): readonly ChartDefinition[] {
    return this.registry?.definitions ?? [];
  }

  /** Sampling loop for a probe kind, when one is running */
  getSamplingLoop(kind: ProbeKind): SamplingLoop | undefined {
    return this.loops.get(kind);
  }

  /**
   * Counts the devices, builds the chart layout and starts background sampling.
   * Repeated calls share the first run; a failed run may be retried.
   */
  setup(): Promise<void> {
    if (!this.setupPromise) {
      this.setupPromise = this.runSetup().catch((error: unknown) => {
        this.setupPromise = undefined;
        throw error;
      });
    }
    return this.setupPromise;
  }

  private async runSetup(): Promise<void> {
    this.deviceCount = await this.withConnection(async client => {
      await client.query(ENSURE_EXTENSION_SQL);
      const result = await client.query(COUNT_DEVICES_SQL);
      return countDevices(result);
    });

    this.probe = new VendorProbe(
      this.dependencies.detectProtocol(this.config.intelCmd, this.config.xilinxCmd),
      this.dependencies.commandRunner,
    );

    const registry = new MetricRegistry();
    registry.registerLayout({
      deviceCount: this.deviceCount,
      puDdrStats: this.config.puDdrStatsEnable,
      tempPower: this.config.checkTempPower,
    });
    this.registry = registry;

    this.logger.info('Collector set up', {
      devices: this.deviceCount,
      vendor: this.probe.protocol.vendor,
      tempPower: this.config.checkTempPower,
      puDdrStats: this.config.puDdrStatsEnable,
    });

    if (this.config.checkTempPower) {
      this.startSampling(this.probe);
    }
  }

  /**
   * Runs one collection cycle. A failure drops the connection so the next
   * cycle reconnects, then rethrows.
   */
  async collect(): Promise<Snapshot> {
    const registry = this.registry;
    if (!registry) {
      throw new CollectorStateError('collect() called before setup()');
    }

    const snapshot = registry.createDefaultSnapshot();
    if (this.config.checkTempPower) {
      this.copyReadings(snapshot);
    }

    return this.withConnection(async client => {
      await client.query(ENSURE_EXTENSION_SQL);
      const result = await client.query(FETCH_STATS_SQL);
      this.mergeStats(registry, snapshot, result);
      return snapshot;
    });
  }

  /**
   * Stops background sampling and closes the connection
   */
  async stop(): Promise<void> {
    for (const loop of this.loops.values()) {
      loop.stop();
    }
    this.loops.clear();
    await this.dropConnection();
  }

  private startSampling(probe: VendorProbe): void {
    if (!probe.available) {
      this.logger.warn('No executable vendor tool found, temperature and power will read zero', {
        intelCmd: this.config.intelCmd,
        xilinxCmd: this.config.xilinxCmd,
      });
      return;
    }

    const interval = samplingIntervalFor(this.config.updateEvery);
    for (const kind of ['temperature', 'power'] as const) {
      const loop = new SamplingLoop({
        kind,
        deviceCount: this.deviceCount,
        interval,
        sample: (probeKind, index) => probe.read(probeKind, index),
      });
      this.loops.set(kind, loop);
      loop.start();
    }
  }

  private copyReadings(snapshot: Snapshot): void {
    for (const [kind, loop] of this.loops) {
      const readings = loop.getReadings();
      for (let index = 0; index < this.deviceCount; index++) {
        snapshot[formatSeriesKey(seriesKey(deviceName(index), kind))] = readings[index] ?? 0;
      }
    }
  }

  private mergeStats(registry: MetricRegistry, snapshot: Snapshot, result: StatsResult): void {
    const columns = result.fields.map(field => field.name);
    const hasDeviceColumn = columns.includes(DEVICE_ID_COLUMN);

    for (const row of result.rows) {
      const rawId = hasDeviceColumn ? row[DEVICE_ID_COLUMN] : undefined;
      const device = this.mapper.resolve(
        rawId === undefined || rawId === null ? DEFAULT_DEVICE_ID : String(rawId),
      );

      for (const column of columns) {
        const key = registry.lookup(device, column);
        if (!key) {
          continue;
        }

        const value = toMetricValue(row[column]);
        if (value === undefined) {
          continue;
        }
        snapshot[formatSeriesKey(key)] = value;

        if (this.deviceCount > 1) {
          this.accumulateTotal(registry, snapshot, column, value);
        }
      }
    }
  }

  /**
   * Adds a device value to its `fpga-total` series: percentages are
   * averaged over the device count, everything else is summed
   */
  private accumulateTotal(registry: MetricRegistry, snapshot: Snapshot, column: string, value: number): void {
    const totalKey = registry.lookup(TOTAL_DEVICE, column);
    if (!totalKey) {
      return;
    }

    const id = formatSeriesKey(totalKey);
    const share = column.includes('percent') ? value / this.deviceCount : value;
    snapshot[id] = (snapshot[id] ?? 0) + share;
  }

  private async withConnection<T>(work: (client: StatsClient) => Promise<T>): Promise<T> {
    try {
      const client = await this.connect();
      return await work(client);
    } catch (error) {
      this.logger.error('Stats query failed, dropping connection', {
        error: error instanceof Error ? error.message : String(error),
      });
      await this.dropConnection();
      throw error;
    }
  }

  private async connect(): Promise<StatsClient> {
    if (this.client) {
      return this.client;
    }

    const client = this.dependencies.clientFactory(this.config.dsn);
    await client.connect();
    this.client = client;
    this.logger.debug('Connected to stats database');
    return client;
  }

  private async dropConnection(): Promise<void> {
    const client = this.client;
    this.client = undefined;
    if (!client) {
      return;
    }

    try {
      await client.end();
    } catch (error) {
      this.logger.debug('Error closing stats connection', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

function countDevices(result: StatsResult): number {
  const [row] = result.rows;
  const [field] = result.fields;
  const count = row && field ? toMetricValue(row[field.name]) : undefined;
  return count === undefined ? 0 : Math.trunc(count);
}
