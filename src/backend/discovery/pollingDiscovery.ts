import { DEFAULT_POLLING, type PollingConfig } from "../../config.js";
import type { Logger } from "../../logger.js";
import { createDeferred, errorMessage, KeyedLock, TimeoutError, withTimeout } from "../../utils.js";
import type { Device } from "../devices/types.js";
import { DeviceListNotifier, type DeviceListener } from "./deviceListNotifier.js";
import { applyFilter, type DeviceDiscovery, type DiscoverDevicesOptions } from "./discovery.js";
import type { DiscoveryFilter } from "./filters.js";

export interface PollingDiscoveryOptions {
  logger: Logger;
  polling?: Partial<PollingConfig>;
}

const POPULATE_LOCK_KEY = "populate";

/**
 * A {@link DeviceDiscovery} that caches the device list and keeps it fresh
 * with a background poll.
 *
 * Subclasses supply {@link pollingGetDevices}, a raw enumeration bounded by an
 * optional timeout. The cache starts empty, is populated by the first query,
 * and is replaced only by {@link discoverDevices} or a poll. Elapsed time alone
 * never triggers a refresh.
 *
 * Lifecycle: idle → {@link startPolling} (first poll after
 * `initialIntervalMs`, unbounded) → steady (a poll every `steadyIntervalMs`,
 * each bounded by `tickTimeoutMs`) → {@link dispose}.
 */
export abstract class PollingDeviceDiscovery implements DeviceDiscovery {
  public readonly name: string;
  public abstract readonly supportsPlatform: boolean;
  public abstract readonly canListAnything: boolean;
  public readonly wellKnownIds: readonly string[] = [];

  protected readonly logger: Logger;
  private readonly polling: PollingConfig;
  private readonly notifier = new DeviceListNotifier();
  // Only the first population is serialized. Scans and polls run
  // unlocked, each bounded by its own timeout.
  private readonly populateLock = new KeyedLock();
  private readonly populatedSignal = createDeferred<void>();
  private populating = false;
  // Each enumeration takes a generation; a result older than the cache is dropped.
  private nextGeneration = 0;
  private cacheGeneration = -1;
  private timer: NodeJS.Timeout | null = null;
  private pollingActive = false;
  private disposed = false;

  protected constructor(name: string, options: PollingDiscoveryOptions) {
    this.name = name;
    this.logger = options.logger;
    this.polling = { ...DEFAULT_POLLING, ...options.polling };
  }

  /**
   * Enumerate devices now. Implementations should stop waiting once
   * `timeoutMs` elapses; the engine also enforces the budget.
   */
  protected abstract pollingGetDevices(timeoutMs?: number): Promise<Device[]>;

  public async getDiagnostics(): Promise<string[]> {
    return [];
  }

  /** True once the cache has been filled by a query, scan or poll. */
  public get hasPopulated(): boolean {
    return this.populatedSignal.settled;
  }

  public get isPolling(): boolean {
    return this.pollingActive;
  }

  /**
   * Cached devices, filtered. The first call populates the cache with one
   * unbounded enumeration; callers that arrive meanwhile share its result.
   * A scan or poll that fills the cache first releases them early.
   */
  public async devices(filter?: DiscoveryFilter): Promise<Device[]> {
    if (!this.hasPopulated) {
      const population = this.populateLock.withLock(POPULATE_LOCK_KEY, async () => {
        if (this.hasPopulated) return;
        this.populating = true;
        try {
          await this.enumerateInto(undefined);
        } finally {
          this.populating = false;
        }
      });
      await Promise.race([population, this.populatedSignal.promise]);
    }
    return applyFilter(this.notifier.items, filter);
  }

  /**
   * Re-enumerate, replace the cache, then filter. A scan that exceeds
   * `timeoutMs` leaves the cache untouched.
   */
  public async discoverDevices(options: DiscoverDevicesOptions = {}): Promise<Device[]> {
    await this.enumerateInto(options.timeoutMs);
    return applyFilter(this.notifier.items, options.filter);
  }

  /**
   * Run one polling pass now. Timeouts are absorbed; other errors reject.
   */
  public async poll(timeoutMs?: number): Promise<void> {
    await this.enumerateInto(timeoutMs);
  }

  public onAdded(listener: DeviceListener): () => void {
    return this.notifier.onAdded(listener);
  }

  public onRemoved(listener: DeviceListener): () => void {
    return this.notifier.onRemoved(listener);
  }

  public startPolling(): void {
    if (this.pollingActive || this.disposed) {
      return;
    }
    this.pollingActive = true;
    // The first poll runs soon and unbounded so presence is established quickly.
    this.schedule(this.polling.initialIntervalMs, undefined);
  }

  public stopPolling(): void {
    this.pollingActive = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  public dispose(): void {
    this.disposed = true;
    this.stopPolling();
  }

  public toString(): string {
    return `${this.name} device discovery`;
  }

  private schedule(delayMs: number, tickTimeoutMs: number | undefined): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.tick(tickTimeoutMs)
        .catch((err: unknown) => {
          this.logger.debug(`${this.name}: poll failed`, { error: errorMessage(err) });
        })
        .finally(() => {
          // Later polls wait longer and are bounded.
          if (this.pollingActive && !this.disposed) {
            this.schedule(this.polling.steadyIntervalMs, this.polling.tickTimeoutMs);
          }
        });
    }, delayMs);
  }

  private async tick(timeoutMs: number | undefined): Promise<void> {
    // The first tick is unbounded; it defers to a population already running.
    if (timeoutMs === undefined && this.populating) {
      this.logger.trace(`${this.name}: population in flight; skipping first poll`);
      return;
    }
    await this.poll(timeoutMs);
  }

  private async enumerateInto(timeoutMs: number | undefined): Promise<void> {
    const generation = this.nextGeneration++;
    let devices: Device[];
    try {
      devices = await withTimeout(this.pollingGetDevices(timeoutMs), timeoutMs, `${this.name} enumeration`);
    } catch (err) {
      if (err instanceof TimeoutError) {
        this.logger.trace(`${this.name}: enumeration timed out; keeping cached devices`, {
          timeoutMs: err.timeoutMs,
        });
        return;
      }
      throw err;
    }
    if (this.disposed || generation < this.cacheGeneration) {
      return;
    }
    this.cacheGeneration = generation;
    this.notifier.updateWithNewList(devices);
    this.populatedSignal.resolve();
  }
}
