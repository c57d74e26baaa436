import type { Device } from "../devices/types.js";

export type DeviceListener = (device: Device) => void;

/**
 * Holds a backend's cached device list and reports membership changes.
 *
 * Membership is keyed by device id: a device present in both the old and the
 * new list is replaced silently, whatever else about it changed.
 */
export class DeviceListNotifier {
  private current: Device[];
  private readonly addedListeners = new Set<DeviceListener>();
  private readonly removedListeners = new Set<DeviceListener>();

  public constructor(initial: readonly Device[] = []) {
    this.current = [...initial];
  }

  public get items(): readonly Device[] {
    return this.current;
  }

  /** Subscribe to added devices; returns an unsubscribe function. */
  public onAdded(listener: DeviceListener): () => void {
    this.addedListeners.add(listener);
    return () => {
      this.addedListeners.delete(listener);
    };
  }

  /** Subscribe to removed devices; returns an unsubscribe function. */
  public onRemoved(listener: DeviceListener): () => void {
    this.removedListeners.add(listener);
    return () => {
      this.removedListeners.delete(listener);
    };
  }

  /**
   * Replace the list and notify: one `added` per new id, one `removed` per
   * vanished id.
   */
  public updateWithNewList(devices: readonly Device[]): void {
    const previous = this.current;
    this.current = [...devices];

    const previousIds = new Set(previous.map((d) => d.id));
    const nextIds = new Set(devices.map((d) => d.id));

    for (const device of devices) {
      if (!previousIds.has(device.id)) {
        this.emit(this.addedListeners, device);
      }
    }
    for (const device of previous) {
      if (!nextIds.has(device.id)) {
        this.emit(this.removedListeners, device);
      }
    }
  }

  private emit(listeners: ReadonlySet<DeviceListener>, device: Device): void {
    // Copy so a listener may unsubscribe while being notified.
    for (const listener of [...listeners]) {
      listener(device);
    }
  }
}
