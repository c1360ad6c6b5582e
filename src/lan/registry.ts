import type { Logger } from "../util/logger.js";
import { ON_OFF_CAPABILITIES, type CapabilityLookup } from "./capabilities.js";
import { LanDevice, type DeviceCommands } from "./device.js";

/** Return false to ignore a newly seen device. Ignored for known devices. */
export type DiscoveredHandler = (device: LanDevice, isNew: boolean) => boolean;
export type EvictedHandler = (device: LanDevice) => void;

export type ScanIdentity = {
  fingerprint: string;
  ip: string;
  sku: string;
};

export type UpsertResult = {
  device: LanDevice;
  isNew: boolean;
  /** False only when a new device was rejected by the discovered handler. */
  accepted: boolean;
};

export type RegistryDeps = {
  commands: DeviceCommands;
  log: Logger;
  now?: () => number;
};

/**
 * Known devices keyed by fingerprint, plus the queue of manually added
 * addresses that have not answered a scan yet.
 */
export class DeviceRegistry {
  private readonly devices = new Map<string, LanDevice>();
  private readonly queue = new Set<string>();
  private readonly deps: RegistryDeps;

  constructor(deps: RegistryDeps) {
    this.deps = deps;
  }

  // ---- discovered devices ----

  upsertFromScan(
    scan: ScanIdentity,
    lookup: CapabilityLookup,
    onDiscovered?: DiscoveredHandler | null,
  ): UpsertResult {
    const { log } = this.deps;
    const known = this.devices.get(scan.fingerprint);

    if (known) {
      if (known.ip !== scan.ip) {
        log.info(`device ${known.fingerprint} moved from ${known.ip} to ${scan.ip}`);
        known.updateIp(scan.ip);
      }
      known.touch();
      this.claimQueuedAddress(known);
      onDiscovered?.(known, false);
      return { device: known, isNew: false, accepted: true };
    }

    let capabilities = lookup(scan.sku);
    if (!capabilities) {
      log.warn(`device model ${scan.sku} is not supported, only power control is available`);
      capabilities = ON_OFF_CAPABILITIES;
    }

    const device = new LanDevice({
      fingerprint: scan.fingerprint,
      ip: scan.ip,
      sku: scan.sku,
      capabilities,
      commands: this.deps.commands,
      now: this.deps.now,
    });
    if (this.queue.has(device.ip)) device.markManual();

    const accepted = onDiscovered ? onDiscovered(device, true) : true;
    if (!accepted) {
      device.detach();
      return { device, isNew: true, accepted: false };
    }

    this.devices.set(device.fingerprint, device);
    this.claimQueuedAddress(device);
    return { device, isNew: true, accepted: true };
  }

  private claimQueuedAddress(device: LanDevice): void {
    if (this.queue.delete(device.ip)) device.markManual();
  }

  /** Removes every device not seen for at least `timeoutMs`. */
  evict(nowMs: number, timeoutMs: number, onEvicted?: EvictedHandler | null): LanDevice[] {
    const evicted: LanDevice[] = [];
    for (const device of [...this.devices.values()]) {
      if (nowMs - device.lastSeen < timeoutMs) continue;
      device.detach();
      this.devices.delete(device.fingerprint);
      this.deps.log.debug(`device evicted: ${device}`);
      evicted.push(device);
      onEvicted?.(device);
    }
    return evicted;
  }

  remove(device: LanDevice | string): LanDevice | undefined {
    const fingerprint = typeof device === "string" ? device : device.fingerprint;
    const removed = this.devices.get(fingerprint);
    if (!removed) return undefined;
    removed.detach();
    this.devices.delete(fingerprint);
    return removed;
  }

  clear(): void {
    for (const device of this.devices.values()) device.detach();
    this.devices.clear();
    this.queue.clear();
  }

  list(): LanDevice[] {
    return [...this.devices.values()];
  }

  get manualDevices(): LanDevice[] {
    return this.list().filter((d) => d.isManual);
  }

  get size(): number {
    return this.devices.size;
  }

  getByFingerprint(fingerprint: string): LanDevice | undefined {
    return this.devices.get(fingerprint);
  }

  getByIp(ip: string): LanDevice | undefined {
    return this.list().find((d) => d.ip === ip);
  }

  getBySku(sku: string): LanDevice | undefined {
    return this.list().find((d) => d.sku === sku);
  }

  // ---- manual address queue ----

  /** Returns false when the address is already queued or already a manual device. */
  addToQueue(ip: string): boolean {
    if (this.queue.has(ip)) return false;
    if (this.list().some((d) => d.isManual && d.ip === ip)) return false;
    this.queue.add(ip);
    return true;
  }

  removeFromQueue(ip: string): boolean {
    return this.queue.delete(ip);
  }

  get queued(): ReadonlySet<string> {
    return this.queue;
  }

  get hasQueued(): boolean {
    return this.queue.size > 0;
  }
}
