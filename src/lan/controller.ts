import type { RemoteInfo } from "node:dgram";
import { childLogger, createLogger, type Logger } from "../util/logger.js";
import { hasFeature, LightFeature, lookupCapabilities, type CapabilityLookup } from "./capabilities.js";
import {
  CommandExecutor,
  verifyBrightness,
  verifyColor,
  verifyPower,
} from "./command-executor.js";
import type { DeviceCommands, LanDevice } from "./device.js";
import {
  brightnessMessage,
  clampBrightness,
  clampRgb,
  clampTemperature,
  colorMessage,
  decodeMessage,
  encodeMessage,
  hexMessage,
  onOffMessage,
  scanMessage,
  sceneMessage,
  segmentColorMessage,
  statusMessage,
  type OutboundMessage,
  type ScanResponse,
  type StatusResponse,
} from "./messages.js";
import { DeviceRegistry, type DiscoveredHandler, type EvictedHandler } from "./registry.js";
import { TransportManager, type UdpSocket } from "./transport.js";
import type { ColorTarget, CommandOutcome, Rgb } from "./types.js";
import { WILDCARD_ADDRESS } from "./types.js";

export const BROADCAST_ADDRESS = "239.255.255.250";
export const BROADCAST_PORT = 4001;
export const LISTENING_PORT = 4002;
export const COMMAND_PORT = 4003;

export const DISCOVERY_INTERVAL_MS = 10_000;
export const EVICT_INTERVAL_MS = DISCOVERY_INTERVAL_MS * 3;
export const UPDATE_INTERVAL_MS = 5_000;

export const UNKNOWN_SKU = "unknown";

export type LanControllerOptions = {
  listenAddresses?: string[];
  listenPort?: number;
  commandPort?: number;
  broadcastAddress?: string;
  broadcastPort?: number;
  /** One per listening address; enables precise subnet matching. */
  networkMasks?: string[];
  discoveryEnabled?: boolean;
  discoveryIntervalMs?: number;
  /** Evicts devices not seen for `evictIntervalMs`, checked after each scan response. */
  evictEnabled?: boolean;
  evictIntervalMs?: number;
  updateEnabled?: boolean;
  updateIntervalMs?: number;
  onDiscovered?: DiscoveredHandler | null;
  onEvicted?: EvictedHandler | null;
  capabilities?: CapabilityLookup;
  maxRetries?: number;
  log?: Logger;
  now?: () => number;
  createSocket?: () => UdpSocket;
};

/**
 * Controls the lights reachable from the configured local addresses:
 * discovery, eviction, status polling, inbound dispatch and commands.
 */
export class LanController implements DeviceCommands {
  private readonly log: Logger;
  private readonly now: () => number;
  private readonly transport: TransportManager;
  private readonly registry: DeviceRegistry;
  private readonly executor: CommandExecutor;
  private readonly capabilities: CapabilityLookup;
  private readonly commandPort: number;
  private readonly broadcastPort: number;

  private discoveryEnabled: boolean;
  private discoveryIntervalMs: number;
  private evictEnabled: boolean;
  private readonly evictIntervalMs: number;
  private updateEnabled: boolean;
  private readonly updateIntervalMs: number;
  private onDiscovered: DiscoveredHandler | null;
  private onEvicted: EvictedHandler | null;

  private discoveryTimer: ReturnType<typeof setTimeout> | null = null;
  private updateTimer: ReturnType<typeof setTimeout> | null = null;
  private running = false;

  constructor(opts: LanControllerOptions = {}) {
    this.log = opts.log ?? createLogger("lan");
    this.now = opts.now ?? Date.now;
    this.capabilities = opts.capabilities ?? lookupCapabilities;
    this.commandPort = opts.commandPort ?? COMMAND_PORT;
    this.broadcastPort = opts.broadcastPort ?? BROADCAST_PORT;

    this.discoveryEnabled = opts.discoveryEnabled ?? false;
    this.discoveryIntervalMs = opts.discoveryIntervalMs ?? DISCOVERY_INTERVAL_MS;
    this.evictEnabled = opts.evictEnabled ?? false;
    this.evictIntervalMs = opts.evictIntervalMs ?? EVICT_INTERVAL_MS;
    this.updateEnabled = opts.updateEnabled ?? true;
    this.updateIntervalMs = opts.updateIntervalMs ?? UPDATE_INTERVAL_MS;
    this.onDiscovered = opts.onDiscovered ?? null;
    this.onEvicted = opts.onEvicted ?? null;

    this.transport = new TransportManager({
      listenAddresses: opts.listenAddresses ?? [WILDCARD_ADDRESS],
      listenPort: opts.listenPort ?? LISTENING_PORT,
      broadcastAddress: opts.broadcastAddress ?? BROADCAST_ADDRESS,
      broadcastPort: this.broadcastPort,
      networkMasks: opts.networkMasks,
      log: childLogger(this.log, "transport"),
      onMessage: (data, sender) => this.handleDatagram(data, sender),
      createSocket: opts.createSocket,
    });
    this.registry = new DeviceRegistry({
      commands: this,
      log: childLogger(this.log, "registry"),
      now: this.now,
    });
    this.executor = new CommandExecutor({
      send: (device, message) => this.send(device, message),
      log: childLogger(this.log, "commands"),
      maxRetries: opts.maxRetries,
    });
  }

  // ---- lifecycle ----

  async start(): Promise<void> {
    await this.transport.start();
    this.running = true;
    if (this.discoveryEnabled || this.registry.hasQueued) this.triggerDiscovery();
    if (this.updateEnabled) this.pollAll();
  }

  /**
   * Stops both timers, cancels running command sequences, closes every
   * endpoint and clears the registry. Resolves once all endpoints report
   * that they are closed.
   */
  async cleanup(): Promise<void> {
    this.running = false;
    this.discoveryEnabled = false;
    this.updateEnabled = false;
    this.clearDiscoveryTimer();
    this.clearUpdateTimer();
    const cancelled = this.executor.cancelAll();
    const closed = this.transport.close();
    this.registry.clear();
    await Promise.all([cancelled, closed]);
  }

  // ---- discovery ----

  get isDiscoveryEnabled(): boolean {
    return this.discoveryEnabled;
  }

  setDiscoveryEnabled(enabled: boolean): void {
    if (this.discoveryEnabled === enabled) return;
    this.discoveryEnabled = enabled;
    if (enabled) this.triggerDiscovery();
    else this.clearDiscoveryTimer();
  }

  get discoveryInterval(): number {
    return this.discoveryIntervalMs;
  }

  /** Takes effect from the next reschedule. */
  setDiscoveryInterval(ms: number): void {
    this.discoveryIntervalMs = ms;
  }

  get isEvictEnabled(): boolean {
    return this.evictEnabled;
  }

  setEvictEnabled(enabled: boolean): void {
    this.evictEnabled = enabled;
  }

  /** Replaces the discovered handler and returns the previous one. */
  setDiscoveredHandler(handler: DiscoveredHandler | null): DiscoveredHandler | null {
    const previous = this.onDiscovered;
    this.onDiscovered = handler;
    return previous;
  }

  /** Replaces the evicted handler and returns the previous one. */
  setEvictedHandler(handler: EvictedHandler | null): EvictedHandler | null {
    const previous = this.onEvicted;
    this.onEvicted = handler;
    return previous;
  }

  addToDiscoveryQueue(ip: string): boolean {
    const added = this.registry.addToQueue(ip);
    if (added && this.discoveryTimer === null) this.triggerDiscovery();
    return added;
  }

  removeFromDiscoveryQueue(ip: string): boolean {
    return this.registry.removeFromQueue(ip);
  }

  get discoveryQueue(): ReadonlySet<string> {
    return this.registry.queued;
  }

  triggerDiscovery(): void {
    this.clearDiscoveryTimer();
    if (!this.running) return;

    const scan = encodeMessage(scanMessage());
    let reschedule = false;

    if (this.discoveryEnabled) {
      this.transport.broadcast(scan);
      reschedule = true;
    }
    for (const ip of this.registry.queued) {
      this.transport.sendTo(scan, ip, this.broadcastPort);
      reschedule = true;
    }
    // Manual devices may have moved; keep confirming them.
    for (const device of this.registry.manualDevices) {
      this.transport.sendTo(scan, device.ip, this.broadcastPort);
      reschedule = true;
    }

    if (reschedule) {
      this.discoveryTimer = setTimeout(() => this.triggerDiscovery(), this.discoveryIntervalMs);
    }
  }

  private clearDiscoveryTimer(): void {
    if (this.discoveryTimer) clearTimeout(this.discoveryTimer);
    this.discoveryTimer = null;
  }

  // ---- status polling ----

  get isUpdateEnabled(): boolean {
    return this.updateEnabled;
  }

  setUpdateEnabled(enabled: boolean): void {
    if (this.updateEnabled === enabled) return;
    this.updateEnabled = enabled;
    if (enabled) this.pollAll();
    else this.clearUpdateTimer();
  }

  pollAll(): void {
    this.clearUpdateTimer();
    if (!this.running) return;

    const status = encodeMessage(statusMessage());
    for (const device of this.registry.list()) {
      this.transport.sendTo(status, device.ip, this.commandPort);
    }
    if (this.updateEnabled) {
      this.updateTimer = setTimeout(() => this.pollAll(), this.updateIntervalMs);
    }
  }

  private clearUpdateTimer(): void {
    if (this.updateTimer) clearTimeout(this.updateTimer);
    this.updateTimer = null;
  }

  // ---- inbound ----

  handleDatagram(data: Buffer, sender: Pick<RemoteInfo, "address" | "port">): void {
    const message = decodeMessage(data);
    if (!message) {
      this.log.warn(`unknown message from ${sender.address}:${sender.port}: ${data.subarray(0, 50).toString("utf8")}`);
      return;
    }
    if (message.cmd === "scan") this.handleScanResponse(message);
    else this.handleStatusResponse(message, sender.address);
  }

  private handleScanResponse(message: ScanResponse): void {
    const { device: fingerprint, ip } = message;
    if (!fingerprint || !ip) {
      this.log.warn(`scan response without ${fingerprint ? "ip" : "device id"} dropped`);
      return;
    }

    const result = this.registry.upsertFromScan(
      { fingerprint, ip, sku: message.sku ?? UNKNOWN_SKU },
      this.capabilities,
      this.onDiscovered,
    );
    if (result.isNew) {
      this.log.debug(`device ${result.accepted ? "discovered" : "ignored"}: ${result.device}`);
    } else {
      this.log.debug(`device refreshed: ${result.device}`);
    }

    if (this.evictEnabled) this.evict();
  }

  private handleStatusResponse(message: StatusResponse, senderIp: string): void {
    const device = this.registry.getByIp(senderIp);
    if (!device) {
      this.log.debug(`status from unknown address ${senderIp} ignored`);
      return;
    }
    device.applyStatus(message.state);
    this.executor.notifyStatus(device);
  }

  private evict(): void {
    this.registry.evict(this.now(), this.evictIntervalMs, this.onEvicted);
  }

  // ---- devices ----

  get devices(): LanDevice[] {
    return this.registry.list();
  }

  getDeviceByIp(ip: string): LanDevice | undefined {
    return this.registry.getByIp(ip);
  }

  getDeviceBySku(sku: string): LanDevice | undefined {
    return this.registry.getBySku(sku);
  }

  getDeviceByFingerprint(fingerprint: string): LanDevice | undefined {
    return this.registry.getByFingerprint(fingerprint);
  }

  removeDevice(device: LanDevice | string): boolean {
    return this.registry.remove(device) !== undefined;
  }

  // ---- commands (DeviceCommands) ----

  setPower(device: LanDevice, on: boolean): Promise<CommandOutcome> {
    return this.executor.execute(device, "power", onOffMessage(on), verifyPower(on));
  }

  setBrightness(device: LanDevice, percent: number): Promise<CommandOutcome> {
    const value = clampBrightness(percent);
    return this.executor.execute(device, "brightness", brightnessMessage(value), verifyBrightness(value));
  }

  setColor(device: LanDevice, target: ColorTarget): Promise<CommandOutcome> {
    const clamped: ColorTarget =
      "rgb" in target ? { rgb: clampRgb(target.rgb) } : { temperature: clampTemperature(target.temperature) };
    return this.executor.execute(device, "color", colorMessage(clamped), verifyColor(clamped));
  }

  async setSegmentColor(device: LanDevice, segment: number, rgb: Rgb): Promise<CommandOutcome> {
    const { capabilities } = device;
    if (!hasFeature(capabilities, LightFeature.SEGMENT_CONTROL)) {
      this.log.warn(`segment control is not supported by device ${device.fingerprint}`);
      return "unsupported";
    }
    if (!Number.isInteger(segment) || segment < 1 || segment > capabilities.segments.length) {
      this.log.warn(`segment ${segment} is not valid for device ${device.fingerprint}`);
      return "unsupported";
    }
    return this.executor.sendOnce(device, segmentColorMessage(capabilities.segments[segment - 1], rgb));
  }

  async setScene(device: LanDevice, scene: string): Promise<CommandOutcome> {
    if (!hasFeature(device.capabilities, LightFeature.SCENES)) {
      this.log.warn(`scenes are not supported by device ${device.fingerprint}`);
      return "unsupported";
    }
    const code = device.capabilities.scenes.get(scene.toLowerCase());
    if (!code) {
      this.log.warn(`scene ${scene} is not available for device ${device.fingerprint}`);
      return "unsupported";
    }
    return this.executor.sendOnce(device, sceneMessage(code));
  }

  async sendRaw(device: LanDevice, hex: string): Promise<CommandOutcome> {
    return this.executor.sendOnce(device, hexMessage([hex]));
  }

  private send(device: LanDevice, message: OutboundMessage): void {
    this.transport.sendTo(encodeMessage(message), device.ip, this.commandPort);
  }
}
