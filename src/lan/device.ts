import { DeviceDetachedError } from "../util/errors.js";
import type { LightCapabilities } from "./capabilities.js";
import { clampBrightness, clampRgb, clampTemperature } from "./messages.js";
import type { ColorTarget, CommandOutcome, ReportedState, Rgb } from "./types.js";

/**
 * Outbound command surface a device is handed at construction. The device
 * never holds the controller itself.
 */
export interface DeviceCommands {
  setPower(device: LanDevice, on: boolean): Promise<CommandOutcome>;
  setBrightness(device: LanDevice, percent: number): Promise<CommandOutcome>;
  setColor(device: LanDevice, target: ColorTarget): Promise<CommandOutcome>;
  setSegmentColor(device: LanDevice, segment: number, rgb: Rgb): Promise<CommandOutcome>;
  setScene(device: LanDevice, scene: string): Promise<CommandOutcome>;
  sendRaw(device: LanDevice, hex: string): Promise<CommandOutcome>;
}

export type UpdateHandler = (device: LanDevice) => void;

export type LanDeviceInit = {
  fingerprint: string;
  ip: string;
  sku: string;
  capabilities: LightCapabilities;
  commands: DeviceCommands;
  now?: () => number;
};

export type DeviceSnapshot = {
  fingerprint: string;
  ip: string;
  sku: string;
  lastSeen: number;
  isManual: boolean;
  state: ReportedState;
};

export function initialState(): ReportedState {
  return { on: false, brightness: 0, color: { r: 0, g: 0, b: 0 }, colorTemperature: 0 };
}

export class LanDevice {
  readonly fingerprint: string;
  readonly sku: string;
  readonly capabilities: LightCapabilities;

  private _ip: string;
  private _lastSeen: number;
  private _state: ReportedState = initialState();
  private _isManual = false;
  private commands: DeviceCommands | null;
  private updateHandler: UpdateHandler | null = null;
  private readonly now: () => number;

  constructor(init: LanDeviceInit) {
    this.fingerprint = init.fingerprint;
    this.sku = init.sku;
    this.capabilities = init.capabilities;
    this._ip = init.ip;
    this.commands = init.commands;
    this.now = init.now ?? Date.now;
    this._lastSeen = this.now();
  }

  get ip(): string {
    return this._ip;
  }

  get lastSeen(): number {
    return this._lastSeen;
  }

  get state(): ReportedState {
    return this._state;
  }

  get isManual(): boolean {
    return this._isManual;
  }

  get isAttached(): boolean {
    return this.commands !== null;
  }

  /** Replaces the update handler and returns the previous one. */
  setUpdateHandler(handler: UpdateHandler | null): UpdateHandler | null {
    const previous = this.updateHandler;
    this.updateHandler = handler;
    return previous;
  }

  // ---- commands ----

  private attached(): DeviceCommands {
    if (!this.commands) throw new DeviceDetachedError(this.fingerprint);
    return this.commands;
  }

  async turnOn(): Promise<CommandOutcome> {
    return this.setPower(true);
  }

  async turnOff(): Promise<CommandOutcome> {
    return this.setPower(false);
  }

  async setPower(on: boolean): Promise<CommandOutcome> {
    const outcome = this.attached().setPower(this, on);
    this._state = { ...this._state, on };
    return outcome;
  }

  async setBrightness(percent: number): Promise<CommandOutcome> {
    const outcome = this.attached().setBrightness(this, percent);
    this._state = { ...this._state, brightness: clampBrightness(percent) };
    return outcome;
  }

  async setRgbColor(rgb: Rgb): Promise<CommandOutcome> {
    const outcome = this.attached().setColor(this, { rgb });
    this._state = { ...this._state, color: clampRgb(rgb), colorTemperature: 0 };
    return outcome;
  }

  async setTemperature(kelvin: number): Promise<CommandOutcome> {
    const outcome = this.attached().setColor(this, { temperature: kelvin });
    this._state = { ...this._state, colorTemperature: clampTemperature(kelvin) };
    return outcome;
  }

  /** Segments are numbered from 1. */
  async setSegmentRgbColor(segment: number, rgb: Rgb): Promise<CommandOutcome> {
    return this.attached().setSegmentColor(this, segment, rgb);
  }

  async turnSegmentOff(segment: number): Promise<CommandOutcome> {
    return this.attached().setSegmentColor(this, segment, { r: 0, g: 0, b: 0 });
  }

  async setScene(scene: string): Promise<CommandOutcome> {
    return this.attached().setScene(this, scene);
  }

  async sendRawCommand(hex: string): Promise<CommandOutcome> {
    return this.attached().sendRaw(this, hex);
  }

  // ---- registry/controller side ----

  /** @internal Overwrites the reported state from a status response. */
  applyStatus(state: ReportedState): void {
    this._state = state;
    this.touch();
    this.updateHandler?.(this);
  }

  /** @internal */
  touch(): void {
    this._lastSeen = this.now();
  }

  /** @internal */
  updateIp(ip: string): void {
    this._ip = ip;
  }

  /** @internal */
  markManual(): void {
    this._isManual = true;
  }

  /** @internal Called on eviction or removal; later commands reject. */
  detach(): void {
    this.commands = null;
    this.updateHandler = null;
  }

  toJSON(): DeviceSnapshot {
    return {
      fingerprint: this.fingerprint,
      ip: this._ip,
      sku: this.sku,
      lastSeen: this._lastSeen,
      isManual: this._isManual,
      state: this._state,
    };
  }

  toString(): string {
    const { on, brightness, color, colorTemperature } = this._state;
    const base = `<LanDevice ip=${this._ip}, fingerprint=${this.fingerprint}, sku=${this.sku}, on=${on}`;
    return on
      ? `${base}, brightness=${brightness}, color=(${color.r},${color.g},${color.b}), temperature=${colorTemperature}>`
      : `${base}>`;
  }
}
