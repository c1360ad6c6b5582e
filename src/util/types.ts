import type { CommandOutcome, Rgb } from "../lan/types.js";

/** deviceId is the device fingerprint (hardware id). */
export type DeviceRef = { deviceId: string };

export type DeviceInfo = DeviceRef & {
  model: string;
  ip: string;
  manual: boolean;
  lastSeen: string; // ISO timestamp
  capabilities: string[]; // e.g., ["power", "brightness", "color", "colorTem", "segment", "scene"]
  segments: number;
  scenes: string[];
};

export type State = {
  power: "on" | "off";
  brightness: number; // 0–100
  color: Rgb;
  colorTem: number; // Kelvin, 0 in RGB mode
};

export type ControlCmd =
  | { name: "turn"; value: "on" | "off" }
  | { name: "brightness"; value: number }
  | { name: "color"; value: Rgb }
  | { name: "colorTem"; value: number }
  | { name: "scene"; value: string }
  | { name: "segment"; value: { segment: number; color: Rgb } }
  | { name: "raw"; value: string };

export type BatchItem = DeviceRef & { cmd: ControlCmd };

export type ControlResult = DeviceRef & { cmd: ControlCmd["name"]; outcome: CommandOutcome };
