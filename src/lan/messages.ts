import { z } from "zod";
import type { ColorTarget, ReportedState, Rgb } from "./types.js";

export const TEMPERATURE_MIN_KELVIN = 2000;
export const TEMPERATURE_MAX_KELVIN = 9000;

// ptReal frames are padded to a fixed length before the checksum byte.
const PT_REAL_FRAME_LENGTH = 19;

export type OutboundMessage =
  | { cmd: "scan"; data: { account_topic: "reserve" } }
  | { cmd: "devStatus"; data: Record<string, never> }
  | { cmd: "turn"; data: { value: 0 | 1 } }
  | { cmd: "brightness"; data: { value: number } }
  | { cmd: "colorwc"; data: { color: Rgb; colorTemInKelvin: number } }
  | { cmd: "ptReal"; data: { command: string[] } };

export type ScanResponse = {
  cmd: "scan";
  device?: string;
  sku?: string;
  ip?: string;
};

export type StatusResponse = {
  cmd: "devStatus";
  state: ReportedState;
};

export type InboundMessage = ScanResponse | StatusResponse;

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(Math.round(value), max));
}

export function clampRgb(rgb: Rgb): Rgb {
  return { r: clamp(rgb.r, 0, 255), g: clamp(rgb.g, 0, 255), b: clamp(rgb.b, 0, 255) };
}

export function clampBrightness(value: number): number {
  return clamp(value, 0, 100);
}

export function clampTemperature(kelvin: number): number {
  return clamp(kelvin, TEMPERATURE_MIN_KELVIN, TEMPERATURE_MAX_KELVIN);
}

// ---- outbound ----

export function encodeMessage(message: OutboundMessage): Buffer {
  return Buffer.from(JSON.stringify({ msg: { cmd: message.cmd, data: message.data } }), "utf8");
}

export function scanMessage(): OutboundMessage {
  return { cmd: "scan", data: { account_topic: "reserve" } };
}

export function statusMessage(): OutboundMessage {
  return { cmd: "devStatus", data: {} };
}

export function onOffMessage(on: boolean): OutboundMessage {
  return { cmd: "turn", data: { value: on ? 1 : 0 } };
}

export function brightnessMessage(percent: number): OutboundMessage {
  return { cmd: "brightness", data: { value: clampBrightness(percent) } };
}

/** RGB and temperature are exclusive: the unused half is sent as zero. */
export function colorMessage(target: ColorTarget): OutboundMessage {
  if ("rgb" in target) {
    return { cmd: "colorwc", data: { color: clampRgb(target.rgb), colorTemInKelvin: 0 } };
  }
  return {
    cmd: "colorwc",
    data: { color: { r: 0, g: 0, b: 0 }, colorTemInKelvin: clampTemperature(target.temperature) },
  };
}

export function xorChecksum(bytes: Uint8Array): number {
  let checksum = 0;
  for (const byte of bytes) checksum ^= byte;
  return checksum & 0xff;
}

function ptRealFrame(body: number[]): Buffer {
  if (body.length > PT_REAL_FRAME_LENGTH) {
    throw new Error(`ptReal frame too long: ${body.length} bytes`);
  }
  const frame = Buffer.alloc(PT_REAL_FRAME_LENGTH + 1);
  Buffer.from(body).copy(frame);
  frame[PT_REAL_FRAME_LENGTH] = xorChecksum(frame.subarray(0, PT_REAL_FRAME_LENGTH));
  return frame;
}

function ptRealMessage(frames: Buffer[]): OutboundMessage {
  return { cmd: "ptReal", data: { command: frames.map((f) => f.toString("base64")) } };
}

export function segmentColorMessage(segment: Uint8Array, rgb: Rgb): OutboundMessage {
  const { r, g, b } = clampRgb(rgb);
  return ptRealMessage([ptRealFrame([0x33, 0x05, 0x15, 0x01, r, g, b, 0, 0, 0, 0, 0, ...segment])]);
}

export function sceneMessage(code: Uint8Array): OutboundMessage {
  return ptRealMessage([ptRealFrame([0x33, 0x05, 0x04, ...code])]);
}

/** Raw frames are sent as given, with no padding or checksum. */
export function hexMessage(commands: string[]): OutboundMessage {
  const frames = commands.map((hex) => {
    const clean = hex.replace(/\s+/g, "");
    if (!/^(?:[0-9a-fA-F]{2})+$/.test(clean)) {
      throw new Error(`Invalid hex command: ${hex}`);
    }
    return Buffer.from(clean, "hex");
  });
  return ptRealMessage(frames);
}

// ---- inbound ----

const envelopeSchema = z.object({
  msg: z.object({ cmd: z.string(), data: z.unknown() }),
});

const scanDataSchema = z.object({
  device: z.string().optional(),
  sku: z.string().optional(),
  ip: z.string().optional(),
});

const statusDataSchema = z.object({
  onOff: z.number(),
  brightness: z.number(),
  color: z.object({ r: z.number(), g: z.number(), b: z.number() }),
  colorTemInKelvin: z.number().default(0),
});

/** Returns null for anything that is not a well-formed scan or status response. */
export function decodeMessage(payload: Uint8Array | string): InboundMessage | null {
  const text = typeof payload === "string" ? payload : Buffer.from(payload).toString("utf8");
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return null;
  }

  const envelope = envelopeSchema.safeParse(json);
  if (!envelope.success) return null;
  const { cmd, data } = envelope.data.msg;

  if (cmd === "scan") {
    const scan = scanDataSchema.safeParse(data);
    if (!scan.success) return null;
    return {
      cmd: "scan",
      device: scan.data.device || undefined,
      sku: scan.data.sku || undefined,
      ip: scan.data.ip || undefined,
    };
  }

  if (cmd === "devStatus") {
    const status = statusDataSchema.safeParse(data);
    if (!status.success) return null;
    const { onOff, brightness, color, colorTemInKelvin } = status.data;
    return {
      cmd: "devStatus",
      state: {
        on: onOff !== 0,
        brightness,
        color: { r: color.r, g: color.g, b: color.b },
        colorTemperature: colorTemInKelvin,
      },
    };
  }

  return null;
}
