export type Rgb = { r: number; g: number; b: number };

export type ReportedState = {
  on: boolean;
  brightness: number; // 0–100
  color: Rgb;
  colorTemperature: number; // Kelvin, 0 when the light is in RGB mode
};

/** Commands that run a retry/verification sequence. */
export type StatefulCommandKind = "power" | "brightness" | "color";

export type CommandOutcome =
  | "verified" // the device reported the requested state
  | "exhausted" // backoff schedule ran out without confirmation
  | "superseded" // a newer command for the same device and kind took over
  | "cancelled" // the controller shut down
  | "sent" // fire-and-forget, no confirmation attempted
  | "unsupported"; // the device cannot do this, nothing was sent

export type ColorTarget = { rgb: Rgb } | { temperature: number };

export const WILDCARD_ADDRESS = "0.0.0.0";
