import { z } from "zod";
import {
  BROADCAST_ADDRESS,
  BROADCAST_PORT,
  COMMAND_PORT,
  DISCOVERY_INTERVAL_MS,
  EVICT_INTERVAL_MS,
  LISTENING_PORT,
  UPDATE_INTERVAL_MS,
} from "../lan/controller.js";
import { parseIPv4 } from "../lan/network.js";
import { WILDCARD_ADDRESS } from "../lan/types.js";
import { ConfigurationError } from "./errors.js";

const flag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((v) => (v === undefined || v.trim() === "" ? fallback : /^(true|1|yes|on)$/i.test(v.trim())));

const list = z
  .string()
  .optional()
  .transform((v) =>
    (v ?? "")
      .split(/[,\s]+/)
      .map((s) => s.trim())
      .filter(Boolean),
  );

const ipv4List = list.refine((ips) => ips.every((ip) => parseIPv4(ip) !== null), {
  message: "expected comma separated IPv4 addresses",
});

const port = (fallback: number) => z.coerce.number().int().min(1).max(65535).default(fallback);
const millis = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  LANLIGHT_LISTEN_ADDRESSES: ipv4List,
  LANLIGHT_NETWORK_MASKS: list,
  LANLIGHT_LISTEN_PORT: port(LISTENING_PORT),
  LANLIGHT_COMMAND_PORT: port(COMMAND_PORT),
  LANLIGHT_BROADCAST_ADDRESS: z
    .string()
    .refine((ip) => parseIPv4(ip) !== null, { message: "expected an IPv4 address" })
    .default(BROADCAST_ADDRESS),
  LANLIGHT_BROADCAST_PORT: port(BROADCAST_PORT),
  LANLIGHT_DISCOVERY_ENABLED: flag(true),
  LANLIGHT_DISCOVERY_INTERVAL_MS: millis(DISCOVERY_INTERVAL_MS),
  LANLIGHT_EVICT_ENABLED: flag(true),
  LANLIGHT_EVICT_INTERVAL_MS: millis(EVICT_INTERVAL_MS),
  LANLIGHT_UPDATE_ENABLED: flag(true),
  LANLIGHT_UPDATE_INTERVAL_MS: millis(UPDATE_INTERVAL_MS),
  LANLIGHT_MANUAL_DEVICES: ipv4List,
  LANLIGHT_ALLOWLIST: list,
  LANLIGHT_RATE_RPS: z.coerce.number().positive().default(5),
  LANLIGHT_BATCH_WINDOW_MS: z.coerce.number().int().nonnegative().default(120),
  LANLIGHT_DEBUG: flag(false),
});

export type LanSettings = {
  listenAddresses: string[];
  networkMasks?: string[];
  listenPort: number;
  commandPort: number;
  broadcastAddress: string;
  broadcastPort: number;
  discoveryEnabled: boolean;
  discoveryIntervalMs: number;
  evictEnabled: boolean;
  evictIntervalMs: number;
  updateEnabled: boolean;
  updateIntervalMs: number;
};

export type AppConfig = {
  lan: LanSettings;
  manualDevices: string[];
  allowlist: string[];
  rateRps: number;
  batchWindowMs: number;
  debug: boolean;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigurationError(`Invalid configuration: ${details}`);
  }
  const e = parsed.data;
  return {
    lan: {
      listenAddresses: e.LANLIGHT_LISTEN_ADDRESSES.length > 0 ? e.LANLIGHT_LISTEN_ADDRESSES : [WILDCARD_ADDRESS],
      networkMasks: e.LANLIGHT_NETWORK_MASKS.length > 0 ? e.LANLIGHT_NETWORK_MASKS : undefined,
      listenPort: e.LANLIGHT_LISTEN_PORT,
      commandPort: e.LANLIGHT_COMMAND_PORT,
      broadcastAddress: e.LANLIGHT_BROADCAST_ADDRESS,
      broadcastPort: e.LANLIGHT_BROADCAST_PORT,
      discoveryEnabled: e.LANLIGHT_DISCOVERY_ENABLED,
      discoveryIntervalMs: e.LANLIGHT_DISCOVERY_INTERVAL_MS,
      evictEnabled: e.LANLIGHT_EVICT_ENABLED,
      evictIntervalMs: e.LANLIGHT_EVICT_INTERVAL_MS,
      updateEnabled: e.LANLIGHT_UPDATE_ENABLED,
      updateIntervalMs: e.LANLIGHT_UPDATE_INTERVAL_MS,
    },
    manualDevices: e.LANLIGHT_MANUAL_DEVICES,
    allowlist: e.LANLIGHT_ALLOWLIST,
    rateRps: e.LANLIGHT_RATE_RPS,
    batchWindowMs: e.LANLIGHT_BATCH_WINDOW_MS,
    debug: e.LANLIGHT_DEBUG,
  };
}
