import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { LanAdapter } from "./adapters/lan.js";
import type { CommandOutcome } from "./lan/types.js";
import { TokenBucketLimiter } from "./util/limiter.js";
import type { Logger } from "./util/logger.js";
import { sleep } from "./util/abort.js";
import type { BatchItem, ControlCmd } from "./util/types.js";

export type ServerDeps = {
  adapter: LanAdapter;
  allowlist?: string[];
  limiter?: TokenBucketLimiter;
  batchWindowMs?: number;
  log: Logger;
};

const SERVER_INFO = { name: "lanlight", version: "0.1.0" };

const OUTCOME_TEXT: Record<CommandOutcome, string> = {
  verified: "confirmed by the device",
  exhausted: "sent, not confirmed",
  superseded: "superseded by a newer command",
  cancelled: "cancelled",
  sent: "sent",
  unsupported: "not supported by this device",
};

const rgbShape = {
  r: z.number().min(0).max(255),
  g: z.number().min(0).max(255),
  b: z.number().min(0).max(255),
};

const cmdSchema = z.union([
  z.object({ name: z.literal("turn"), value: z.union([z.literal("on"), z.literal("off")]) }),
  z.object({ name: z.literal("brightness"), value: z.number().min(0).max(100) }),
  z.object({ name: z.literal("color"), value: z.object(rgbShape) }),
  z.object({ name: z.literal("colorTem"), value: z.number().min(1000).max(10000) }),
  z.object({ name: z.literal("scene"), value: z.string() }),
  z.object({
    name: z.literal("segment"),
    value: z.object({ segment: z.number().int().min(1), color: z.object(rgbShape) }),
  }),
  z.object({ name: z.literal("raw"), value: z.string() }),
]);

function text(message: string) {
  return { content: [{ type: "text" as const, text: message }] };
}

// Commands on different segments must not be coalesced into one.
function coalesceKey(it: BatchItem): string {
  return it.cmd.name === "segment"
    ? `${it.deviceId}:segment:${it.cmd.value.segment}`
    : `${it.deviceId}:${it.cmd.name}`;
}

export function createServer(deps: ServerDeps): McpServer {
  const { adapter, log } = deps;
  const allowlist = new Set<string>(deps.allowlist ?? []);
  const limiter = deps.limiter ?? new TokenBucketLimiter(5);
  const batchWindowMs = deps.batchWindowMs ?? 120;

  function isAllowed(deviceId: string) {
    return allowlist.size === 0 || allowlist.has(deviceId);
  }

  async function control(deviceId: string, cmd: ControlCmd): Promise<string> {
    if (!isAllowed(deviceId)) throw new Error("Device not allowed");
    await limiter.take();
    const outcome = await adapter.control({ deviceId }, cmd);
    log.debug(`${cmd.name} on ${deviceId}: ${outcome}`);
    return OUTCOME_TEXT[outcome];
  }

  const server = new McpServer(SERVER_INFO);

  // ---- TOOLS ----
  server.registerTool("lights_list_devices", {
    description: "List lights discovered on the local network.",
    inputSchema: {}
  }, async () => {
    await limiter.take();
    const list = await adapter.listDevices();
    const filtered = list.filter((d) => isAllowed(d.deviceId));
    return text(JSON.stringify(filtered, null, 2));
  });

  server.registerTool("lights_get_state", {
    description: "Get the last reported power/brightness/color/temperature of a light.",
    inputSchema: { deviceId: z.string() }
  }, async ({ deviceId }) => {
    if (!isAllowed(deviceId)) throw new Error("Device not allowed");
    await limiter.take();
    const state = await adapter.getState({ deviceId });
    return text(JSON.stringify(state, null, 2));
  });

  server.registerTool("lights_set_power", {
    description: "Turn a light on/off.",
    inputSchema: { deviceId: z.string(), on: z.boolean() }
  }, async ({ deviceId, on }) => {
    const result = await control(deviceId, { name: "turn", value: on ? "on" : "off" });
    return text(`Power ${on ? "on" : "off"}: ${result}.`);
  });

  server.registerTool("lights_set_brightness", {
    description: "Set brightness (0-100).",
    inputSchema: { deviceId: z.string(), percent: z.number().min(0).max(100) }
  }, async ({ deviceId, percent }) => {
    const result = await control(deviceId, { name: "brightness", value: Math.round(percent) });
    return text(`Brightness ${Math.round(percent)}%: ${result}.`);
  });

  server.registerTool("lights_set_color", {
    description: "Set RGB color.",
    inputSchema: { deviceId: z.string(), ...rgbShape }
  }, async ({ deviceId, r, g, b }) => {
    const result = await control(deviceId, { name: "color", value: { r, g, b } });
    return text(`Color rgb(${r},${g},${b}): ${result}.`);
  });

  server.registerTool("lights_set_color_temp", {
    description: "Set color temperature in Kelvin (applied within 2000–9000).",
    inputSchema: { deviceId: z.string(), kelvin: z.number().min(1000).max(10000) }
  }, async ({ deviceId, kelvin }) => {
    const result = await control(deviceId, { name: "colorTem", value: Math.round(kelvin) });
    return text(`Color temp ${Math.round(kelvin)}K: ${result}.`);
  });

  server.registerTool("lights_set_scene", {
    description: "Activate a built-in scene by name (see lights_list_devices for names).",
    inputSchema: { deviceId: z.string(), scene: z.string() }
  }, async ({ deviceId, scene }) => {
    const result = await control(deviceId, { name: "scene", value: scene });
    return text(`Scene ${scene}: ${result}.`);
  });

  server.registerTool("lights_set_segment_color", {
    description: "Set the RGB color of one segment (numbered from 1) of a segmented light.",
    inputSchema: { deviceId: z.string(), segment: z.number().int().min(1), ...rgbShape }
  }, async ({ deviceId, segment, r, g, b }) => {
    const result = await control(deviceId, { name: "segment", value: { segment, color: { r, g, b } } });
    return text(`Segment ${segment} rgb(${r},${g},${b}): ${result}.`);
  });

  server.registerTool("lights_send_raw", {
    description: "Send a raw hex frame to a light, as is (no checksum added).",
    inputSchema: { deviceId: z.string(), hex: z.string() }
  }, async ({ deviceId, hex }) => {
    const result = await control(deviceId, { name: "raw", value: hex });
    return text(`Raw command: ${result}.`);
  });

  server.registerTool("lights_add_device", {
    description: "Probe a light by IP address when multicast discovery cannot reach it.",
    inputSchema: { ip: z.string().ip({ version: "v4" }) }
  }, async ({ ip }) => {
    const added = adapter.addManualDevice(ip);
    return text(added ? `Probing ${ip}.` : `${ip} is already queued or known.`);
  });

  server.registerTool("lights_remove_device", {
    description: "Forget a discovered light until it is discovered again.",
    inputSchema: { deviceId: z.string() }
  }, async ({ deviceId }) => {
    if (!isAllowed(deviceId)) throw new Error("Device not allowed");
    const removed = adapter.removeDevice({ deviceId });
    return text(removed ? `Removed ${deviceId}.` : `${deviceId} is not known.`);
  });

  // --- Batch with coalescing ---
  server.registerTool("lights_batch", {
    description: "Apply multiple commands; duplicates per device and command are coalesced (last wins).",
    inputSchema: {
      items: z.array(z.object({ deviceId: z.string(), cmd: cmdSchema })).min(1)
    }
  }, async ({ items }) => {
    const allowed = items.filter((i) => isAllowed(i.deviceId));
    if (allowed.length === 0) throw new Error("No allowed items");

    const map = new Map<string, BatchItem>();
    for (const it of allowed) map.set(coalesceKey(it), it);
    const deduped = Array.from(map.values());

    await limiter.take();
    const byDevice = new Map<string, BatchItem[]>();
    for (const it of deduped) {
      const arr = byDevice.get(it.deviceId) || [];
      arr.push(it);
      byDevice.set(it.deviceId, arr);
    }

    const results = await Promise.all(
      Array.from(byDevice.values()).map(async (cmds) => {
        // small window so callers streaming actions can still be coalesced
        await sleep(batchWindowMs);
        return adapter.batch(cmds);
      }),
    );
    const flat = results.flat();
    const confirmed = flat.filter((r) => r.outcome === "verified").length;

    return text(
      `Applied ${deduped.length} command(s) across ${byDevice.size} device(s); ${confirmed} confirmed.\n` +
        JSON.stringify(flat, null, 2),
    );
  });

  return server;
}
