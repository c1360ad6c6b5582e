import { hasFeature, LightFeature, type LightCapabilities } from "../lan/capabilities.js";
import type { LanController } from "../lan/controller.js";
import type { LanDevice } from "../lan/device.js";
import type { CommandOutcome } from "../lan/types.js";
import { DeviceNotFoundError } from "../util/errors.js";
import type { BatchItem, ControlCmd, ControlResult, DeviceInfo, DeviceRef, State } from "../util/types.js";

function capabilityNames(caps: LightCapabilities): string[] {
  const names = ["power"];
  if (hasFeature(caps, LightFeature.BRIGHTNESS)) names.push("brightness");
  if (hasFeature(caps, LightFeature.COLOR_RGB)) names.push("color");
  if (hasFeature(caps, LightFeature.COLOR_KELVIN_TEMPERATURE)) names.push("colorTem");
  if (hasFeature(caps, LightFeature.SEGMENT_CONTROL)) names.push("segment");
  if (hasFeature(caps, LightFeature.SCENES)) names.push("scene");
  return names;
}

export function toDeviceInfo(device: LanDevice): DeviceInfo {
  return {
    deviceId: device.fingerprint,
    model: device.sku,
    ip: device.ip,
    manual: device.isManual,
    lastSeen: new Date(device.lastSeen).toISOString(),
    capabilities: capabilityNames(device.capabilities),
    segments: device.capabilities.segments.length,
    scenes: [...device.capabilities.scenes.keys()],
  };
}

/**
 * Maps the generic device/command vocabulary onto the LAN controller.
 * Devices only exist here once they have answered a scan.
 */
export class LanAdapter {
  constructor(private readonly controller: LanController) {}

  private resolve(ref: DeviceRef): LanDevice {
    const device = this.controller.getDeviceByFingerprint(ref.deviceId);
    if (!device) throw new DeviceNotFoundError(ref.deviceId);
    return device;
  }

  async listDevices(): Promise<DeviceInfo[]> {
    return this.controller.devices.map(toDeviceInfo);
  }

  async getState(ref: DeviceRef): Promise<State> {
    const { on, brightness, color, colorTemperature } = this.resolve(ref).state;
    return { power: on ? "on" : "off", brightness, color: { ...color }, colorTem: colorTemperature };
  }

  async control(ref: DeviceRef, cmd: ControlCmd): Promise<CommandOutcome> {
    const device = this.resolve(ref);
    switch (cmd.name) {
      case "turn":
        return device.setPower(cmd.value === "on");
      case "brightness":
        return device.setBrightness(cmd.value);
      case "color":
        return device.setRgbColor(cmd.value);
      case "colorTem":
        return device.setTemperature(cmd.value);
      case "scene":
        return device.setScene(cmd.value);
      case "segment":
        return device.setSegmentRgbColor(cmd.value.segment, cmd.value.color);
      case "raw":
        return device.sendRawCommand(cmd.value);
      default: {
        const unsupported: never = cmd;
        throw new Error(`Unsupported command: ${JSON.stringify(unsupported)}`);
      }
    }
  }

  /**
   * Commands for one device run one after another, since a device holds a
   * single verification slot. Different devices run in parallel.
   */
  async batch(items: BatchItem[]): Promise<ControlResult[]> {
    const byDevice = new Map<string, number[]>();
    items.forEach((it, i) => {
      const indexes = byDevice.get(it.deviceId) || [];
      indexes.push(i);
      byDevice.set(it.deviceId, indexes);
    });

    const results: ControlResult[] = new Array(items.length);
    await Promise.all(
      Array.from(byDevice.values()).map(async (indexes) => {
        for (const i of indexes) {
          const it = items[i];
          results[i] = {
            deviceId: it.deviceId,
            cmd: it.cmd.name,
            outcome: await this.control({ deviceId: it.deviceId }, it.cmd),
          };
        }
      }),
    );
    return results;
  }

  addManualDevice(ip: string): boolean {
    return this.controller.addToDiscoveryQueue(ip);
  }

  removeDevice(ref: DeviceRef): boolean {
    return this.controller.removeDevice(ref.deviceId);
  }
}
