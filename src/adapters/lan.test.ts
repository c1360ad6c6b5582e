import { afterEach, describe, it, expect } from "vitest";
import { LanController } from "../lan/controller.js";
import { FakeSocket, makeLog, scanResponse, statusResponse } from "../lan/test-utils.js";
import { DeviceNotFoundError } from "../util/errors.js";
import { LanAdapter, toDeviceInfo } from "./lan.js";

let controller: LanController | null = null;

async function setup() {
  const socket = new FakeSocket();
  const c = new LanController({ log: makeLog(), updateEnabled: false, now: () => 0, createSocket: () => socket });
  controller = c;
  await c.start();
  socket.receive(scanResponse("AA:BB", "H619A", "192.168.1.20"), "192.168.1.20");
  socket.receive(scanResponse("CC:DD", "H0000", "192.168.1.21"), "192.168.1.21");
  return { adapter: new LanAdapter(c), controller: c, socket };
}

afterEach(async () => {
  await controller?.cleanup();
  controller = null;
});

describe("toDeviceInfo", () => {
  it("describes a segmented strip", async () => {
    const { controller: c } = await setup();
    const device = c.getDeviceByFingerprint("AA:BB");
    expect(device).toBeDefined();
    if (!device) return;

    expect(toDeviceInfo(device)).toEqual({
      deviceId: "AA:BB",
      model: "H619A",
      ip: "192.168.1.20",
      manual: false,
      lastSeen: "1970-01-01T00:00:00.000Z",
      capabilities: ["power", "brightness", "color", "colorTem", "segment", "scene"],
      segments: 10,
      scenes: ["sunrise", "sunset", "movie", "dating", "romantic", "blinking", "candlelight", "energetic", "snowflake"],
    });
  });
});

describe("LanAdapter", () => {
  it("lists every registered device", async () => {
    const { adapter } = await setup();
    const devices = await adapter.listDevices();
    expect(devices.map((d) => [d.deviceId, d.capabilities])).toEqual([
      ["AA:BB", ["power", "brightness", "color", "colorTem", "segment", "scene"]],
      ["CC:DD", ["power"]],
    ]);
  });

  it("reports the last known state", async () => {
    const { adapter, socket } = await setup();
    socket.receive(
      statusResponse({ onOff: 1, brightness: 40, color: { r: 9, g: 8, b: 7 }, colorTemInKelvin: 0 }),
      "192.168.1.20",
    );
    await expect(adapter.getState({ deviceId: "AA:BB" })).resolves.toEqual({
      power: "on",
      brightness: 40,
      color: { r: 9, g: 8, b: 7 },
      colorTem: 0,
    });
  });

  it("rejects unknown devices", async () => {
    const { adapter } = await setup();
    await expect(adapter.getState({ deviceId: "nope" })).rejects.toThrow(DeviceNotFoundError);
    await expect(adapter.control({ deviceId: "nope" }, { name: "turn", value: "on" })).rejects.toThrow(
      "Device not found: nope",
    );
  });

  it("maps commands onto the device", async () => {
    const { adapter, socket } = await setup();

    await expect(adapter.control({ deviceId: "AA:BB" }, { name: "scene", value: "movie" })).resolves.toBe("sent");
    await expect(
      adapter.control({ deviceId: "AA:BB" }, { name: "segment", value: { segment: 2, color: { r: 1, g: 2, b: 3 } } }),
    ).resolves.toBe("sent");
    await expect(adapter.control({ deviceId: "AA:BB" }, { name: "raw", value: "aabb01" })).resolves.toBe("sent");
    await expect(adapter.control({ deviceId: "CC:DD" }, { name: "scene", value: "movie" })).resolves.toBe(
      "unsupported",
    );

    const pending = adapter.control({ deviceId: "AA:BB" }, { name: "brightness", value: 30 });
    expect(socket.decoded().at(-1)).toEqual({ to: "192.168.1.20:4003", cmd: "brightness", data: { value: 30 } });
    await controller?.cleanup();
    await expect(pending).resolves.toBe("cancelled");
  });

  it("runs a batch in order", async () => {
    const { adapter } = await setup();
    await expect(
      adapter.batch([
        { deviceId: "AA:BB", cmd: { name: "scene", value: "sunset" } },
        { deviceId: "CC:DD", cmd: { name: "raw", value: "aa" } },
      ]),
    ).resolves.toEqual([
      { deviceId: "AA:BB", cmd: "scene", outcome: "sent" },
      { deviceId: "CC:DD", cmd: "raw", outcome: "sent" },
    ]);
  });

  it("confirms each command of a device batch in turn", async () => {
    const { adapter, socket } = await setup();
    const light: { onOff: 0 | 1; brightness: number } = { onOff: 0, brightness: 0 };
    socket.responder = (datagram) => {
      if (datagram.to !== "192.168.1.20:4003") return;
      if (datagram.cmd === "turn") light.onOff = 1;
      if (datagram.cmd === "brightness") light.brightness = 50;
      if (datagram.cmd === "devStatus") {
        const reply = statusResponse({ ...light });
        queueMicrotask(() => socket.receive(reply, "192.168.1.20"));
      }
    };

    await expect(
      adapter.batch([
        { deviceId: "AA:BB", cmd: { name: "turn", value: "on" } },
        { deviceId: "AA:BB", cmd: { name: "brightness", value: 50 } },
      ]),
    ).resolves.toEqual([
      { deviceId: "AA:BB", cmd: "turn", outcome: "verified" },
      { deviceId: "AA:BB", cmd: "brightness", outcome: "verified" },
    ]);
    expect(socket.decoded().map((d) => d.cmd)).toEqual(["turn", "devStatus", "brightness", "devStatus"]);
  });

  it("adds and removes devices", async () => {
    const { adapter, controller: c } = await setup();
    expect(adapter.addManualDevice("192.168.1.60")).toBe(true);
    expect(adapter.addManualDevice("192.168.1.60")).toBe(false);
    expect([...c.discoveryQueue]).toEqual(["192.168.1.60"]);

    expect(adapter.removeDevice({ deviceId: "CC:DD" })).toBe(true);
    expect(adapter.removeDevice({ deviceId: "CC:DD" })).toBe(false);
    expect(c.devices.map((d) => d.fingerprint)).toEqual(["AA:BB"]);
  });
});
