import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { ConfigurationError, DeviceDetachedError } from "../util/errors.js";
import { LanController, type LanControllerOptions } from "./controller.js";
import type { LanDevice } from "./device.js";
import { FakeSocket, makeLog, scanResponse, statusResponse } from "./test-utils.js";

const SCAN = { account_topic: "reserve" };

let controller: LanController | null = null;

async function startController(opts: LanControllerOptions = {}) {
  const sockets: FakeSocket[] = [];
  const log = makeLog();
  let clock = 0;
  const instance = new LanController({
    log,
    now: () => clock,
    createSocket: () => {
      const socket = new FakeSocket();
      sockets.push(socket);
      return socket;
    },
    ...opts,
  });
  controller = instance;
  await instance.start();
  const [socket] = sockets;
  return {
    controller: instance,
    socket,
    sockets,
    log,
    setClock: (ms: number) => {
      clock = ms;
    },
    discover(fingerprint: string, sku: string, ip: string): LanDevice {
      socket.receive(scanResponse(fingerprint, sku, ip), ip, 4002);
      const device = instance.getDeviceByFingerprint(fingerprint);
      if (!device) throw new Error(`${fingerprint} was not registered`);
      return device;
    },
  };
}

beforeEach(() => {
  vi.useFakeTimers();
});

afterEach(async () => {
  await controller?.cleanup();
  controller = null;
  vi.useRealTimers();
});

describe("LanController discovery", () => {
  it("broadcasts a scan on start and every interval", async () => {
    const { socket } = await startController({ discoveryEnabled: true });
    expect(socket.decoded()).toEqual([{ to: "239.255.255.250:4001", cmd: "scan", data: SCAN }]);

    await vi.advanceTimersByTimeAsync(9_999);
    expect(socket.sent).toHaveLength(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(socket.sent).toHaveLength(2);
  });

  it("stays quiet when discovery is off and nothing is queued", async () => {
    const { socket, controller: c } = await startController();
    await vi.advanceTimersByTimeAsync(60_000);
    expect(socket.sent).toHaveLength(0);
    expect(c.isDiscoveryEnabled).toBe(false);
  });

  it("honours a changed interval from the next reschedule", async () => {
    const { socket, controller: c } = await startController({ discoveryEnabled: true, updateEnabled: false });
    c.setDiscoveryInterval(2_000);
    expect(c.discoveryInterval).toBe(2_000);

    await vi.advanceTimersByTimeAsync(10_000);
    expect(socket.sent).toHaveLength(2);
    await vi.advanceTimersByTimeAsync(2_000);
    expect(socket.sent).toHaveLength(3);
  });

  it("starts and stops broadcasting when toggled", async () => {
    const { socket, controller: c } = await startController({ updateEnabled: false });
    c.setDiscoveryEnabled(true);
    expect(socket.sent).toHaveLength(1);
    c.setDiscoveryEnabled(false);
    await vi.advanceTimersByTimeAsync(30_000);
    expect(socket.sent).toHaveLength(1);
  });

  it("registers devices from scan responses", async () => {
    const onDiscovered = vi.fn().mockReturnValue(true);
    const { controller: c, discover } = await startController({ onDiscovered });

    const device = discover("AA:BB", "H619A", "192.168.1.20");

    expect(c.devices).toEqual([device]);
    expect(device.sku).toBe("H619A");
    expect(device.ip).toBe("192.168.1.20");
    expect(onDiscovered).toHaveBeenCalledWith(device, true);
  });

  it("does not register devices the handler rejects", async () => {
    const { controller: c, socket } = await startController({ onDiscovered: () => false });
    socket.receive(scanResponse("AA:BB", "H619A", "192.168.1.20"), "192.168.1.20");
    expect(c.devices).toEqual([]);
  });

  it("replaces handlers and returns the previous one", async () => {
    const first = vi.fn().mockReturnValue(true);
    const second = vi.fn().mockReturnValue(true);
    const { controller: c, discover } = await startController({ onDiscovered: first });

    expect(c.setDiscoveredHandler(second)).toBe(first);
    discover("AA:BB", "H6046", "192.168.1.20");

    expect(first).not.toHaveBeenCalled();
    expect(second).toHaveBeenCalledTimes(1);
    expect(c.setEvictedHandler(null)).toBeNull();
  });

  it("keeps devices with an unknown model as on/off lights", async () => {
    const { socket, controller: c } = await startController();
    socket.receive({ msg: { cmd: "scan", data: { device: "AA:BB", ip: "192.168.1.20" } } }, "192.168.1.20");
    expect(c.getDeviceByFingerprint("AA:BB")?.sku).toBe("unknown");
  });

  it("drops scan responses without an address", async () => {
    const { socket, controller: c, log } = await startController();
    socket.receive({ msg: { cmd: "scan", data: { device: "AA:BB", sku: "H6046" } } }, "192.168.1.20");
    expect(c.devices).toEqual([]);
    expect(log.warn).toHaveBeenCalledWith("scan response without ip dropped");
  });

  it("logs datagrams it cannot decode", async () => {
    const { socket, log } = await startController();
    socket.receive("garbage", "192.168.1.99", 4003);
    expect(log.warn).toHaveBeenCalledWith('unknown message from 192.168.1.99:4003: "garbage"');
  });
});

describe("LanController manual devices", () => {
  it("unicasts scans to queued addresses until they answer", async () => {
    const { controller: c, socket, discover } = await startController({ updateEnabled: false });

    expect(c.addToDiscoveryQueue("192.168.1.50")).toBe(true);
    expect(c.addToDiscoveryQueue("192.168.1.50")).toBe(false);
    expect(socket.decoded()).toEqual([{ to: "192.168.1.50:4001", cmd: "scan", data: SCAN }]);

    const device = discover("AA:BB", "H6046", "192.168.1.50");
    expect(device.isManual).toBe(true);
    expect([...c.discoveryQueue]).toEqual([]);

    // The manual device keeps getting confirmed at its address.
    await vi.advanceTimersByTimeAsync(10_000);
    expect(socket.decoded().map((d) => d.to)).toEqual(["192.168.1.50:4001", "192.168.1.50:4001"]);
  });

  it("queues addresses given before start", async () => {
    const sockets: FakeSocket[] = [];
    const c = new LanController({
      log: makeLog(),
      updateEnabled: false,
      createSocket: () => {
        const socket = new FakeSocket();
        sockets.push(socket);
        return socket;
      },
    });
    controller = c;
    c.addToDiscoveryQueue("192.168.1.50");
    expect(sockets[0].sent).toHaveLength(0);

    await c.start();
    expect(sockets[0].decoded()).toEqual([{ to: "192.168.1.50:4001", cmd: "scan", data: SCAN }]);
  });

  it("stops scanning an address removed from the queue", async () => {
    const { controller: c, socket } = await startController({ updateEnabled: false });
    c.addToDiscoveryQueue("192.168.1.50");
    expect(c.removeFromDiscoveryQueue("192.168.1.50")).toBe(true);
    await vi.advanceTimersByTimeAsync(10_000);
    expect(socket.sent).toHaveLength(1);
  });
});

describe("LanController status", () => {
  it("applies status responses by sender address", async () => {
    const { socket, discover } = await startController();
    const device = discover("AA:BB", "H6046", "192.168.1.20");
    const onUpdate = vi.fn();
    device.setUpdateHandler(onUpdate);

    socket.receive(statusResponse({ onOff: 1, brightness: 40, color: { r: 1, g: 2, b: 3 } }), "192.168.1.20");
    socket.receive(statusResponse({ onOff: 0, brightness: 99 }), "192.168.1.77");

    expect(device.state).toEqual({ on: true, brightness: 40, color: { r: 1, g: 2, b: 3 }, colorTemperature: 0 });
    expect(onUpdate).toHaveBeenCalledTimes(1);
  });

  it("polls every known device on the command port", async () => {
    const { socket, discover } = await startController();
    discover("AA:BB", "H6046", "192.168.1.20");
    discover("CC:DD", "H6046", "192.168.1.21");
    expect(socket.sent).toHaveLength(0);

    await vi.advanceTimersByTimeAsync(5_000);
    expect(socket.decoded()).toEqual([
      { to: "192.168.1.20:4003", cmd: "devStatus", data: {} },
      { to: "192.168.1.21:4003", cmd: "devStatus", data: {} },
    ]);
  });

  it("stops polling when updates are turned off", async () => {
    const { socket, controller: c, discover } = await startController();
    discover("AA:BB", "H6046", "192.168.1.20");
    c.setUpdateEnabled(false);
    await vi.advanceTimersByTimeAsync(20_000);
    expect(socket.sent).toHaveLength(0);
  });

  it("evicts devices silent for the eviction interval", async () => {
    const onEvicted = vi.fn();
    const { controller: c, discover, setClock } = await startController({ evictEnabled: true, onEvicted });
    const stale = discover("AA:BB", "H6046", "192.168.1.20");

    setClock(29_999);
    discover("CC:DD", "H6046", "192.168.1.21");
    expect(c.devices).toHaveLength(2);

    setClock(30_000);
    discover("CC:DD", "H6046", "192.168.1.21");
    expect(c.getDeviceByFingerprint("AA:BB")).toBeUndefined();
    expect(onEvicted).toHaveBeenCalledWith(stale);
    await expect(stale.turnOn()).rejects.toThrow(DeviceDetachedError);
  });

  it("does not evict while eviction is off", async () => {
    const { controller: c, discover, setClock } = await startController();
    discover("AA:BB", "H6046", "192.168.1.20");
    setClock(60_000);
    discover("CC:DD", "H6046", "192.168.1.21");
    expect(c.devices).toHaveLength(2);
    expect(c.isEvictEnabled).toBe(false);
  });
});

describe("LanController commands", () => {
  it("confirms a power command from the device's status", async () => {
    const { socket, discover } = await startController({ updateEnabled: false });
    const device = discover("AA:BB", "H6046", "192.168.1.20");
    socket.responder = (datagram) => {
      if (datagram.cmd !== "devStatus") return;
      queueMicrotask(() => socket.receive(statusResponse({ onOff: 1, brightness: 100 }), "192.168.1.20"));
    };

    const outcome = device.turnOn();
    await vi.advanceTimersByTimeAsync(100);

    await expect(outcome).resolves.toBe("verified");
    expect(socket.decoded()).toEqual([
      { to: "192.168.1.20:4003", cmd: "turn", data: { value: 1 } },
      { to: "192.168.1.20:4003", cmd: "devStatus", data: {} },
    ]);
  });

  it("clamps color values before sending", async () => {
    const { socket, discover } = await startController({ updateEnabled: false });
    const device = discover("AA:BB", "H6046", "192.168.1.20");

    void device.setRgbColor({ r: 300, g: -1, b: 10.4 });
    void device.setTemperature(12_000);

    expect(socket.decoded()).toEqual([
      { to: "192.168.1.20:4003", cmd: "colorwc", data: { color: { r: 255, g: 0, b: 10 }, colorTemInKelvin: 0 } },
    ]);
    await vi.advanceTimersByTimeAsync(0);
    expect(socket.decoded()[1]).toEqual({
      to: "192.168.1.20:4003",
      cmd: "colorwc",
      data: { color: { r: 0, g: 0, b: 0 }, colorTemInKelvin: 9000 },
    });
  });

  it("supersedes a brightness command with a newer one", async () => {
    const { discover } = await startController({ updateEnabled: false });
    const device = discover("AA:BB", "H6046", "192.168.1.20");
    const first = device.setBrightness(10);
    const second = device.setBrightness(20);

    await expect(first).resolves.toBe("superseded");
    expect(device.state.brightness).toBe(20);
    await controller?.cleanup();
    await expect(second).resolves.toBe("cancelled");
  });

  it("sends segment colors only to valid segments", async () => {
    const { socket, log, discover } = await startController({ updateEnabled: false });
    const strip = discover("AA:BB", "H619A", "192.168.1.20");
    const bulb = discover("CC:DD", "H6046", "192.168.1.21");

    await expect(strip.setSegmentRgbColor(11, { r: 1, g: 2, b: 3 })).resolves.toBe("unsupported");
    await expect(strip.setSegmentRgbColor(0, { r: 1, g: 2, b: 3 })).resolves.toBe("unsupported");
    await expect(bulb.setSegmentRgbColor(1, { r: 1, g: 2, b: 3 })).resolves.toBe("unsupported");
    expect(log.warn).toHaveBeenCalledWith("segment 11 is not valid for device AA:BB");
    expect(log.warn).toHaveBeenCalledWith("segment control is not supported by device CC:DD");
    expect(socket.sent).toHaveLength(0);

    await expect(strip.setSegmentRgbColor(10, { r: 1, g: 2, b: 3 })).resolves.toBe("sent");
    const [datagram] = socket.decoded();
    expect(datagram.to).toBe("192.168.1.20:4003");
    expect(datagram.cmd).toBe("ptReal");
  });

  it("sends scenes by case-insensitive name", async () => {
    const { socket, log, discover } = await startController({ updateEnabled: false });
    const strip = discover("AA:BB", "H619A", "192.168.1.20");
    const bulb = discover("CC:DD", "H6046", "192.168.1.21");

    await expect(strip.setScene("Movie")).resolves.toBe("sent");
    await expect(strip.setScene("disco")).resolves.toBe("unsupported");
    await expect(bulb.setScene("movie")).resolves.toBe("unsupported");

    expect(log.warn).toHaveBeenCalledWith("scene disco is not available for device AA:BB");
    expect(log.warn).toHaveBeenCalledWith("scenes are not supported by device CC:DD");
    expect(socket.decoded()).toEqual([{ to: "192.168.1.20:4003", cmd: "ptReal", data: { command: ["MwUEBAAAAAAAAAAAAAAAAAAAADY="] } }]);
  });

  it("sends raw frames as given", async () => {
    const { socket, discover } = await startController({ updateEnabled: false });
    const device = discover("AA:BB", "H6046", "192.168.1.20");
    await expect(device.sendRawCommand("aa bb 01")).resolves.toBe("sent");
    expect(socket.decoded()).toEqual([{ to: "192.168.1.20:4003", cmd: "ptReal", data: { command: ["qrsB"] } }]);
  });

  it("rejects commands for removed devices", async () => {
    const { controller: c, discover } = await startController();
    const device = discover("AA:BB", "H6046", "192.168.1.20");
    expect(c.removeDevice("AA:BB")).toBe(true);
    expect(c.removeDevice(device)).toBe(false);
    await expect(device.setBrightness(10)).rejects.toThrow(DeviceDetachedError);
  });
});

describe("LanController lifecycle", () => {
  it("cancels commands and closes sockets on cleanup", async () => {
    const { controller: c, socket, discover } = await startController({ discoveryEnabled: true });
    const device = discover("AA:BB", "H6046", "192.168.1.20");
    const pending = device.turnOn();

    await c.cleanup();

    await expect(pending).resolves.toBe("cancelled");
    expect(socket.closed).toBe(true);
    expect(c.devices).toEqual([]);
    const sentBefore = socket.sent.length;
    await vi.advanceTimersByTimeAsync(60_000);
    expect(socket.sent).toHaveLength(sentBefore);
  });

  it("rejects a mask list that does not match the addresses", () => {
    expect(
      () => new LanController({ listenAddresses: ["10.0.0.1", "10.0.1.1"], networkMasks: ["/24"], log: makeLog() }),
    ).toThrow(ConfigurationError);
  });

  it("routes commands through the endpoint on the device's subnet", async () => {
    const { sockets, discover } = await startController({
      listenAddresses: ["10.1.0.10", "10.2.0.10"],
      networkMasks: ["/16", "/16"],
      updateEnabled: false,
    });
    const device = discover("AA:BB", "H6046", "10.2.0.55");
    void device.turnOff();

    expect(sockets[0].sent).toHaveLength(0);
    expect(sockets[1].decoded()).toEqual([{ to: "10.2.0.55:4003", cmd: "turn", data: { value: 0 } }]);
  });
});
