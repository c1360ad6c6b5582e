import { EventEmitter } from "node:events";
import type { RemoteInfo } from "node:dgram";
import { vi } from "vitest";
import type { Logger } from "../util/logger.js";
import type { UdpSocket } from "./transport.js";

export type SentDatagram = { payload: Buffer; port: number; address: string };

export type DecodedDatagram = { to: string; cmd: string; data: unknown };

/** In-process stand-in for a dgram socket. */
export class FakeSocket extends EventEmitter implements UdpSocket {
  readonly sent: SentDatagram[] = [];
  readonly memberships = new Set<string>();
  bound: { port: number; address: string } | null = null;
  broadcastEnabled = false;
  multicastTTL: number | null = null;
  multicastInterface: string | null = null;
  closed = false;
  bindError: Error | null = null;
  /** Called for every datagram sent, e.g. to play a device answering. */
  responder: ((datagram: DecodedDatagram) => void) | null = null;

  bind(options: { port: number; address: string }, callback?: () => void): void {
    const err = this.bindError;
    if (err) {
      queueMicrotask(() => this.emit("error", err));
      return;
    }
    this.bound = options;
    queueMicrotask(() => callback?.());
  }

  send(
    msg: Uint8Array,
    port: number,
    address: string,
    callback?: (error: Error | null, bytes: number) => void,
  ): void {
    const payload = Buffer.from(msg);
    this.sent.push({ payload, port, address });
    callback?.(null, payload.length);
    this.responder?.(decodeDatagram({ payload, port, address }));
  }

  setBroadcast(flag: boolean): void {
    this.broadcastEnabled = flag;
  }

  setMulticastTTL(ttl: number): number {
    this.multicastTTL = ttl;
    return ttl;
  }

  setMulticastInterface(multicastInterface: string): void {
    this.multicastInterface = multicastInterface;
  }

  addMembership(multicastAddress: string, multicastInterface?: string): void {
    this.memberships.add(`${multicastAddress}@${multicastInterface ?? "*"}`);
  }

  dropMembership(multicastAddress: string, multicastInterface?: string): void {
    this.memberships.delete(`${multicastAddress}@${multicastInterface ?? "*"}`);
  }

  close(callback?: () => void): void {
    this.closed = true;
    queueMicrotask(() => {
      callback?.();
      this.emit("close");
    });
  }

  /** Delivers a JSON datagram as if `address:port` had sent it. */
  receive(json: unknown, address: string, port = 4003): void {
    const msg = Buffer.from(JSON.stringify(json), "utf8");
    const rinfo: RemoteInfo = { address, family: "IPv4", port, size: msg.length };
    this.emit("message", msg, rinfo);
  }

  decoded(): DecodedDatagram[] {
    return this.sent.map(decodeDatagram);
  }
}

export function decodeDatagram(datagram: SentDatagram): DecodedDatagram {
  const parsed: { msg: { cmd: string; data: unknown } } = JSON.parse(datagram.payload.toString("utf8"));
  return { to: `${datagram.address}:${datagram.port}`, cmd: parsed.msg.cmd, data: parsed.msg.data };
}

export function makeLog(): Logger & {
  debug: ReturnType<typeof vi.fn>;
  info: ReturnType<typeof vi.fn>;
  warn: ReturnType<typeof vi.fn>;
  error: ReturnType<typeof vi.fn>;
} {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export function scanResponse(device: string, sku: string, ip: string) {
  return { msg: { cmd: "scan", data: { device, sku, ip } } };
}

export function statusResponse(state: {
  onOff: 0 | 1;
  brightness: number;
  color?: { r: number; g: number; b: number };
  colorTemInKelvin?: number;
}) {
  return {
    msg: {
      cmd: "devStatus",
      data: {
        onOff: state.onOff,
        brightness: state.brightness,
        color: state.color ?? { r: 0, g: 0, b: 0 },
        colorTemInKelvin: state.colorTemInKelvin ?? 0,
      },
    },
  };
}
