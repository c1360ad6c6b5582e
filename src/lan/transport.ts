import dgram from "node:dgram";
import type { RemoteInfo } from "node:dgram";
import { ConfigurationError } from "../util/errors.js";
import { childLogger, errorMessage, type Logger } from "../util/logger.js";
import { WILDCARD_ADDRESS } from "./types.js";
import { inSubnet, isMulticast, likelySameNetwork, parseIPv4, subnetOf, type Subnet } from "./network.js";

const MULTICAST_TTL = 2;

/** The slice of `dgram.Socket` the transport uses. */
export interface UdpSocket {
  bind(options: { port: number; address: string }, callback?: () => void): unknown;
  send(
    msg: Uint8Array,
    port: number,
    address: string,
    callback?: (error: Error | null, bytes: number) => void,
  ): unknown;
  setBroadcast(flag: boolean): void;
  setMulticastTTL(ttl: number): unknown;
  setMulticastInterface(multicastInterface: string): void;
  addMembership(multicastAddress: string, multicastInterface?: string): void;
  dropMembership(multicastAddress: string, multicastInterface?: string): void;
  close(callback?: () => void): unknown;
  on(event: "message", listener: (msg: Buffer, rinfo: RemoteInfo) => void): unknown;
  on(event: "error", listener: (err: Error) => void): unknown;
  once(event: "error", listener: (err: Error) => void): unknown;
  removeListener(event: "error", listener: (err: Error) => void): unknown;
}

export type DatagramHandler = (data: Buffer, sender: RemoteInfo) => void;

function createUdpSocket(): UdpSocket {
  return dgram.createSocket({ type: "udp4", reuseAddr: true });
}

type EndpointOptions = {
  address: string;
  port: number;
  broadcastAddress: string;
  broadcastPort: number;
  subnet: Subnet | null;
  socket: UdpSocket;
  log: Logger;
  onMessage: DatagramHandler;
};

/** One UDP socket bound to one local address. */
export class LanEndpoint {
  readonly address: string;
  readonly subnet: Subnet | null;
  private readonly opts: EndpointOptions;
  private state: "idle" | "bound" | "closed" = "idle";
  private closing: Promise<void> | null = null;

  constructor(opts: EndpointOptions) {
    this.opts = opts;
    this.address = opts.address;
    this.subnet = opts.subnet;
    opts.socket.on("message", (msg, rinfo) => {
      if (msg.length > 0) opts.onMessage(msg, rinfo);
    });
  }

  get isWildcard(): boolean {
    return this.address === WILDCARD_ADDRESS;
  }

  get isBound(): boolean {
    return this.state === "bound";
  }

  private get joinsMulticast(): boolean {
    return isMulticast(this.opts.broadcastAddress);
  }

  private get membershipInterface(): string | undefined {
    return this.isWildcard ? undefined : this.address;
  }

  async bind(): Promise<void> {
    const { socket, port, address, log } = this.opts;
    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error) => reject(err);
      socket.once("error", onError);
      socket.bind({ port, address }, () => {
        socket.removeListener("error", onError);
        resolve();
      });
    });
    this.state = "bound";

    socket.setBroadcast(true);
    if (this.joinsMulticast) {
      socket.setMulticastTTL(MULTICAST_TTL);
      if (!this.isWildcard) socket.setMulticastInterface(address);
      socket.addMembership(this.opts.broadcastAddress, this.membershipInterface);
    }
    socket.on("error", (err) => log.warn(`socket error: ${err.message}`));
    log.debug(`listening on ${address}:${port}`);
  }

  send(payload: Uint8Array, host: string, port: number): void {
    const { socket, log } = this.opts;
    if (this.state !== "bound") {
      log.debug(`dropping datagram to ${host}:${port}, endpoint is ${this.state}`);
      return;
    }
    socket.send(payload, port, host, (err) => {
      if (err) log.warn(`send to ${host}:${port} failed: ${err.message}`);
    });
  }

  broadcast(payload: Uint8Array): void {
    this.send(payload, this.opts.broadcastAddress, this.opts.broadcastPort);
  }

  /** Resolves once the socket has reported that it is closed. */
  close(): Promise<void> {
    if (this.closing) return this.closing;
    const { socket, log } = this.opts;
    if (this.state === "bound" && this.joinsMulticast) {
      try {
        socket.dropMembership(this.opts.broadcastAddress, this.membershipInterface);
      } catch (err) {
        log.debug(`leaving multicast group failed: ${errorMessage(err)}`);
      }
    }
    this.state = "closed";
    this.closing = new Promise<void>((resolve) => {
      socket.close(() => {
        log.debug("disconnected");
        resolve();
      });
    });
    return this.closing;
  }
}

export type TransportOptions = {
  listenAddresses: string[];
  listenPort: number;
  broadcastAddress: string;
  broadcastPort: number;
  /** One mask per listening address, as "/24", "24" or "255.255.255.0". */
  networkMasks?: string[];
  log: Logger;
  onMessage: DatagramHandler;
  createSocket?: () => UdpSocket;
};

/**
 * Owns one endpoint per listening address and picks the one most likely to
 * reach a given device.
 */
export class TransportManager {
  readonly endpoints: ReadonlyArray<LanEndpoint>;
  private readonly primary: LanEndpoint;
  private readonly hasMasks: boolean;
  private readonly log: Logger;

  constructor(opts: TransportOptions) {
    const { listenAddresses, networkMasks } = opts;
    if (listenAddresses.length === 0) {
      throw new ConfigurationError("At least one listening address is required");
    }
    if (networkMasks && networkMasks.length !== listenAddresses.length) {
      throw new ConfigurationError(
        `Number of network masks (${networkMasks.length}) must match number of listening addresses (${listenAddresses.length})`,
      );
    }

    this.log = opts.log;
    this.hasMasks = networkMasks !== undefined;
    const createSocket = opts.createSocket ?? createUdpSocket;

    const endpoints = listenAddresses.map((address, i) => {
      let subnet: Subnet | null = null;
      const mask = networkMasks?.[i];
      if (mask !== undefined && address !== WILDCARD_ADDRESS) {
        subnet = subnetOf(address, mask);
        if (!subnet) {
          opts.log.warn(`invalid network mask "${mask}" for ${address}; interface skipped for subnet matching`);
        }
      }
      return new LanEndpoint({
        address,
        port: opts.listenPort,
        broadcastAddress: opts.broadcastAddress,
        broadcastPort: opts.broadcastPort,
        subnet,
        socket: createSocket(),
        log: childLogger(opts.log, address),
        onMessage: opts.onMessage,
      });
    });
    this.endpoints = endpoints;
    this.primary = endpoints[0];
  }

  async start(): Promise<void> {
    await Promise.all(this.endpoints.map((e) => e.bind()));
  }

  selectEndpoint(destination: string): LanEndpoint {
    if (this.endpoints.length === 1) return this.primary;
    // Malformed and IPv6 destinations never match anything below.
    if (parseIPv4(destination) === null) return this.primary;

    const candidates = this.endpoints.filter((e) => !e.isWildcard);
    const match = this.hasMasks
      ? candidates.find((e) => e.subnet !== null && inSubnet(destination, e.subnet))
      : candidates.find((e) => likelySameNetwork(e.address, destination));
    if (match) return match;

    return candidates[0] ?? this.primary;
  }

  broadcast(payload: Uint8Array): void {
    for (const endpoint of this.endpoints) endpoint.broadcast(payload);
  }

  sendTo(payload: Uint8Array, host: string, port: number): void {
    const endpoint = this.selectEndpoint(host);
    this.log.debug(`sending to ${host}:${port} via ${endpoint.address}`);
    endpoint.send(payload, host, port);
  }

  close(): Promise<void> {
    return Promise.all(this.endpoints.map((e) => e.close())).then(() => undefined);
  }
}
