import { firstOf, isAbortError, sleep, throwIfAborted, WakeSignal } from "../util/abort.js";
import type { Logger } from "../util/logger.js";
import type { LanDevice } from "./device.js";
import { statusMessage, type OutboundMessage } from "./messages.js";
import type { ColorTarget, CommandOutcome, ReportedState, StatefulCommandKind } from "./types.js";

/** Delays between resends, in milliseconds. */
export const BACKOFF_SCHEDULE_MS: readonly number[] = [200, 300, 500, 1000, 1500, 2000, 3000, 4000, 5000, 6000, 7000];
export const DEFAULT_MAX_RETRIES = 10;
/** Gap between a command and the status request that checks it. */
export const STATUS_REQUEST_DELAY_MS = 100;

const RGB_TOLERANCE = 5;
const KELVIN_TOLERANCE = 100;

export type VerifyPredicate = (state: ReportedState) => boolean;

export const verifyPower =
  (on: boolean): VerifyPredicate =>
  (state) =>
    state.on === on;

export const verifyBrightness =
  (percent: number): VerifyPredicate =>
  (state) =>
    state.brightness === percent;

export function verifyColor(target: ColorTarget): VerifyPredicate {
  if ("rgb" in target) {
    const { r, g, b } = target.rgb;
    return ({ color }) =>
      Math.abs(color.r - r) <= RGB_TOLERANCE &&
      Math.abs(color.g - g) <= RGB_TOLERANCE &&
      Math.abs(color.b - b) <= RGB_TOLERANCE;
  }
  const kelvin = target.temperature;
  return (state) => Math.abs(state.colorTemperature - kelvin) <= KELVIN_TOLERANCE;
}

export type CommandExecutorDeps = {
  send: (device: LanDevice, message: OutboundMessage) => void;
  log: Logger;
  maxRetries?: number;
};

class Sequence {
  readonly controller = new AbortController();
  cancelReason: "superseded" | "cancelled" = "cancelled";
  done: Promise<CommandOutcome> = Promise.resolve("cancelled");

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  cancel(reason: "superseded" | "cancelled"): void {
    this.cancelReason = reason;
    this.controller.abort();
  }
}

type Verification = {
  predicate: VerifyPredicate;
  wake: WakeSignal;
};

/**
 * Turns fire-and-forget datagrams into confirmable commands. At most one
 * sequence runs per (device, command kind); a new command cancels the old
 * sequence and waits for it to unwind before sending anything.
 */
export class CommandExecutor {
  private readonly sequences = new Map<string, Sequence>();
  private readonly verifications = new Map<string, Verification>();
  private readonly schedule: readonly number[];
  private readonly deps: CommandExecutorDeps;

  constructor(deps: CommandExecutorDeps) {
    this.deps = deps;
    this.schedule = BACKOFF_SCHEDULE_MS.slice(0, deps.maxRetries ?? DEFAULT_MAX_RETRIES);
  }

  get activeCount(): number {
    return this.sequences.size;
  }

  execute(
    device: LanDevice,
    kind: StatefulCommandKind,
    message: OutboundMessage,
    verify?: VerifyPredicate,
  ): Promise<CommandOutcome> {
    const key = `${device.fingerprint}:${kind}`;
    const previous = this.sequences.get(key);
    previous?.cancel("superseded");

    const sequence = new Sequence();
    this.sequences.set(key, sequence);
    sequence.done = this.run(sequence, previous, device, message, verify).finally(() => {
      if (this.sequences.get(key) === sequence) this.sequences.delete(key);
    });
    return sequence.done;
  }

  /** Single send with no retries, for commands that are not worth confirming. */
  sendOnce(device: LanDevice, message: OutboundMessage): CommandOutcome {
    this.deps.send(device, message);
    return "sent";
  }

  /** Inbound status hook: wakes the device's sequence if its predicate now holds. */
  notifyStatus(device: LanDevice): void {
    const verification = this.verifications.get(device.fingerprint);
    if (verification && verification.predicate(device.state)) verification.wake.fire();
  }

  async cancelAll(): Promise<void> {
    const running = [...this.sequences.values()];
    for (const sequence of running) sequence.cancel("cancelled");
    await Promise.allSettled(running.map((s) => s.done));
  }

  private async run(
    sequence: Sequence,
    previous: Sequence | undefined,
    device: LanDevice,
    message: OutboundMessage,
    verify: VerifyPredicate | undefined,
  ): Promise<CommandOutcome> {
    // The previous owner's caller sees its result; here we only need it gone.
    if (previous) await Promise.allSettled([previous.done]);
    try {
      throwIfAborted(sequence.signal);
      const outcome = verify
        ? await this.sendAndVerify(sequence.signal, device, message, verify)
        : await this.sendWithRetry(sequence.signal, device, message);
      this.deps.log.debug(`${message.cmd} to ${device.fingerprint}: ${outcome}`);
      return outcome;
    } catch (err) {
      if (isAbortError(err)) return sequence.cancelReason;
      throw err;
    }
  }

  private async sendWithRetry(
    signal: AbortSignal,
    device: LanDevice,
    message: OutboundMessage,
  ): Promise<CommandOutcome> {
    await this.sendThenPoll(signal, device, message);
    for (const delay of this.schedule) {
      await sleep(delay, signal);
      await this.sendThenPoll(signal, device, message);
    }
    return "exhausted";
  }

  private async sendAndVerify(
    signal: AbortSignal,
    device: LanDevice,
    message: OutboundMessage,
    predicate: VerifyPredicate,
  ): Promise<CommandOutcome> {
    const verification: Verification = { predicate, wake: new WakeSignal() };
    this.verifications.set(device.fingerprint, verification);
    try {
      await this.sendThenPoll(signal, device, message);
      for (const delay of this.schedule) {
        const winner = await firstOf(
          [
            ["wake", (s) => verification.wake.wait(s)],
            ["delay", (s) => sleep(delay, s)],
          ],
          signal,
        );
        if (winner === "wake") {
          if (predicate(device.state)) return "verified";
          verification.wake.reset();
        }
        await this.sendThenPoll(signal, device, message);
      }
      return "exhausted";
    } finally {
      if (this.verifications.get(device.fingerprint) === verification) {
        this.verifications.delete(device.fingerprint);
      }
    }
  }

  private async sendThenPoll(signal: AbortSignal, device: LanDevice, message: OutboundMessage): Promise<void> {
    throwIfAborted(signal);
    this.deps.send(device, message);
    await sleep(STATUS_REQUEST_DELAY_MS, signal);
    this.deps.send(device, statusMessage());
  }
}
