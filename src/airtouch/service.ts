/**
 * AirTouch Module - Service Layer
 *
 * Side effects happen here: UDP discovery broadcasts and the TCP connection
 * to each console. Decoded status frames update the console state and are
 * dispatched to subscribers in the order they arrive.
 */
import dgram from "node:dgram";
import net from "node:net";
import type { Duplex } from "node:stream";

import { createLogger } from "../logger.js";
import {
  type AirTouchError,
  connectionClosed,
  connectionFailed,
  formatAirTouchError,
} from "./errors.js";
import type {
  AcAbility,
  AcStatus,
  AirConditioner,
  ConsoleMessage,
  ControllerHandle,
  DiscoverControllers,
  DiscoveredConsole,
  Subscriber,
  ZoneStatus,
} from "./schema.js";
import {
  CONSOLE_PORT,
  DISCOVERY_PORT,
  DISCOVERY_REQUEST,
  EXTENDED_AC_ABILITY,
  EXTENDED_ZONE_NAMES,
  SUBTYPE_AC_STATUS,
  SUBTYPE_ZONE_STATUS,
  assembleAirConditioners,
  decodeMessage,
  encodeExtendedRequest,
  encodeStatusRequest,
  extractFrames,
  owningAcId,
  parseDiscoveryReply,
} from "./transform.js";

const log = createLogger("airtouch");
const discoveryLog = createLogger("discovery");

const BROADCAST_ADDRESS = "255.255.255.255";

/**
 * Opens the byte stream to a console.
 */
export type ConnectConsole = (host: string, port: number) => Promise<Duplex>;

/**
 * Open a TCP connection, resolving once it is established.
 */
export const connectTcp: ConnectConsole = (host, port) =>
  new Promise((resolve, reject) => {
    const socket = net.createConnection({ host, port });
    socket.once("error", reject);
    socket.once("connect", () => {
      socket.off("error", reject);
      resolve(socket);
    });
  });

// =============================================================================
// Controller
// =============================================================================

/**
 * Live connection to one AirTouch 5 console.
 */
export class AirTouchController implements ControllerHandle {
  private stream: Duplex | null = null;
  private receiveBuffer: Buffer = Buffer.alloc(0);
  private messageId = 0;

  private readonly abilities = new Map<number, AcAbility>();
  private readonly acs = new Map<number, AcStatus>();
  private readonly zones = new Map<number, ZoneStatus>();
  private readonly zoneNames = new Map<number, string>();
  private zoneStatusReceived = false;
  private closing = false;
  private lostReason: string | null = null;

  private readonly subscribers = new Map<number, Subscriber[]>();
  private disconnectListeners: Array<(reason: string) => void> = [];
  private settleInit: ((ready: boolean) => void) | null = null;

  constructor(
    private readonly info: DiscoveredConsole,
    private readonly connect: ConnectConsole = connectTcp,
    private readonly port: number = CONSOLE_PORT,
  ) {}

  get name(): string {
    return this.info.name;
  }

  get host(): string {
    return this.info.host;
  }

  get airConditioners(): ReadonlyArray<AirConditioner> {
    return assembleAirConditioners({
      abilities: this.abilities,
      acs: this.acs,
      zones: this.zones,
      zoneNames: this.zoneNames,
    });
  }

  async init(): Promise<boolean> {
    log.info({ host: this.host, port: this.port }, "Connecting to AirTouch console...");

    try {
      this.stream = await this.connect(this.host, this.port);
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      this.logError(connectionFailed(this.host, cause.message, cause));
      return false;
    }

    const ready = new Promise<boolean>((resolve) => {
      this.settleInit = resolve;
    });

    this.stream.on("data", (chunk: Buffer) => this.handleData(chunk));
    this.stream.on("error", (error: Error) => {
      this.logError(connectionFailed(this.host, error.message, error));
      this.dropConnection(error.message);
    });
    this.stream.on("close", () => {
      if (this.closing) return;
      this.logError(connectionClosed(this.host, "console closed the connection"));
      this.dropConnection("console closed the connection");
    });

    this.send(encodeExtendedRequest(this.nextMessageId(), EXTENDED_AC_ABILITY));
    this.send(encodeExtendedRequest(this.nextMessageId(), EXTENDED_ZONE_NAMES));
    this.send(encodeStatusRequest(this.nextMessageId(), SUBTYPE_AC_STATUS));
    this.send(encodeStatusRequest(this.nextMessageId(), SUBTYPE_ZONE_STATUS));

    return ready;
  }

  subscribe(acId: number, subscriber: Subscriber): void {
    const existing = this.subscribers.get(acId) ?? [];
    this.subscribers.set(acId, [...existing, subscriber]);
  }

  onDisconnect(listener: (reason: string) => void): void {
    if (this.lostReason !== null) {
      listener(this.lostReason);
      return;
    }
    this.disconnectListeners.push(listener);
  }

  async close(): Promise<void> {
    this.closing = true;
    this.subscribers.clear();
    this.disconnectListeners = [];
    this.finishInit(false);

    const stream = this.stream;
    this.stream = null;
    if (!stream || stream.destroyed) {
      return;
    }

    await new Promise<void>((resolve) => {
      stream.once("close", () => resolve());
      stream.destroy();
    });
  }

  // ===========================================================================
  // Receive Path
  // ===========================================================================

  private handleData(chunk: Buffer): void {
    const scan = extractFrames(Buffer.concat([this.receiveBuffer, chunk]));
    this.receiveBuffer = scan.rest;

    if (scan.corrupt > 0) {
      log.warn({ host: this.host, corrupt: scan.corrupt }, "Dropped frames with bad CRC");
    }

    for (const frame of scan.frames) {
      this.apply(decodeMessage(frame));
    }
  }

  private apply(message: ConsoleMessage): void {
    switch (message.type) {
      case "AC_ABILITY":
        for (const ability of message.abilities) {
          this.abilities.set(ability.acId, ability);
        }
        log.debug({ host: this.host, acs: message.abilities.length }, "AC abilities received");
        break;

      case "ZONE_NAMES":
        for (const zone of message.names) {
          this.zoneNames.set(zone.zoneId, zone.name);
        }
        log.debug({ host: this.host, zones: message.names.length }, "Zone names received");
        break;

      case "AC_STATUS":
        for (const ac of message.acs) {
          this.acs.set(ac.acId, ac);
        }
        this.checkReady();
        for (const ac of message.acs) {
          this.notify(ac.acId);
        }
        break;

      case "ZONE_STATUS": {
        for (const zone of message.zones) {
          this.zones.set(zone.zoneId, zone);
        }
        this.zoneStatusReceived = true;
        this.checkReady();

        const acIds = [...this.acs.keys()];
        const affected = new Set<number>();
        for (const zone of message.zones) {
          const acId = owningAcId(zone.zoneId, this.abilities, acIds);
          if (acId !== null) {
            affected.add(acId);
          }
        }
        for (const acId of affected) {
          this.notify(acId);
        }
        break;
      }

      case "UNSUPPORTED":
        log.trace(
          { host: this.host, messageType: message.messageType, subType: message.subType },
          "Ignoring unsupported message",
        );
        break;
    }
  }

  private notify(acId: number): void {
    for (const subscriber of this.subscribers.get(acId) ?? []) {
      try {
        subscriber.onUpdate(acId);
      } catch (error) {
        log.error(
          { host: this.host, acId, error: error instanceof Error ? error.message : String(error) },
          "Subscriber failed",
        );
      }
    }
  }

  private checkReady(): void {
    if (this.acs.size > 0 && this.zoneStatusReceived) {
      this.finishInit(true);
    }
  }

  /**
   * A dropped stream fails a pending init; after init it is reported once
   * to the disconnect listeners.
   */
  private dropConnection(reason: string): void {
    if (this.settleInit) {
      this.finishInit(false);
      return;
    }
    if (this.closing || this.lostReason !== null) {
      return;
    }

    this.lostReason = reason;
    const listeners = this.disconnectListeners;
    this.disconnectListeners = [];
    for (const listener of listeners) {
      listener(reason);
    }
  }

  private finishInit(ready: boolean): void {
    const settle = this.settleInit;
    this.settleInit = null;
    settle?.(ready);
  }

  // ===========================================================================
  // Send Path
  // ===========================================================================

  private send(frame: Buffer): void {
    log.trace({ host: this.host, bytes: frame.toString("hex") }, "Sending frame");
    this.stream?.write(frame);
  }

  private nextMessageId(): number {
    this.messageId = (this.messageId % 255) + 1;
    return this.messageId;
  }

  private logError(error: AirTouchError): void {
    log.error({ host: this.host, errorType: error.type }, formatAirTouchError(error));
  }
}

// =============================================================================
// Discovery
// =============================================================================

export type DiscoverySettings = Readonly<{
  /** How long to listen for replies */
  windowMs: number;
  port?: number;
}>;

/**
 * Create the discovery function used by the orchestrator.
 *
 * Broadcasts the device-info request (or sends it to the target host) and
 * collects replies until the window closes. A targeted discovery returns as
 * soon as the target answers.
 */
export function createAirTouchDiscovery(
  settings: DiscoverySettings,
  connect: ConnectConsole = connectTcp,
): DiscoverControllers {
  const port = settings.port ?? DISCOVERY_PORT;

  return (targetHost) =>
    new Promise<ControllerHandle[]>((resolve, reject) => {
      const socket = dgram.createSocket("udp4");
      const found = new Map<string, DiscoveredConsole>();
      let timer: ReturnType<typeof setTimeout> | undefined;
      let settled = false;

      const finish = (error?: Error) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        socket.close();

        if (error) {
          reject(error);
          return;
        }

        resolve(
          [...found.values()].map((info) => new AirTouchController(info, connect)),
        );
      };

      socket.on("message", (message, remote) => {
        const reply = message.toString("latin1");
        const discovered = parseDiscoveryReply(reply);
        if (!discovered) {
          discoveryLog.debug({ from: remote.address, reply }, "Ignoring discovery reply");
          return;
        }

        discoveryLog.debug({ host: discovered.host, name: discovered.name }, "Console answered");
        found.set(discovered.airtouchId, discovered);

        if (targetHost && (remote.address === targetHost || discovered.host === targetHost)) {
          finish();
        }
      });

      socket.once("error", (error) => finish(error));

      socket.bind(() => {
        const address = targetHost ?? BROADCAST_ADDRESS;
        socket.setBroadcast(targetHost === null);

        discoveryLog.debug({ address, port }, "Sending discovery request");
        socket.send(DISCOVERY_REQUEST, port, address, (error) => {
          if (error) {
            finish(error);
          }
        });

        timer = setTimeout(() => finish(), settings.windowMs);
      });
    });
}
