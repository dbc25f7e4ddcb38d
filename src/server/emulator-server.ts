// src/server/emulator-server.ts

import * as net from 'node:net';
import type { AddressInfo } from 'node:net';
import {
  DEFAULT_HOST,
  DEFAULT_IDLE_TIMEOUT_MS,
  DEFAULT_MAX_LINE_LENGTH,
  DEFAULT_PORT,
} from '../constants/constants.js';
import type { ProtocolDefinition } from '../definition/protocol-definition.js';
import { DeviceStateStore } from '../emulator/device-state-store.js';
import { EmulationEngine } from '../emulator/emulation-engine.js';
import { ServerAlreadyListeningError } from '../errors.js';
import rootLogger from '../logger.js';
import type {
  ActivityStats,
  EmulatorServerOptions,
  SessionOptions,
  StateSnapshot,
} from '../types/emulator-types.js';
import { ActivityMonitor } from './activity-monitor.js';
import { Session } from './session.js';

const logger = rootLogger.createLogger('server');

export interface ServerSnapshot {
  model: string;
  state: StateSnapshot;
  clients: string[];
  stats: ActivityStats;
}

/**
 * TCP front end of one emulated device. All sessions share a single state
 * store through one engine.
 */
export class EmulatorServer {
  readonly definition: ProtocolDefinition;
  readonly store: DeviceStateStore;
  readonly engine: EmulationEngine;
  readonly monitor: ActivityMonitor;

  private readonly sessionOptions: SessionOptions;
  private readonly _sessions: Map<string, Session> = new Map();
  private server: net.Server | null = null;

  constructor(
    definition: ProtocolDefinition,
    options: EmulatorServerOptions = {},
    monitor: ActivityMonitor = new ActivityMonitor()
  ) {
    this.definition = definition;
    this.store = new DeviceStateStore(definition, { outOfRange: options.outOfRange });
    this.engine = new EmulationEngine(definition, this.store);
    this.monitor = monitor;
    this.sessionOptions = {
      responseEol: definition.framing.responseEol,
      acceptBareCarriageReturn: definition.framing.commandEol === '\r',
      maxLineLength: options.maxLineLength ?? DEFAULT_MAX_LINE_LENGTH,
      idleTimeout: options.idleTimeout ?? DEFAULT_IDLE_TIMEOUT_MS,
    };
  }

  get sessions(): ReadonlyMap<string, Session> {
    return this._sessions;
  }

  get listening(): boolean {
    return this.server?.listening ?? false;
  }

  /**
   * Starts accepting connections. Port 0 binds a free port.
   * @returns the bound address
   * @throws ServerAlreadyListeningError when called twice
   */
  async listen(port: number = DEFAULT_PORT, host: string = DEFAULT_HOST): Promise<AddressInfo> {
    if (this.server) throw new ServerAlreadyListeningError();

    const server = net.createServer(socket => this.accept(socket));
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error): void => {
        this.server = null;
        reject(err);
      };
      server.once('error', onError);
      server.listen(port, host, () => {
        server.off('error', onError);
        server.on('error', (err: Error) => logger.error('Listener error', err));
        resolve();
      });
    });

    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error(`Unexpected listener address: ${String(address)}`);
    }
    logger.info(`Emulating ${this.definition.modelKey} on ${address.address}:${address.port}`, {
      model: this.definition.modelKey,
    });
    return address;
  }

  /** Closes every session and the listener. */
  async close(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;

    for (const session of this._sessions.values()) session.close();
    this._sessions.clear();

    await new Promise<void>((resolve, reject) => {
      server.close(err => {
        if (err) reject(err);
        else resolve();
      });
    });
    logger.info('Server closed', { model: this.definition.modelKey });
  }

  snapshot(): ServerSnapshot {
    return {
      model: this.definition.modelKey,
      state: this.store.snapshot(),
      clients: this.monitor.clients(),
      stats: this.monitor.stats(),
    };
  }

  private accept(socket: net.Socket): void {
    const session = new Session(socket, this.engine, this.sessionOptions, {
      onResult: (s, result) => this.monitor.record(s.clientId, result),
      onClose: s => {
        this._sessions.delete(s.id);
        this.monitor.clientDisconnected(s.clientId);
      },
    });
    this._sessions.set(session.id, session);
    this.monitor.clientConnected(session.clientId);
    session.start();
  }
}
