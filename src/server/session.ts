// src/server/session.ts

import { randomUUID } from 'node:crypto';
import type { Socket } from 'node:net';
import { Mutex } from 'async-mutex';
import type { EmulationEngine } from '../emulator/emulation-engine.js';
import rootLogger from '../logger.js';
import type { EngineResult, SessionOptions } from '../types/emulator-types.js';
import { printable } from '../utils/utils.js';
import { LineFramer } from './line-framer.js';

const logger = rootLogger.createLogger('session');

export interface SessionHooks {
  onResult?: (session: Session, result: EngineResult) => void;
  onClose?: (session: Session) => void;
}

/**
 * One client connection. Lines are handled strictly in arrival order; the
 * engine serializes them against other sessions of the same device.
 */
export class Session {
  readonly id: string = randomUUID();
  readonly clientId: string;

  private readonly socket: Socket;
  private readonly engine: EmulationEngine;
  private readonly options: SessionOptions;
  private readonly hooks: SessionHooks;
  private readonly framer: LineFramer;
  private readonly queue: Mutex = new Mutex();
  private _closed: boolean = false;
  private _commands: number = 0;

  constructor(socket: Socket, engine: EmulationEngine, options: SessionOptions, hooks: SessionHooks = {}) {
    this.socket = socket;
    this.engine = engine;
    this.options = options;
    this.hooks = hooks;
    this.clientId = `${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? 0}`;
    this.framer = new LineFramer({
      acceptBareCarriageReturn: options.acceptBareCarriageReturn,
      maxLineLength: options.maxLineLength,
    });
  }

  get closed(): boolean {
    return this._closed;
  }

  /** Lines handed to the engine so far */
  get commands(): number {
    return this._commands;
  }

  start(): void {
    this.socket.setNoDelay(true);
    this.socket.setTimeout(this.options.idleTimeout);

    this.socket.on('data', (data: Buffer) => this.onData(data));
    this.socket.on('timeout', () => {
      logger.info('Idle timeout, closing', { clientId: this.clientId });
      this.close();
    });
    this.socket.on('error', (err: Error) => {
      logger.warn('Connection error', err.message, { clientId: this.clientId });
    });
    this.socket.on('close', () => {
      this._closed = true;
      logger.info('Client disconnected', { clientId: this.clientId, commands: this._commands });
      this.hooks.onClose?.(this);
    });

    logger.info('Client connected', { clientId: this.clientId });
  }

  close(): void {
    if (this._closed) return;
    this._closed = true;
    this.socket.destroy();
  }

  private onData(data: Buffer): void {
    const { lines, discarded } = this.framer.push(data.toString('latin1'));
    if (discarded > 0) {
      logger.warn('Discarded over-long line', {
        clientId: this.clientId,
        maxLineLength: this.options.maxLineLength,
      });
    }
    for (const line of lines) this.enqueue(line);
  }

  private enqueue(line: string): void {
    this.queue
      .runExclusive(() => this.dispatch(line))
      .catch((err: unknown) => {
        logger.warn('Write failed, closing', err instanceof Error ? err.message : String(err), {
          clientId: this.clientId,
        });
        this.close();
      });
  }

  private async dispatch(line: string): Promise<void> {
    if (this._closed) return;

    this._commands += 1;
    logger.debug('Received', { clientId: this.clientId, command: line });
    const result = await this.engine.handle(line, { clientId: this.clientId });
    this.hooks.onResult?.(this, result);

    if (result.response === null || this._closed) return;
    logger.debug('Sending', printable(result.response), { clientId: this.clientId });
    await this.write(result.response + this.options.responseEol);
  }

  private write(text: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.socket.write(Buffer.from(text, 'latin1'), (err?: Error | null) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }
}
