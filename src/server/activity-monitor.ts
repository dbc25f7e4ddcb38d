// src/server/activity-monitor.ts

import { COMMAND_LOG_SIZE, ERROR_RESPONSE_PATTERNS } from '../constants/constants.js';
import type { ActivityStats, CommandLogEntry, EngineResult } from '../types/emulator-types.js';

/**
 * Whether a response has the shape devices use to report a failure.
 */
export function isErrorResponse(response: string): boolean {
  if (!response) return false;
  const upper = response.toUpperCase();
  return ERROR_RESPONSE_PATTERNS.some(pattern => pattern.test(upper));
}

/**
 * Recent commands, counters and connected clients of one emulator server.
 */
export class ActivityMonitor {
  private readonly capacity: number;
  private readonly entries: CommandLogEntry[] = [];
  private readonly connected = new Set<string>();
  private readonly counters: ActivityStats = { commands: 0, connections: 0, errors: 0 };

  constructor(capacity: number = COMMAND_LOG_SIZE) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Command log capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  clientConnected(clientId: string): void {
    this.connected.add(clientId);
    this.counters.connections += 1;
  }

  clientDisconnected(clientId: string): void {
    this.connected.delete(clientId);
  }

  record(clientId: string, result: EngineResult, timestamp: Date = new Date()): CommandLogEntry {
    const response = result.response ?? '';
    const handled = result.outcome === 'query' || result.outcome === 'set';
    const entry: CommandLogEntry = {
      timestamp,
      clientId,
      command: result.input,
      response,
      isError: !handled || isErrorResponse(response),
    };

    this.entries.push(entry);
    if (this.entries.length > this.capacity) this.entries.shift();

    this.counters.commands += 1;
    if (entry.isError) this.counters.errors += 1;
    return entry;
  }

  /** Logged commands, oldest first */
  log(): CommandLogEntry[] {
    return [...this.entries];
  }

  stats(): ActivityStats {
    return { ...this.counters };
  }

  clients(): string[] {
    return Array.from(this.connected);
  }
}
