// src/emulator/emulation-engine.ts

import type { ProtocolDefinition } from '../definition/protocol-definition.js';
import rootLogger from '../logger.js';
import type {
  CommandSpec,
  EngineResult,
  MatchedParam,
  StateValue,
  WriteBinding,
} from '../types/emulator-types.js';
import { suggestCommands } from '../utils/suggest.js';
import { findSpelling } from '../utils/values.js';
import { CommandMatcher } from './command-matcher.js';
import { DeviceStateStore } from './device-state-store.js';
import { ResponseRenderer } from './response-renderer.js';

const logger = rootLogger.createLogger('engine');

export interface HandleContext {
  clientId?: string;
}

/**
 * Turns one command line into at most one response line.
 *
 * Matching, the state write and rendering run inside a single store critical
 * section, so a response always reflects the state its own command produced.
 * The engine keeps nothing between commands.
 */
export class EmulationEngine {
  readonly definition: ProtocolDefinition;
  readonly store: DeviceStateStore;

  private readonly matcher: CommandMatcher;
  private readonly renderer: ResponseRenderer;

  constructor(definition: ProtocolDefinition, store: DeviceStateStore = new DeviceStateStore(definition)) {
    this.definition = definition;
    this.store = store;
    this.matcher = new CommandMatcher(definition);
    this.renderer = new ResponseRenderer(definition);
  }

  /**
   * Processes one line. Never rejects: an unexpected failure is logged and
   * reported as the `failed` outcome with no response.
   */
  async handle(line: string, context: HandleContext = {}): Promise<EngineResult> {
    const input = line.trim();
    const result = await this.store.exclusive(() => this.process(input, context));
    if (result.outcome === 'unmatched' && logger.isLevelEnabled('debug')) {
      logger.debug('No command matches', {
        model: this.definition.modelKey,
        clientId: context.clientId,
        command: input,
        suggestions: suggestCommands(input, this.definition).join(', '),
      });
    }
    return result;
  }

  private process(input: string, context: HandleContext): EngineResult {
    const logContext = { model: this.definition.modelKey, clientId: context.clientId, command: input };
    try {
      const match = this.matcher.match(input);

      if (!match.matched) {
        return { input, outcome: 'unmatched', command: null, response: this.renderer.unrecognized() };
      }

      const { command, params } = match;
      const read = (name: string): StateValue => this.store.read(name);

      if (command.kind === 'query') {
        const response = this.renderer.response(command, params, read);
        logger.debug('Query answered', { ...logContext, name: command.name });
        return { input, outcome: 'query', command: command.name, response };
      }

      const written = this.store.writeAll(this.resolveWrites(command, params));
      if (!written.ok) {
        logger.debug('Write rejected', { ...logContext, name: command.name, reason: written.error.message });
        const response = this.renderer.error(command, params, read);
        return { input, outcome: 'rejected', command: command.name, response };
      }

      logger.debug('State updated', {
        ...logContext,
        name: command.name,
        values: JSON.stringify(written.values),
      });
      const response = this.renderer.response(command, params, read);
      return { input, outcome: 'set', command: command.name, response };
    } catch (error: unknown) {
      logger.error('Command processing failed', error, logContext);
      return { input, outcome: 'failed', command: null, response: null };
    }
  }

  private resolveWrites(
    command: CommandSpec,
    params: ReadonlyMap<string, MatchedParam>
  ): Array<[string, StateValue]> {
    return command.writes.map((binding): [string, StateValue] => [
      binding.variable,
      this.resolveBinding(binding, params),
    ]);
  }

  private resolveBinding(binding: WriteBinding, params: ReadonlyMap<string, MatchedParam>): StateValue {
    switch (binding.kind) {
      case 'param': {
        const param = params.get(binding.param);
        if (!param) throw new Error(`Parameter '${binding.param}' was not matched`);
        const target = this.definition.variable(binding.variable);
        if (target?.type === 'enum' && typeof param.value === 'string') {
          // text params keep the client's spelling
          return findSpelling(target.values, param.value, this.definition.framing.caseInsensitive) ?? param.value;
        }
        return param.value;
      }
      case 'constant':
        return binding.value;
      case 'step': {
        const current = this.store.read(binding.variable);
        if (typeof current !== 'number') throw new Error(`State variable '${binding.variable}' is not an integer`);
        return current + binding.delta;
      }
      case 'toggle':
        return this.store.read(binding.variable) !== true;
    }
  }
}
