import type { CommandRegistry } from './command-registry.js';
import type { DeviceHandle, WriteOutcome } from './device-session.js';
import { type CommandEnvelope, type CommandResult, errorResult, successResult } from './envelope.js';
import { Logger } from './logger.js';

export const UNKNOWN_COMMAND = 'Unknown command';

export interface DeviceWriter {
  write(handle: DeviceHandle, payload: Uint8Array): Promise<WriteOutcome>;
}

/**
 * `transport-lost` is not answered here: the session loop reconnects and
 * replays the same envelope.
 */
export type DispatchOutcome =
  | { kind: 'result'; result: CommandResult }
  | { kind: 'transport-lost' };

export class CommandDispatcher {
  private readonly logger = new Logger('Dispatcher');

  constructor(private readonly registry: CommandRegistry) {}

  async dispatch(envelope: CommandEnvelope, device: DeviceWriter, handle: DeviceHandle): Promise<DispatchOutcome> {
    const command = this.registry.resolve(envelope.name);
    if (!command) {
      this.logger.warn(`Unknown command: ${envelope.name ?? '(none)'}`);
      return { kind: 'result', result: errorResult(UNKNOWN_COMMAND) };
    }

    let payload: Uint8Array;
    try {
      payload = command.encode(envelope.positional, envelope.keyword);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Rejected ${command.name}: ${message}`);
      return { kind: 'result', result: errorResult(message) };
    }

    this.logger.frame(command.name, payload);
    const outcome = await device.write(handle, payload);
    if (outcome === 'transport-lost') {
      return { kind: 'transport-lost' };
    }
    return { kind: 'result', result: successResult(command.name) };
  }
}
