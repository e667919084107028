import type { PixelCommand } from './command-params.js';
import { PIXEL_COMMANDS } from './pixel-commands.js';

/**
 * Name -> command lookup, fixed at construction.
 */
export class CommandRegistry {
  private readonly commands: ReadonlyMap<string, PixelCommand>;

  constructor(commands: Iterable<PixelCommand>) {
    const byName = new Map<string, PixelCommand>();
    for (const command of commands) {
      if (byName.has(command.name)) {
        throw new Error(`Duplicate command name: ${command.name}`);
      }
      byName.set(command.name, command);
    }
    this.commands = byName;
  }

  resolve(name: string | undefined): PixelCommand | undefined {
    return name === undefined ? undefined : this.commands.get(name);
  }

  has(name: string): boolean {
    return this.commands.has(name);
  }

  names(): string[] {
    return [...this.commands.keys()];
  }

  /** One line per command, e.g. `set_pixel x y color`, optional parameters in brackets. */
  describe(): string[] {
    const signatures = [...this.commands.values()].map(command => {
      const params = command.parameters.map(p => (p.required ? p.name : `[${p.name}]`));
      return { signature: [command.name, ...params].join(' '), description: command.description };
    });
    const width = Math.max(0, ...signatures.map(s => s.signature.length));
    return signatures.map(({ signature, description }) => `${signature.padEnd(width)}  ${description}`);
  }
}

export function createDefaultRegistry(): CommandRegistry {
  return new CommandRegistry(PIXEL_COMMANDS);
}
