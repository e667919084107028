import { describe, it, expect } from 'vitest';
import { CommandRegistry, createDefaultRegistry } from '../../src/command-registry.js';
import { clear, setPixel } from '../../src/pixel-commands.js';

describe('CommandRegistry', () => {
  it('lists the display commands', () => {
    expect(createDefaultRegistry().names()).toEqual([
      'clear',
      'set_brightness',
      'set_clock_mode',
      'set_fun_mode',
      'set_pixel',
      'delete_screen',
      'send_text',
      'set_screen',
      'set_speed',
      'send_animation',
      'set_orientation',
      'set_power'
    ]);
  });

  it('resolves commands by exact name', () => {
    const registry = createDefaultRegistry();
    expect(registry.resolve('clear')).toBe(clear);
    expect(registry.resolve('CLEAR')).toBeUndefined();
    expect(registry.resolve(undefined)).toBeUndefined();
    expect(registry.has('set_pixel')).toBe(true);
    expect(registry.has('send_text')).toBe(true);
    expect(registry.has('bogus')).toBe(false);
  });

  it('rejects duplicate names', () => {
    expect(() => new CommandRegistry([clear, setPixel, clear])).toThrow('Duplicate command name: clear');
  });

  it('describes commands with their parameters', () => {
    const lines = new CommandRegistry([clear, setPixel]).describe();
    expect(lines).toEqual([
      'clear                Clear the display',
      'set_pixel x y color  Light one pixel (fun mode must be enabled)'
    ]);
    const clock = createDefaultRegistry().describe().find(line => line.startsWith('set_clock_mode'));
    expect(clock).toMatch(/^set_clock_mode \[style\] \[date\] \[show_date\] \[format_24\] /);
  });
});
