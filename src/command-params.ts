import { z } from 'zod';

/**
 * Raised when a command's arguments do not bind to its declared parameters
 * or fail their type/range checks. Nothing is written to the device.
 */
export class CommandArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CommandArgumentError';
  }
}

export interface ParameterInfo {
  name: string;
  required: boolean;
}

/**
 * A display command with its parameter schema bound in. Arguments arrive as
 * strings exactly as the client sent them.
 */
export interface PixelCommand {
  readonly name: string;
  readonly description: string;
  readonly parameters: readonly ParameterInfo[];
  encode(positional: readonly string[], keyword: Readonly<Record<string, string>>): Uint8Array;
}

export interface CommandDefinition<S extends z.ZodRawShape> {
  name: string;
  description: string;
  /** Parameters in positional order. */
  params: S;
  encode(args: z.infer<z.ZodObject<S, 'strip'>>): Uint8Array;
}

const TRUE_VALUES = new Set(['true', '1', 'yes', 'on']);
const FALSE_VALUES = new Set(['false', '0', 'no', 'off']);

export function intParam(min: number, max: number) {
  const range = `must be between ${min} and ${max}`;
  return z.string()
    .trim()
    .regex(/^[+-]?\d+$/, 'must be an integer')
    .transform(Number)
    .pipe(z.number().int().min(min, range).max(max, range));
}

export function boolParam() {
  return z.string().transform((value, ctx) => {
    const normalized = value.trim().toLowerCase();
    if (TRUE_VALUES.has(normalized)) return true;
    if (FALSE_VALUES.has(normalized)) return false;
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be true or false' });
    return z.NEVER;
  });
}

/** `RRGGBB`, with or without a leading `#`. */
export function colorParam() {
  return z.string()
    .trim()
    .regex(/^#?[0-9a-fA-F]{6}$/, 'must be a hex color like ff8800')
    .transform(value => {
      const hex = value.replace('#', '');
      return [0, 2, 4].map(offset => parseInt(hex.substring(offset, offset + 2), 16));
    });
}

export interface CalendarDate {
  day: number;
  month: number;
  year: number;
  /** ISO weekday, Monday = 1 ... Sunday = 7 */
  weekday: number;
}

export function calendarDate(date: Date): CalendarDate {
  return {
    day: date.getDate(),
    month: date.getMonth() + 1,
    year: date.getFullYear(),
    weekday: date.getDay() === 0 ? 7 : date.getDay()
  };
}

/** `DD/MM/YYYY` */
export function dateParam() {
  return z.string().trim().transform((value, ctx) => {
    const match = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/.exec(value);
    if (match) {
      const [day, month, year] = [Number(match[1]), Number(match[2]), Number(match[3])];
      const date = new Date(year, month - 1, day);
      if (date.getFullYear() === year && date.getMonth() === month - 1 && date.getDate() === day) {
        return calendarDate(date);
      }
    }
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be a date as DD/MM/YYYY' });
    return z.NEVER;
  });
}

/**
 * Map positional and keyword arguments onto parameter names. Positional
 * arguments fill parameters in declaration order.
 */
export function bindArguments(
  command: string,
  names: readonly string[],
  positional: readonly string[],
  keyword: Readonly<Record<string, string>>
): Record<string, string> {
  if (positional.length > names.length) {
    throw new CommandArgumentError(
      `${command}: expected at most ${names.length} argument(s), got ${positional.length}`
    );
  }

  const bound: Record<string, string> = {};
  positional.forEach((value, index) => {
    bound[names[index]] = value;
  });

  for (const [key, value] of Object.entries(keyword)) {
    if (!names.includes(key)) {
      throw new CommandArgumentError(`${command}: unknown parameter '${key}'`);
    }
    if (Object.hasOwn(bound, key)) {
      throw new CommandArgumentError(`${command}: parameter '${key}' given more than once`);
    }
    bound[key] = value;
  }
  return bound;
}

/**
 * A command the display knows but this bridge cannot encode. It stays in the
 * registry so clients get a specific error instead of "Unknown command".
 */
export function unsupportedCommand(name: string, description: string, reason: string): PixelCommand {
  return {
    name,
    description: `${description} (not supported)`,
    parameters: [],
    encode() {
      throw new CommandArgumentError(`${name}: not supported by this bridge (${reason})`);
    }
  };
}

function describeIssue(command: string, issue: z.ZodIssue): string {
  const param = String(issue.path[0] ?? '');
  if (issue.code === z.ZodIssueCode.invalid_type && issue.received === 'undefined') {
    return `${command}: missing required parameter '${param}'`;
  }
  return `${command}: invalid value for '${param}': ${issue.message}`;
}

export function defineCommand<S extends z.ZodRawShape>(definition: CommandDefinition<S>): PixelCommand {
  const schema = z.object(definition.params);
  const shape: z.ZodRawShape = definition.params;
  const parameters = Object.entries(shape).map(([name, type]) => ({ name, required: !type.isOptional() }));
  const names = parameters.map(p => p.name);

  return {
    name: definition.name,
    description: definition.description,
    parameters,
    encode(positional, keyword) {
      const bound = bindArguments(definition.name, names, positional, keyword);
      const parsed = schema.safeParse(bound);
      if (!parsed.success) {
        throw new CommandArgumentError(describeIssue(definition.name, parsed.error.issues[0]));
      }
      return definition.encode(parsed.data);
    }
  };
}
