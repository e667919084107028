import { z } from 'zod';

/**
 * A parsed command request. Values stay strings; each command converts its
 * own arguments.
 */
export interface CommandEnvelope {
  /** Undefined when the request carried no usable command name. */
  name: string | undefined;
  positional: string[];
  keyword: Record<string, string>;
}

export type ParseResult =
  | { ok: true; envelope: CommandEnvelope }
  | { ok: false; error: string };

export interface CommandResult {
  status: 'success' | 'error';
  command?: string;
  message?: string;
}

const requestSchema = z.object({
  command: z.unknown(),
  params: z.array(z.string(), {
    invalid_type_error: 'params must be an array of strings'
  }).default([])
});

/**
 * Split raw parameter tokens. A token containing `=` becomes one keyword entry
 * split at the first `=`, with every `-` in the key rewritten to `_`
 * (`show-date=false` binds to `show_date`). Everything else is positional.
 */
export function splitParams(tokens: readonly string[]): Pick<CommandEnvelope, 'positional' | 'keyword'> {
  const positional: string[] = [];
  const keyword = new Map<string, string>();

  for (const token of tokens) {
    const separator = token.indexOf('=');
    if (separator === -1) {
      positional.push(token);
    } else {
      keyword.set(normalizeKey(token.slice(0, separator)), token.slice(separator + 1));
    }
  }
  return { positional, keyword: Object.fromEntries(keyword) };
}

export function normalizeKey(key: string): string {
  return key.replace(/-/g, '_');
}

export function buildEnvelope(name: string | undefined, params: readonly string[]): CommandEnvelope {
  return { name, ...splitParams(params) };
}

/**
 * Decode one inbound message: a JSON object with a `command` string and an
 * optional `params` array of strings.
 */
export function parseEnvelope(raw: string | Buffer): ParseResult {
  let data: unknown;
  try {
    data = JSON.parse(raw.toString());
  } catch (error) {
    return { ok: false, error: `Invalid JSON: ${error instanceof Error ? error.message : String(error)}` };
  }

  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    return { ok: false, error: 'Request must be a JSON object' };
  }

  const parsed = requestSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const message = issue.path.length > 1 ? 'params must be an array of strings' : issue.message;
    return { ok: false, error: message };
  }

  const { command, params } = parsed.data;
  return {
    ok: true,
    envelope: buildEnvelope(typeof command === 'string' ? command : undefined, params)
  };
}

export function successResult(command: string): CommandResult {
  return { status: 'success', command };
}

export function errorResult(message: string): CommandResult {
  return { status: 'error', message };
}
