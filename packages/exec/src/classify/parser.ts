import { ParsedCommand } from './types';

const ENV_ASSIGNMENT = /^([a-zA-Z_][a-zA-Z0-9_]*)=(.*)$/s;

/**
 * Splits a command line into tokens, honouring single/double quotes and
 * backslash escapes. Leading KEY=value tokens are returned as `env`.
 */
export function parseCommand(input: string): ParsedCommand {
  const tokens: string[] = [];
  let current = '';
  let hasToken = false;
  let quote: "'" | '"' | null = null;
  let escape = false;

  const trimmed = input.trim();

  for (let i = 0; i < trimmed.length; i++) {
    const char = trimmed[i];

    if (escape) {
      current += char;
      escape = false;
    } else if (char === '\\' && quote !== "'") {
      escape = true;
      hasToken = true;
    } else if (quote) {
      if (char === quote) {
        quote = null;
      } else {
        current += char;
      }
    } else if (char === "'" || char === '"') {
      quote = char;
      hasToken = true;
    } else if (/\s/.test(char)) {
      if (hasToken || current.length > 0) {
        tokens.push(current);
        current = '';
        hasToken = false;
      }
    } else {
      current += char;
    }
  }

  if (hasToken || current.length > 0) {
    tokens.push(current);
  }

  const env: Record<string, string> = {};
  let cmdIndex = 0;
  while (cmdIndex < tokens.length) {
    const match = ENV_ASSIGNMENT.exec(tokens[cmdIndex]);
    if (!match) break;
    env[match[1]] = match[2];
    cmdIndex++;
  }

  if (cmdIndex >= tokens.length) {
    return { bin: '', args: [], env, raw: input };
  }

  return {
    bin: tokens[cmdIndex],
    args: tokens.slice(cmdIndex + 1),
    env,
    raw: input,
  };
}

/**
 * Quotes an argument for display so that `parseCommand` reads it back unchanged.
 */
export function quoteArg(arg: string): string {
  if (arg.length > 0 && /^[A-Za-z0-9_@%+=:,./-]+$/.test(arg)) {
    return arg;
  }
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

/**
 * Builds a command line from a binary and its arguments.
 */
export function formatCommand(bin: string, args: string[]): string {
  return [bin, ...args].map(quoteArg).join(' ');
}
