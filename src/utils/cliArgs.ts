export type CliArgs = Record<string, string | boolean | string[]>;

export function parseCliArgs(tokens: string[]): CliArgs {
  const result: CliArgs = {};

  for (let i = 0; i < tokens.length; i++) {
    let token = tokens[i] ?? '';
    if (token === '--') continue;
    if (!token.startsWith('--')) continue;

    token = token.slice(2);
    if (!token) continue;

    let value: string | boolean = true;
    let key = token;

    if (token.includes('=')) {
      const [k = token, v] = token.split(/=(.*)/s, 2);
      key = k;
      value = v ?? true;
    } else {
      const next = tokens[i + 1];
      if (next && !next.startsWith('--')) {
        value = next;
        i++;
      }
    }

    const existing = result[key];
    if (existing === undefined) {
      result[key] = value;
    } else if (Array.isArray(existing)) {
      existing.push(String(value));
    } else {
      result[key] = [String(existing), String(value)];
    }
  }

  return result;
}

export function getStringArg(args: CliArgs, key: string): string | undefined {
  const value = args[key];
  if (value === undefined) return undefined;
  if (Array.isArray(value)) return value[value.length - 1];
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  return value;
}

/** Every value of a repeatable flag, each split on commas and whitespace. */
export function getListArg(args: CliArgs, key: string): string[] | undefined {
  const value = args[key];
  if (value === undefined || typeof value === 'boolean') return undefined;
  const entries = Array.isArray(value) ? value : [value];
  return entries.flatMap((entry) => entry.split(/[,\s]+/)).filter(Boolean);
}

function normalizeBoolean(value: string): boolean | undefined {
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  return undefined;
}

export function resolveBooleanFlag(
  cliValue: CliArgs[string] | undefined,
  envValue: string | undefined,
  fallback: boolean
): boolean {
  const last = Array.isArray(cliValue) ? cliValue[cliValue.length - 1] : cliValue;
  if (typeof last === 'boolean') return last;
  if (typeof last === 'string') {
    const parsed = normalizeBoolean(last);
    if (parsed !== undefined) return parsed;
  }
  if (typeof envValue === 'string') {
    const parsed = normalizeBoolean(envValue);
    if (parsed !== undefined) return parsed;
  }
  return fallback;
}
