/**
 * Shared JSON parse for model replies: strips markdown fences and retries with normalized quotes.
 * Returns undefined when the text is not a JSON object.
 */
import { logger } from '@/services/logger';

export function stripCodeFences(raw: string): string {
  const txt = raw.trim();
  if (!txt.startsWith('```')) return txt;

  const firstNewline = txt.indexOf('\n');
  const lastFence = txt.lastIndexOf('```');
  if (firstNewline !== -1 && lastFence > firstNewline) {
    return txt.slice(firstNewline + 1, lastFence).trim();
  }
  return txt.replace(/^```\w*\n?/, '').replace(/\n?```$/, '').trim();
}

function tryParse(txt: string): unknown {
  try {
    return JSON.parse(txt);
  } catch {
    return undefined;
  }
}

function isObject(value: unknown): value is object {
  return typeof value === 'object' && value !== null;
}

export function safeParseJson(raw: string, context: string): object | undefined {
  const txt = stripCodeFences(raw);

  const parsed = tryParse(txt);
  if (isObject(parsed)) return parsed;

  // Models sometimes answer with single-quoted pseudo-JSON.
  const requoted = tryParse(txt.replace(/'/g, '"'));
  if (isObject(requoted)) return requoted;

  logger.warn('safeParseJson:parse_error', {
    context,
    error: parsed === undefined ? 'Invalid JSON after stripping fences' : 'JSON is not an object',
    raw: txt.slice(0, 300),
  });
  return undefined;
}
