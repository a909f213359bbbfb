// config/secret-interpolate.ts
import type { SecretSource } from './secret-source.ts';

const TOKEN = /\$\{(?<source>[a-z]+):(?<key>[A-Za-z0-9_\-./]+)\}/g;

type Missing = { source: string; key: string; placeholder: string };

/**
 * Replace ${source:KEY} tokens in every string of a JSON-like value.
 * Missing values are collected and replaced with an empty string.
 */
export async function interpolate(
  value: unknown,
  sources: Record<string, SecretSource>,
): Promise<{ value: unknown; missing: Missing[] }> {
  const missing: Missing[] = [];

  const walk = async (node: unknown): Promise<unknown> => {
    if (typeof node === 'string') return replaceTokens(node, sources, missing);
    if (Array.isArray(node)) {
      const out: unknown[] = [];
      for (const item of node) out.push(await walk(item));
      return out;
    }
    if (node !== null && typeof node === 'object') {
      const out: Record<string, unknown> = {};
      for (const [key, item] of Object.entries(node)) out[key] = await walk(item);
      return out;
    }
    return node;
  };

  return { value: await walk(value), missing };
}

async function replaceTokens(
  input: string,
  sources: Record<string, SecretSource>,
  missing: Missing[],
): Promise<string> {
  const out: string[] = [];
  let last = 0;
  for (const m of input.matchAll(TOKEN)) {
    const source = m.groups?.source ?? '';
    const key = m.groups?.key ?? '';
    const src = sources[source];
    if (!src) throw new Error(`Unknown secret source '${source}' in ${m[0]}`);

    const resolved = await src.get(key);
    if (resolved == null || resolved === '') {
      missing.push({ source, key, placeholder: m[0] });
    }
    const index = m.index ?? 0;
    out.push(input.slice(last, index), resolved ?? '');
    last = index + m[0].length;
  }
  out.push(input.slice(last));
  return out.join('');
}

// Convenience wrapper: throw if anything is missing
export async function interpolateStrict(
  value: unknown,
  sources: Record<string, SecretSource>,
): Promise<unknown> {
  const { value: resolved, missing } = await interpolate(value, sources);
  if (missing.length) {
    const bySource = new Map<string, Set<string>>();
    for (const m of missing) {
      const keys = bySource.get(m.source) ?? new Set<string>();
      keys.add(m.key);
      bySource.set(m.source, keys);
    }
    const lines: string[] = [];
    for (const [source, keys] of bySource) {
      lines.push(`- ${source}: ${Array.from(keys).sort().join(', ')}`);
    }
    throw new Error(
      [
        'Missing required secrets for config interpolation:',
        ...lines,
        'Define them in your environment (e.g., .env).',
      ].join('\n'),
    );
  }
  return resolved;
}
