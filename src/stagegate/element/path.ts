/**
 * Property path parsing.
 *
 * `user.addresses[0].city` becomes
 * `[{kind:'key',key:'user'}, {kind:'key',key:'addresses'}, {kind:'index',...}, ...]`.
 * Dots inside brackets do not split.
 */

export type PathSegment =
  | { kind: 'key'; key: string }
  | { kind: 'index'; raw: string; index: number | null };

export function parsePath(path: string): PathSegment[] {
  const segments: PathSegment[] = [];
  let buffer = '';
  let i = 0;

  const flushKey = () => {
    if (buffer !== '') {
      segments.push({ kind: 'key', key: buffer });
      buffer = '';
    }
  };

  while (i < path.length) {
    const ch = path[i];
    if (ch === '.') {
      flushKey();
      i++;
    } else if (ch === '[') {
      flushKey();
      const close = path.indexOf(']', i + 1);
      if (close === -1) {
        // Unterminated bracket: the rest is a plain key
        buffer = path.slice(i);
        i = path.length;
        continue;
      }
      const raw = stripQuotes(path.slice(i + 1, close).trim());
      segments.push({ kind: 'index', raw, index: /^-?\d+$/.test(raw) ? Number(raw) : null });
      i = close + 1;
    } else {
      buffer += ch;
      i++;
    }
  }
  flushKey();
  return segments;
}

function stripQuotes(value: string): string {
  if (value.length >= 2) {
    const first = value[0];
    const last = value[value.length - 1];
    if ((first === '"' || first === "'") && first === last) {
      return value.slice(1, -1);
    }
  }
  return value;
}

export function formatPath(segments: PathSegment[]): string {
  let out = '';
  for (const segment of segments) {
    if (segment.kind === 'key') {
      out += out === '' ? segment.key : `.${segment.key}`;
    } else {
      out += `[${segment.raw}]`;
    }
  }
  return out;
}
