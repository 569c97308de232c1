/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Path segment parsing for tree lookups. A path is a `/`-separated list of
  names, each optionally followed by `[key=value]` predicates.
*/

export interface PathPredicate {
  key: string;
  value: string;
}

/**
 * Split a path string into segments, respecting [...] predicates (do not split on / inside brackets).
 * e.g. 'config/port[id="1/1"]/speed' → ['config', 'port[id="1/1"]', 'speed']
 */
export function splitPathSegments(pathStr: string): string[] {
  const segs: string[] = [];
  let cur = '';
  let depth = 0;
  for (const ch of pathStr.replace(/^\/+/, '')) {
    if (ch === '[') {
      depth++;
      cur += ch;
    } else if (ch === ']') {
      depth--;
      cur += ch;
    } else if (ch === '/' && depth === 0) {
      if (cur) segs.push(cur);
      cur = '';
    } else {
      cur += ch;
    }
  }
  if (cur) segs.push(cur);
  return segs.filter(Boolean);
}

/** Parse one path segment into name and predicates (e.g. "port[speed=10G][mtu=1500]"). */
export function parsePathSegment(seg: string): { name: string; predicates: PathPredicate[] } {
  const trimmed = seg.trim();
  // eslint-disable-next-line no-useless-escape -- [ is literal in [^\[]+
  const match = trimmed.match(/^([^\[]+)(.*)$/);
  if (!match) return { name: trimmed, predicates: [] };
  const name = match[1].trim();
  const rest = match[2].trim();
  const predicates: PathPredicate[] = [];
  const keyRegex = /\[([^=]+)=([^\]]*)\]/g;
  let m: RegExpExecArray | null;
  while ((m = keyRegex.exec(rest)) !== null) {
    const rawVal = (m[2] ?? '').trim();
    const val = rawVal.replace(/^["']|["']$/g, '');
    predicates.push({ key: m[1].trim(), value: val });
  }
  return { name, predicates };
}
