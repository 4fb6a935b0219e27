function escapeRegex(text: string): string {
  return text.replace(/[.+^${}()|\\]/g, '\\$&');
}

function escapeLiteral(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function translate(pattern: string): string {
  let out = '';
  let i = 0;
  let braceDepth = 0;

  while (i < pattern.length) {
    const ch = pattern[i];
    if (ch === '\\') {
      const next = pattern[i + 1];
      out += next ? escapeRegex(next) : '\\\\';
      i += next ? 2 : 1;
      continue;
    }
    if (ch === '*') {
      if (pattern[i + 1] === '*') {
        // "**/" also matches zero directories.
        if (pattern[i + 2] === '/') {
          out += '(?:.*/)?';
          i += 3;
        } else {
          out += '.*';
          i += 2;
        }
      } else {
        out += '[^/]*';
        i += 1;
      }
      continue;
    }
    if (ch === '?') {
      out += '[^/]';
      i += 1;
      continue;
    }
    if (ch === '[') {
      const end = pattern.indexOf(']', i + 1);
      if (end === -1) {
        out += '\\[';
        i += 1;
        continue;
      }
      let content = pattern.slice(i + 1, end).replace(/\\/g, '\\\\');
      if (content.startsWith('!')) content = `^${content.slice(1)}`;
      out += `[${content}]`;
      i = end + 1;
      continue;
    }
    if (ch === '{') {
      braceDepth += 1;
      out += '(?:';
      i += 1;
      continue;
    }
    if (ch === '}' && braceDepth > 0) {
      braceDepth -= 1;
      out += ')';
      i += 1;
      continue;
    }
    if (ch === ',' && braceDepth > 0) {
      out += '|';
      i += 1;
      continue;
    }
    out += escapeRegex(ch);
    i += 1;
  }

  // Unbalanced "{" degrades to a literal match of the rest.
  return braceDepth > 0 ? escapeLiteral(pattern) : out;
}

/**
 * Compiles an upload ignore glob into a RegExp over `/`-rooted relative paths.
 * Anchored patterns start with `/`; others match at any depth.
 * A trailing `/**` also matches the directory itself.
 */
export function globToRegExp(pattern: string): RegExp {
  const anchored = pattern.startsWith('/');
  let body = anchored ? pattern : pattern.replace(/^\.\//, '');
  let allowTrailing = false;
  if (body.endsWith('/**')) {
    body = body.slice(0, -3);
    allowTrailing = true;
  }
  const prefix = anchored ? '^' : '^(?:.*/)?';
  const suffix = allowTrailing ? '(?:/.*)?' : '';
  return new RegExp(`${prefix}${translate(body)}${suffix}$`);
}
