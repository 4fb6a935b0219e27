import { createRequire } from 'node:module';

export type CompiledRegex = {
  test(text: string): boolean;
};

type Re2Ctor = new (pattern: string) => CompiledRegex;

let cachedRe2Ctor: Re2Ctor | null | undefined;

// re2 is a native add-on; when it is not built for this platform, patterns
// run on the built-in engine instead.
function loadRe2Ctor(): Re2Ctor | null {
  if (cachedRe2Ctor !== undefined) return cachedRe2Ctor;
  try {
    const require = createRequire(import.meta.url);
    const mod: unknown = require('re2');
    cachedRe2Ctor = isRe2Ctor(mod) ? mod : isModuleWithDefault(mod) ? mod.default : null;
  } catch {
    cachedRe2Ctor = null;
  }
  return cachedRe2Ctor;
}

function isRe2Ctor(value: unknown): value is Re2Ctor {
  return typeof value === 'function';
}

function isModuleWithDefault(value: unknown): value is { default: Re2Ctor } {
  return typeof value === 'object' && value !== null && 'default' in value && isRe2Ctor(value.default);
}

export function compileRegex(pattern: string): CompiledRegex {
  const RE2 = loadRe2Ctor();
  if (RE2) return new RE2(pattern);
  return new RegExp(pattern);
}
