import type { IgnoreRules } from '../../types/config.js';
import { ValidationError } from '../errors.js';
import { compileRegex, type CompiledRegex } from './compileRegex.js';
import { globToRegExp } from './glob.js';

/** Decides which `/`-rooted relative paths a folder upload leaves out. */
export class IgnoreMatcher {
  private readonly globMatchers: RegExp[];
  private readonly regexMatchers: CompiledRegex[];

  constructor(rules: IgnoreRules) {
    this.globMatchers = (rules.glob ?? []).map((pattern) => globToRegExp(pattern));
    this.regexMatchers = (rules.regex ?? []).map((pattern) => {
      try {
        return compileRegex(pattern);
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new ValidationError(`Invalid ignore pattern ${JSON.stringify(pattern)}: ${reason}`);
      }
    });
  }

  isIgnored(relPath: string): boolean {
    for (const matcher of this.globMatchers) {
      if (matcher.test(relPath)) return true;
    }
    for (const matcher of this.regexMatchers) {
      if (matcher.test(relPath)) return true;
    }
    return false;
  }
}
