/**
 * Log macro configuration.
 */

/** A log macro and the module that declares it, e.g. `{ module: "log", name: "info" }`. */
export interface MacroSpecifier {
  module: string;
  name: string;
}

export interface MacroMatcher {
  /**
   * Match a call path such as `info` or `log::info` against the configured
   * macros. Returns the unqualified macro name, or undefined when the call is
   * not a configured log macro.
   */
  match(path: string): string | undefined;
}

export function createMacroMatcher(macros: readonly MacroSpecifier[]): MacroMatcher {
  const accepted = new Set<string>();
  for (const macro of macros) {
    accepted.add(macro.name);
    accepted.add(`${macro.module}::${macro.name}`);
  }

  return {
    match(path) {
      const normalized = path.startsWith("::") ? path.slice(2) : path;
      if (!accepted.has(normalized)) return undefined;
      const separator = normalized.lastIndexOf("::");
      return separator < 0 ? normalized : normalized.slice(separator + 2);
    },
  };
}
