// Resolves names written in a stub to the references stored in the module

import typingNames from '../data/typing-names.json';
import { Type, ANYTHING, NOTHING, namedType } from '../model';

const TYPING_MODULE = 'typing';
export const NONE_TYPE = 'NoneType';

const LOWERCASE_TYPING_NAMES: ReadonlyMap<string, string> = new Map(Object.entries(typingNames.lowercase));
const TYPING_NAMES: ReadonlySet<string> = new Set(typingNames.names);

/**
 * Looks a name up in the fixed table of typing names: the capitalized
 * containers map to their runtime names, `Any` to the open type and the other
 * typing names to `typing.<Name>`.
 */
export function lookupTypingName(name: string): Type | undefined {
  const lowercase = LOWERCASE_TYPING_NAMES.get(name);
  if (lowercase !== undefined) {
    return namedType(lowercase);
  }
  if (name === 'Any') {
    return ANYTHING;
  }
  if (TYPING_NAMES.has(name)) {
    return namedType(`${TYPING_MODULE}.${name}`);
  }
  return undefined;
}

/**
 * Per-parse name table. Lookup order: classes declared in live code, names
 * bound by `from M import x` or a module-level alias, the typing table, and
 * finally the name as written.
 */
export class NameRegistry {
  private readonly classes = new Set<string>();
  private readonly bindings = new Map<string, Type>();

  /**
   * @param moduleName name of the module being built
   * @param prefixNames whether top-level names carry the module name
   */
  constructor(
    public readonly moduleName: string,
    private readonly prefixNames: boolean
  ) {}

  /** The stored name of a top-level declaration. */
  qualify(name: string): string {
    return this.prefixNames ? `${this.moduleName}.${name}` : name;
  }

  registerClass(name: string): void {
    this.classes.add(name);
  }

  bind(name: string, type: Type): void {
    this.bindings.set(name, type);
  }

  resolve(name: string): Type {
    if (this.classes.has(name)) {
      return namedType(this.qualify(name));
    }
    const bound = this.bindings.get(name);
    if (bound) {
      return bound;
    }
    if (name === 'nothing') {
      return NOTHING;
    }
    if (name === 'None') {
      return namedType(NONE_TYPE);
    }
    if (this.moduleName === TYPING_MODULE) {
      return namedType(name);
    }
    const typingName = name.startsWith(`${TYPING_MODULE}.`) ? name.slice(TYPING_MODULE.length + 1) : name;
    return lookupTypingName(typingName) ?? namedType(name);
  }
}
