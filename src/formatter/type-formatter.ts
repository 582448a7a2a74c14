import { Type, NamedType } from '../model';
import { NONE_TYPE } from '../semantic/name-registry';

const TYPING_PREFIX = 'typing.';

// Runtime container names print as their typing aliases.
const CONTAINER_NAMES: ReadonlyMap<string, string> = new Map([
  ['list', 'List'],
  ['dict', 'Dict'],
  ['tuple', 'Tuple'],
  ['set', 'Set'],
  ['frozenset', 'FrozenSet'],
  ['type', 'Type'],
]);

/** Imports a printed module needs: `import m` lines and one `from typing import` line. */
export class ImportCollector {
  private readonly modules = new Set<string>();
  private readonly typingNames = new Set<string>();

  addModule(name: string): void {
    this.modules.add(name);
  }

  addTyping(name: string): void {
    this.typingNames.add(name);
  }

  render(): string {
    const lines = [...this.modules].sort().map(name => `import ${name}`);
    if (this.typingNames.size > 0) {
      lines.push(`from typing import ${[...this.typingNames].sort().join(', ')}`);
    }
    return lines.join('\n');
  }
}

export class TypeFormatter {
  constructor(
    private readonly imports: ImportCollector,
    private readonly moduleName: string,
  ) {}

  formatType(type: Type): string {
    switch (type.kind) {
      case 'named':
        return this.formatNamedType(type);
      case 'anything':
        return this.typingName('Any');
      case 'nothing':
        return 'nothing';
      case 'typeParameter':
        return type.name;
      case 'generic':
        if (type.base.name === 'tuple') {
          return `${this.typingName('Tuple')}[${this.formatList(type.parameters)}, ...]`;
        }
        return `${this.formatBase(type.base)}[${this.formatList(type.parameters)}]`;
      case 'tuple':
        return `${this.typingName('Tuple')}[${this.formatList(type.parameters)}]`;
      case 'callable': {
        const args = type.parameters.slice(0, -1);
        const returnType = type.parameters[type.parameters.length - 1];
        return `${this.typingName('Callable')}[[${this.formatList(args)}], ${this.formatType(returnType)}]`;
      }
      case 'union': {
        const others = type.members.filter(member => !(member.kind === 'named' && member.name === NONE_TYPE));
        if (others.length === type.members.length) {
          return `${this.typingName('Union')}[${this.formatList(type.members)}]`;
        }
        const inner = others.length === 1
          ? this.formatType(others[0])
          : `${this.typingName('Union')}[${this.formatList(others)}]`;
        return `${this.typingName('Optional')}[${inner}]`;
      }
    }
  }

  formatList(types: readonly Type[]): string {
    return types.map(type => this.formatType(type)).join(', ');
  }

  private formatBase(base: NamedType): string {
    const container = CONTAINER_NAMES.get(base.name);
    return container === undefined ? this.formatNamedType(base) : this.typingName(container);
  }

  private formatNamedType(type: NamedType): string {
    if (type.name === NONE_TYPE) {
      return 'None';
    }
    if (type.name.startsWith(TYPING_PREFIX)) {
      return this.typingName(type.name.slice(TYPING_PREFIX.length));
    }
    const dot = type.name.lastIndexOf('.');
    if (dot > 0) {
      const prefix = type.name.slice(0, dot);
      if (prefix !== this.moduleName) {
        this.imports.addModule(prefix);
      }
    }
    return type.name;
  }

  /** A name imported from typing. */
  typingName(name: string): string {
    this.imports.addTyping(name);
    return name;
  }
}
