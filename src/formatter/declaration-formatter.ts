import {
  Alias, ClassDecl, Constant, FunctionDecl, Parameter, Signature, StarParameter, TypeVariable,
} from '../model';
import { Printer } from './printer';
import { TypeFormatter } from './type-formatter';

export class DeclarationFormatter {
  constructor(
    private readonly printer: Printer,
    private readonly typeFormatter: TypeFormatter,
  ) {}

  /** `from M import N [as A]` for imported names, `A = T` otherwise. */
  formatAlias(alias: Alias): void {
    const type = alias.type;
    const dot = type.kind === 'named' ? type.name.lastIndexOf('.') : -1;
    if (type.kind === 'named' && dot > 0 && !alias.name.includes('.')) {
      const name = type.name.slice(dot + 1);
      const rename = name === alias.name ? '' : ` as ${alias.name}`;
      this.printer.writeLine(`from ${type.name.slice(0, dot)} import ${name}${rename}`);
      return;
    }
    this.printer.writeLine(`${alias.name} = ${this.typeFormatter.formatType(type)}`);
  }

  formatConstant(constant: Constant): void {
    this.printer.writeLine(`${constant.name} = ...  # type: ${this.typeFormatter.formatType(constant.type)}`);
  }

  formatTypeVariable(typeVariable: TypeVariable): void {
    const args = [`'${typeVariable.name}'`, ...typeVariable.constraints.map(c => this.typeFormatter.formatType(c))];
    this.printer.writeLine(`${typeVariable.name} = ${this.typeFormatter.typingName('TypeVar')}(${args.join(', ')})`);
  }

  formatClass(cls: ClassDecl): void {
    const bases = cls.parents.map(parent => this.typeFormatter.formatType(parent));
    if (cls.metaclass) {
      bases.push(`metaclass=${this.typeFormatter.formatType(cls.metaclass)}`);
    }
    const header = bases.length > 0 ? `class ${cls.name}(${bases.join(', ')}):` : `class ${cls.name}:`;
    this.printer.writeLine(header);
    this.printer.indented(() => {
      if (cls.constants.length === 0 && cls.methods.length === 0) {
        this.printer.writeLine('pass');
        return;
      }
      cls.constants.forEach(constant => this.formatConstant(constant));
      cls.methods.forEach(method => this.formatFunction(method));
    });
  }

  formatFunction(fn: FunctionDecl): void {
    if (fn.signatures.length === 0) {
      this.printer.writeLine(`def ${fn.name} PYTHONCODE`);
      return;
    }
    // __new__ is implicitly static.
    const isNew = fn.name.slice(fn.name.lastIndexOf('.') + 1) === '__new__';
    for (const signature of fn.signatures) {
      if (fn.kind !== 'method' && !isNew) {
        this.printer.writeLine(`@${fn.kind}`);
      }
      this.formatSignature(fn.name, signature);
    }
  }

  private formatSignature(name: string, signature: Signature): void {
    const returnType = this.typeFormatter.formatType(signature.returnType);
    const head = `def ${name}(${this.formatParameters(signature)}) -> ${returnType}:`;

    const body: string[] = [];
    for (const param of signature.params) {
      if (param.mutatedType) {
        body.push(`${param.name} := ${this.typeFormatter.formatType(param.mutatedType)}`);
      }
    }
    for (const exception of signature.exceptions) {
      body.push(`raise ${this.typeFormatter.formatType(exception)}()`);
    }

    if (body.length === 0) {
      this.printer.writeLine(`${head} ...`);
      return;
    }
    this.printer.writeLine(head);
    this.printer.indented(() => body.forEach(line => this.printer.writeLine(line)));
  }

  private formatParameters(signature: Signature): string {
    const positional = signature.params.filter(param => !param.kwOnly);
    const keywordOnly = signature.params.filter(param => param.kwOnly);
    const parts = positional.map(param => this.formatParameter(param));
    if (signature.starArgs) {
      parts.push(this.formatStar('*', signature.starArgs));
    } else if (keywordOnly.length > 0) {
      parts.push('*');
    }
    parts.push(...keywordOnly.map(param => this.formatParameter(param)));
    if (signature.starStarArgs) {
      parts.push(this.formatStar('**', signature.starStarArgs));
    }
    return parts.join(', ');
  }

  private formatParameter(param: Parameter): string {
    const annotation = param.type ? `: ${this.typeFormatter.formatType(param.type)}` : '';
    const defaultValue = param.optional ? ' = ...' : '';
    return `${param.name}${annotation}${defaultValue}`;
  }

  private formatStar(prefix: string, star: StarParameter): string {
    const annotation = star.type ? `: ${this.typeFormatter.formatType(star.type)}` : '';
    return `${prefix}${star.name}${annotation}`;
  }
}
