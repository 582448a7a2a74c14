import { Module } from '../model';
import { ParseOptions } from '../options';
import { parse } from '../parse';
import { FormatterOptions, DEFAULT_FORMATTER_OPTIONS } from './options';
import { Printer } from './printer';
import { ImportCollector, TypeFormatter } from './type-formatter';
import { DeclarationFormatter } from './declaration-formatter';

export { DEFAULT_FORMATTER_OPTIONS };
export type { FormatterOptions };

/**
 * Canonical text of a module: the imports its types need, then aliases,
 * constants, type variables, classes and functions, one blank line apart.
 */
export class Formatter {
  private readonly options: FormatterOptions;
  private readonly printer: Printer;

  constructor(options: Partial<FormatterOptions> = {}) {
    this.options = { ...DEFAULT_FORMATTER_OPTIONS, ...options };
    this.printer = new Printer(this.options.indentSize);
  }

  format(module: Module): string {
    const imports = new ImportCollector();
    const declarationFormatter = new DeclarationFormatter(this.printer, new TypeFormatter(imports, module.name));

    const sections = [
      this.render(module.aliases, alias => declarationFormatter.formatAlias(alias)),
      this.render(module.constants, constant => declarationFormatter.formatConstant(constant)),
      this.render(module.typeVariables, typeVariable => declarationFormatter.formatTypeVariable(typeVariable)),
      // Every class ends with a newline, so classes are one blank line apart.
      module.classes
        .map(cls => this.renderBlock(() => declarationFormatter.formatClass(cls)))
        .join('\n'),
      this.render(module.functions, fn => declarationFormatter.formatFunction(fn)),
    ];

    const output = [imports.render(), ...sections].filter(section => section.length > 0).join('\n\n');
    if (this.options.insertFinalNewline && output.length > 0 && !output.endsWith('\n')) {
      return output + '\n';
    }
    return output;
  }

  private render<T>(items: readonly T[], write: (item: T) => void): string {
    this.printer.reset();
    items.forEach(write);
    return this.printer.getResult({
      trimTrailingWhitespace: this.options.trimTrailingWhitespace,
      insertFinalNewline: false,
    });
  }

  private renderBlock(write: () => void): string {
    this.printer.reset();
    write();
    return this.printer.getResult({
      trimTrailingWhitespace: this.options.trimTrailingWhitespace,
      insertFinalNewline: true,
    });
  }
}

export function print(module: Module, options?: Partial<FormatterOptions>): string {
  return new Formatter(options).format(module);
}

/** Parses stub source and prints its canonical form; throws the ParseError on failure. */
export function formatStub(
  code: string,
  options: { parse?: Partial<ParseOptions>; format?: Partial<FormatterOptions> } = {},
): string {
  const module = parse(code, options.parse);
  if (!module.ok) {
    throw module.error;
  }
  return print(module.value, options.format);
}

