export interface FormatterOptions {
  /** Spaces per indentation level of class and function bodies. */
  indentSize: number;
  trimTrailingWhitespace: boolean;
  insertFinalNewline: boolean;
}

export const DEFAULT_FORMATTER_OPTIONS: Readonly<FormatterOptions> = Object.freeze({
  indentSize: 4,
  trimTrailingWhitespace: true,
  insertFinalNewline: false,
});
