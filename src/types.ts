export type CellInput = string | number | bigint | boolean | null | undefined;
export type TableRecord = Readonly<Record<string, CellInput>>;

export type CellValue =
  | { kind: 'text'; value: string }
  | { kind: 'integer'; value: number | bigint }
  | { kind: 'float'; value: number }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'missing' };

export type Column = string[];

export type MissingFieldPolicy = { kind: 'placeholder'; text: string } | { kind: 'fail' };
export type LineBreak = '\n' | '\r\n';

export interface Logger {
  debug?(message: string): void;
  info?(message: string): void;
  warn?(message: string): void;
  error?(message: string): void;
}

export interface TableSink {
  write(chunk: string): unknown;
}

export interface RenderOptions {
  onMissingField?: MissingFieldPolicy;
  lineBreak?: LineBreak;
  logger?: Logger;
}

export interface PrintOptions extends RenderOptions {
  sink?: TableSink;
}

export interface RowFormat {
  widths: readonly number[];
  columnSeparator: string;
  lineBreak: LineBreak;
  pattern: string;
  render(fields: readonly string[]): string;
}

export interface TableFormatterConfig {
  missingField: {
    policy: 'placeholder' | 'fail';
    placeholder: string;
  };
  lineBreak: LineBreak;
}
