export { printTableForColumns, renderTable } from './src/util/table';
export { printable, toCellValue, cellText } from './src/table/printable';
export { DEFAULT_MISSING_FIELD_POLICY, splitIntoColumns } from './src/table/columns';
export { widthsOf } from './src/table/widths';
export { COLUMN_SEPARATOR, RULE_CONNECTOR, formatFor, separator } from './src/table/format';
export { putsInColumns, putsOneLineInColumns, rowsFromColumns, writeTable } from './src/table/writer';
export {
  CONFIG_ENV,
  configSchema,
  defaultConfig,
  loadConfig,
  loadConfigFile,
  mergeDefaults,
  resolveConfigPath,
  resolveRenderOptions,
  validateConfig
} from './src/config';
export {
  ConfigError,
  EmptyInputError,
  MissingFieldError,
  TableFormatterError,
  TableInvariantError
} from './src/errors';
export type {
  CellInput,
  CellValue,
  Column,
  LineBreak,
  Logger,
  MissingFieldPolicy,
  PrintOptions,
  RenderOptions,
  RowFormat,
  TableFormatterConfig,
  TableRecord,
  TableSink
} from './src/types';
