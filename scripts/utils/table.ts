import { BigNumberish, formatUnits } from 'ethers';
import { HealthStatus } from '../monitoring/types';

// ANSI color codes
export const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  grey: '\x1b[90m',
  red: '\x1b[31m',
  underline: '\x1b[4m',
} as const;

export interface TableColumn<T> {
  header: string;
  width: number;
  align?: 'left' | 'right';
  visible?: boolean;
  format: (row: T) => string;
}

export interface TableConfig<T> {
  columns: TableColumn<T>[];
  showHeader?: boolean;
  showHeaderSeparator?: boolean;
  columnSeparator?: string;
  sort?: (a: T, b: T) => number;
  shouldDimRow?: (row: T) => boolean;
}

export interface Table<T> {
  addColumn(column: TableColumn<T>): Table<T>;
  setColumns(columns: TableColumn<T>[]): Table<T>;
  setData(data: T[]): Table<T>;
  setSorting(compare: (a: T, b: T) => number): Table<T>;
  showHeader(show: boolean): Table<T>;
  setColumnSeparator(separator: string): Table<T>;
  setShouldDimRow(dimRowFn: (row: T) => boolean): Table<T>;
  render(): string[];
  print(): void;
}

export function createTable<T>(): Table<T> {
  let tableData: T[] = [];
  const tableConfig: TableConfig<T> = { columns: [] };

  return {
    addColumn(column: TableColumn<T>) {
      tableConfig.columns.push(column);
      return this;
    },

    setColumns(columns: TableColumn<T>[]) {
      tableConfig.columns = columns;
      return this;
    },

    setData(data: T[]) {
      tableData = data;
      return this;
    },

    setSorting(compare: (a: T, b: T) => number) {
      tableConfig.sort = compare;
      return this;
    },

    showHeader(show: boolean) {
      tableConfig.showHeader = show;
      return this;
    },

    setColumnSeparator(separator: string) {
      tableConfig.columnSeparator = separator;
      return this;
    },

    setShouldDimRow(dimRowFn: (row: T) => boolean) {
      tableConfig.shouldDimRow = dimRowFn;
      return this;
    },

    render(): string[] {
      return renderTable(tableData, tableConfig);
    },

    print(): void {
      printTable(tableData, tableConfig);
    },
  };
}

/**
 * Lay out rows as fixed-width text lines
 * @param data Array of data objects
 * @param config Table configuration
 */
export function renderTable<T>(data: T[], config: TableConfig<T>): string[] {
  const {
    columns: allColumns,
    showHeader = true,
    showHeaderSeparator = true,
    columnSeparator = '  ',
    sort,
    shouldDimRow,
  } = config;
  const columns = allColumns.filter((col) => col.visible !== false);
  const rows = sort ? [...data].sort(sort) : data;
  const lines: string[] = [];

  if (showHeader) {
    lines.push(columns.map((col) => padWithColors(col.header, col.width, col.align, colors.bold)).join(columnSeparator));
  }

  if (showHeaderSeparator) {
    const totalWidth = columns.reduce((sum, col) => sum + col.width, (columns.length - 1) * columnSeparator.length);
    lines.push('-'.repeat(totalWidth));
  }

  for (const row of rows) {
    const dim = shouldDimRow ? shouldDimRow(row) : false;
    lines.push(
      columns
        .map((col) => padWithColors(col.format(row), col.width, col.align, dim ? colors.dim : undefined))
        .join(columnSeparator),
    );
  }

  return lines;
}

export function printTable<T>(data: T[], config: TableConfig<T>): void {
  renderTable(data, config).forEach((line) => console.log(line));
}

/// UTILITY FUNCTIONS

/**
 * @param value Numeric value to format
 * @param decimals Number of decimal places
 * @returns Formatted number string with apostrophe as thousands separator
 */
export function formatCurrency(value: number | string, decimals: number = 2): string {
  const num = Number(value).toFixed(decimals);
  const [integerPart, decimalPart] = num.split('.');
  const formattedInteger = integerPart.replace(/\B(?=(\d{3})+(?!\d))/g, "'");
  return decimalPart ? `${formattedInteger}.${decimalPart}` : formattedInteger;
}

export function formatCurrencyFromWei(value: BigNumberish, precision: number = 2, decimals: BigNumberish = 18): string {
  return formatCurrency(formatUnits(value, decimals), precision);
}

export function formatAddress(address: string): string {
  return `${address.slice(0, 6)}...${address.slice(-4)}`;
}

export function stripAnsi(str: string): string {
  return str.replace(/\x1b\[[0-9;]*m/g, '');
}

function padWithColors(str: string, width: number, align: 'left' | 'right' = 'left', color?: string): string {
  const coloredStr = color ? `${color}${str}${colors.reset}` : str;
  const paddingNeeded = width - stripAnsi(coloredStr).length;
  if (paddingNeeded <= 0) return coloredStr;

  const padding = ' '.repeat(paddingNeeded);
  return align === 'right' ? padding + coloredStr : coloredStr + padding;
}

export function healthStatusColor(status: HealthStatus): string {
  switch (status) {
    case HealthStatus.WARNING:
      return colors.yellow;
    case HealthStatus.CRITICAL:
      return colors.red;
    case HealthStatus.CLOSED:
      return colors.grey;
    default:
      return colors.green;
  }
}
