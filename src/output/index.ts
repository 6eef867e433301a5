/**
 * Workbook and chart series output.
 *
 * @packageDocumentation
 */

export { buildChartSeries, negLog10 } from './chart-series.js';
export type { ChartPoint } from './chart-series.js';
export {
  ALL_RESULTS_SHEET,
  CHART_DATA_SHEET,
  allResultsRows,
  buildWorkbook,
  chartDataRows,
  encodeWorkbook,
  filteredRows,
  filteredSheetName,
  MAX_SHEET_NAME_LENGTH,
  workbookFileName,
  writeWorkbook,
} from './workbook.js';
export type { Cell, SheetRows, WorkbookInput, WriteWorkbookOptions } from './workbook.js';
