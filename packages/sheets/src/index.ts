// @sheetrecon/sheets - workbook and CSV sources for the table detector

export { gridFromWorkbook, sheetNames, SheetNotFoundError } from "./workbook";
export { gridFromCsv } from "./csv";
export { toCellValue, toGrid } from "./cells";

export type { WorkbookOptions } from "./workbook";
export type { CsvOptions } from "./csv";
