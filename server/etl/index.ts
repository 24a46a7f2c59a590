export * from './types';
export * from './locale';
export * from './noise';
export * from './shape';
export * from './records';
export * from './normalizer';
export * from './variations';
export * from './quality';
export * from './codec';
export * from './merger';
export * from './pipeline';
export { GoogleSheetsStore, type GoogleSheetsStoreOptions } from './store/googleSheetsStore';
export { InMemorySpreadsheetStore, type StoreCall } from './store/memoryStore';
export { readWorkbookTable, type WorkbookReadOptions } from './sources/workbook';
