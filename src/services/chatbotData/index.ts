export * from './types';
export { InventoryDataService, buildContainsPattern } from './InventoryDataService';
export type { InventoryDataServiceOptions } from './InventoryDataService';
export { AutomaticQueryService } from './AutomaticQueryService';
export type { ChatbotLookups } from './AutomaticQueryService';
export { detectQueryIntent } from './intentDetector';
export type { QueryIntent } from './intentDetector';
