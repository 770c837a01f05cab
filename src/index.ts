export type {
  ConditionGrade,
  InventoryListing,
  LanguageCode,
  LanguageName,
  LocalizedNames,
  MatchOptions,
  MatchResult,
  PickAllocation,
  PickLine,
  StockStatus,
  WantEntry,
} from "./domain/inventory.js";
export {
  LANGUAGES,
  LANGUAGE_CODES,
  isInLanguage,
  nameInLanguage,
  normalizeCondition,
  parseLanguage,
} from "./domain/language.js";
export { ConfigError, InventoryImportError, WantlistParseError } from "./errors.js";

export { match, classifyStock, summarizeMatches, type MatchTotals } from "./services/matching/stockMatcher.js";
export { allocatePicks, allocateAll, copiesInListing, PLAYSET_SIZE } from "./services/matching/pickAllocator.js";

export { InventoryImporter, type InventoryImportResult } from "./services/inventory/inventoryImporter.js";
export { detectDelimiter, detectInventoryFormat } from "./services/inventory/csvFormatDetector.js";
export { analyzeBins, sortBins, formatBinAnalysis, type BinUsage } from "./services/inventory/binAnalysis.js";
export { parseWantlist, parseWantLine, readWantlistFile } from "./services/wantlist/wantlistParser.js";
export { parseLocaleDecimal, parsePrice, parseQuantity } from "./services/parsing/fieldParsers.js";

export { formatSummary } from "./services/formatting/summaryFormatter.js";
export { formatPickingList, formatPickRoute } from "./services/formatting/pickingListFormatter.js";
export { formatInvoice } from "./services/formatting/invoiceFormatter.js";
export { formatStockUpdateCsv } from "./services/formatting/stockUpdateCsv.js";
export { StockCheckService, renderReport, type OutputFormat } from "./services/stockCheckService.js";
