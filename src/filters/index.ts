/**
 * Filters module exports
 */

export { FilterRegistry } from "./registry.js";
export {
  BUILTIN_FILTERS,
  contentTypesFilter,
  commandsFilter,
  regexpFilter,
  chatTypesFilter,
} from "./builtin.js";
export {
  simpleFilter,
  typedFilter,
  TextFilter,
  searchableText,
  textFilter,
  textContainsFilter,
  textStartsWithFilter,
  chatIdFilter,
  languageCodeFilter,
  isForwardedFilter,
  isReplyFilter,
  isDigitFilter,
  isChatAdminFilter,
  stateFilter,
  STANDARD_CUSTOM_FILTERS,
} from "./custom.js";
export type { TextFilterOptions, ChatMemberLookup } from "./custom.js";
export type {
  FilterPredicate,
  FilterContext,
  FilterFactory,
  FilterFunction,
  FilterSpec,
  CustomFilter,
} from "./types.js";
