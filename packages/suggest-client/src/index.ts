export { SuggestionClient } from "./api";
export type { SuggestionClientOptions, SuggestionResults } from "./api";
