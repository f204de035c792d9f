/**
 * Query suggestions and search history
 *
 * @module
 */

export { SuggestionModel, FIELD_COMPLETIONS, type SuggestionModelOptions } from "./suggestion-model.js";
