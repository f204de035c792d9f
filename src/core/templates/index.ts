/**
 * Search templates
 *
 * @module
 */

export {
  TemplateStore,
  TEMPLATES_SCHEMA_VERSION,
  type TemplateStoreOptions,
  type CreateTemplateOptions,
  type TemplateUpdate,
} from "./template-store.js";
